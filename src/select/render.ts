import type { TemplateEntry } from '../catalog/index.js';
import type { SelectorState } from './state.js';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export const SELECTOR_INSTRUCTIONS =
  'Select templates to merge (↑/↓ or j/k to move, SPACE to toggle, ENTER to confirm, q to quit):';

/**
 * Full-screen frame for the current state. Selected entries show their
 * merge position instead of a check mark.
 */
export function renderSelector(state: SelectorState, entries: readonly TemplateEntry[]): string {
  const lines = [SELECTOR_INSTRUCTIONS, ''];

  entries.forEach((entry, index) => {
    const cursor = index === state.cursor ? '>' : ' ';
    const position = state.selected.indexOf(index);
    const mark = position === -1 ? '[ ]' : `[${position + 1}]`;
    const baseMarker = entry.isBase ? ' [BASE]' : '';

    lines.push(` ${cursor} ${mark} ${entry.id}${baseMarker}`);
    lines.push(`       ${entry.title}`);
  });

  lines.push('', `${state.selected.length} template(s) selected`);
  if (state.notice) {
    lines.push(state.notice);
  }

  return CLEAR_SCREEN + lines.join('\n');
}
