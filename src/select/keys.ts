import type { Key } from 'readline';
import type { SelectorAction } from './state.js';

/**
 * Map a keypress to a selector action.
 *
 * Up/k previous, Down/j next, Space toggles, Enter confirms,
 * q, Escape and Ctrl+C cancel. Anything else is ignored.
 */
export function decodeKey(sequence: string | undefined, key: Key | undefined): SelectorAction | undefined {
  if (key?.ctrl && key.name === 'c') {
    return 'cancel';
  }

  switch (key?.name ?? sequence) {
    case 'up':
    case 'k':
      return 'previous';
    case 'down':
    case 'j':
      return 'next';
    case 'space':
    case ' ':
      return 'toggle';
    case 'return':
    case 'enter':
    case '\r':
    case '\n':
      return 'confirm';
    case 'q':
    case 'escape':
      return 'cancel';
    default:
      return undefined;
  }
}
