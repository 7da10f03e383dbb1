import type { TemplateEntry } from '../catalog/index.js';
import { logger } from '../utils/logger.js';

export interface ListOptions {
  details?: boolean;
}

export const NO_TEMPLATES_MESSAGE = 'No templates available.';

/**
 * Catalog lines: a `[group]` header whenever the group changes, one line per
 * template, then the total.
 *
 * Entries keep catalog (path) order, so a group whose files sort around a
 * subdirectory gets its header again after that subdirectory: `a.md`,
 * `a/x.md`, `b.md` lists as `[.]`, `[a]`, `[.]`.
 */
export function formatCatalog(
  entries: readonly TemplateEntry[],
  options: ListOptions = {}
): string[] {
  if (entries.length === 0) {
    return [NO_TEMPLATES_MESSAGE];
  }

  const lines: string[] = [];
  let currentGroup: string | undefined;

  for (const entry of entries) {
    if (entry.group !== currentGroup) {
      currentGroup = entry.group;
      lines.push(`[${currentGroup || '.'}]`);
    }

    const baseMarker = entry.isBase ? ' [BASE]' : '';
    lines.push(`  ${entry.id}${baseMarker} - ${entry.title}`);

    if (options.details) {
      if (entry.description) {
        lines.push(`      ${entry.description}`);
      }
      if (entry.extends) {
        lines.push(`      Extends: ${entry.extends}`);
      }
    }
  }

  lines.push('', `Total: ${entries.length} template(s)`);
  return lines;
}

export function printCatalog(entries: readonly TemplateEntry[], options: ListOptions = {}): void {
  for (const line of formatCatalog(entries, options)) {
    logger.print(line);
  }
}
