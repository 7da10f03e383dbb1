import type { TemplateEntry } from '../catalog/index.js';
import { mergeTemplates, writeMergedDocument, STDOUT_TARGET } from '../merge/index.js';
import { runSelector, type SelectorTerminal } from '../select/index.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface MergeCommandOptions {
  catalog: readonly TemplateEntry[];
  root: string;
  outputPath: string;
  /** Ids to merge without asking; interactive selection when absent */
  select?: readonly string[];
  terminal: SelectorTerminal;
}

export type MergeOutcome =
  | { status: 'merged'; sources: string[]; outputPath: string }
  | { status: 'cancelled' };

/**
 * Accept `./a/b.md` and `a\b.md` for the catalog id `a/b.md`
 */
export function normalizeTemplateId(id: string): string {
  return id.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

export async function runMerge(options: MergeCommandOptions): Promise<MergeOutcome> {
  const { catalog, root, outputPath, terminal } = options;

  if (catalog.length === 0) {
    throw new ConfigurationError(`No templates available in ${root}`);
  }

  let selection: string[];
  if (options.select) {
    selection = options.select.map(normalizeTemplateId);
  } else {
    if (!terminal.input.isTTY) {
      throw new ConfigurationError(
        'Interactive selection needs a terminal; use --select to choose templates'
      );
    }

    const result = await runSelector(catalog, terminal);
    if (result.status === 'cancelled') {
      logger.info('Cancelled.');
      return { status: 'cancelled' };
    }
    selection = result.selection;
  }

  const document = await mergeTemplates(selection, catalog);
  await writeMergedDocument(document, outputPath);

  if (outputPath !== STDOUT_TARGET) {
    logger.success(`Merged ${document.sources.length} template(s) into ${outputPath}`);
    logger.info('Included templates:');
    for (const source of document.sources) {
      logger.info(`  - ${source}`);
    }
  }

  return { status: 'merged', sources: document.sources, outputPath };
}
