import { readFile } from 'fs/promises';
import type { TemplateEntry } from '../catalog/index.js';
import { TemplateIOError, ValidationError, describeFsError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface MergedSection {
  entry: TemplateEntry;
  /** Raw file bytes; templates are never decoded, so any encoding survives */
  content: Buffer;
}

export interface MergedDocument {
  sections: MergedSection[];
  sources: string[];
  bytes: Buffer;
}

const GENERATOR_NAME = 'prompt-merge';

const NEWLINE = 0x0a;

export function sourceMarker(id: string): string {
  return `<!-- source: ${id} -->`;
}

/**
 * Resolve a selection against the catalog it was made from.
 * Empty, repeated and unknown ids are rejected before anything is read.
 */
export function resolveSelection(
  selection: readonly string[],
  catalog: readonly TemplateEntry[]
): TemplateEntry[] {
  if (selection.length === 0) {
    throw new ValidationError('No templates selected');
  }

  const byId = new Map<string, TemplateEntry>();
  for (const entry of catalog) {
    if (byId.has(entry.id)) {
      throw new ValidationError(`Catalog lists template ${entry.id} more than once`);
    }
    byId.set(entry.id, entry);
  }

  const seen = new Set<string>();
  return selection.map((id) => {
    if (seen.has(id)) {
      throw new ValidationError(`Template selected more than once: ${id}`);
    }
    seen.add(id);

    const entry = byId.get(id);
    if (!entry) {
      throw new ValidationError(`Unknown template: ${id}`);
    }
    return entry;
  });
}

/**
 * Read the selected templates in selection order and concatenate them
 */
export async function mergeTemplates(
  selection: readonly string[],
  catalog: readonly TemplateEntry[]
): Promise<MergedDocument> {
  const entries = resolveSelection(selection, catalog);

  const sections: MergedSection[] = [];
  for (const entry of entries) {
    try {
      const content = await readFile(entry.path);
      sections.push({ entry, content });
      logger.debug(`Read ${entry.id} (${content.length} bytes)`);
    } catch (error) {
      throw new TemplateIOError(`Cannot read template ${entry.id}: ${describeFsError(error)}`);
    }
  }

  return {
    sections,
    sources: sections.map(({ entry }) => entry.id),
    bytes: renderMergedDocument(sections),
  };
}

/**
 * Header line, then each source behind its marker with content untouched
 */
export function renderMergedDocument(sections: readonly MergedSection[]): Buffer {
  const sources = sections.map(({ entry }) => entry.id);
  const header = `<!-- Generated by ${GENERATOR_NAME} from ${sources.length} template(s): ${sources.join(', ')} -->\n\n`;

  const chunks: Buffer[] = [Buffer.from(header, 'utf-8')];
  sections.forEach(({ entry, content }, index) => {
    if (index > 0) {
      chunks.push(Buffer.from('\n', 'utf-8'));
    }
    chunks.push(Buffer.from(`${sourceMarker(entry.id)}\n\n`, 'utf-8'), content);
    if (content.length > 0 && content[content.length - 1] !== NEWLINE) {
      chunks.push(Buffer.from('\n', 'utf-8'));
    }
  });

  return Buffer.concat(chunks);
}
