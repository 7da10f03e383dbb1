/**
 * Number of leading lines inspected for title, description and extends hint
 */
const METADATA_LINE_LIMIT = 10;

const DESCRIPTION_MAX_LENGTH = 80;

const EXTENDS_MARKER = '> **Extends:**';

export interface TemplateMetadata {
  title: string;
  description: string;
  extends?: string;
}

/**
 * Derive display metadata from the head of a template.
 *
 * The title is the first level-one heading, the description the first plain
 * text line, and the extends hint whatever follows an `> **Extends:**` marker.
 * Scanning stops at the description.
 */
export function extractMetadata(content: string, fallbackTitle: string): TemplateMetadata {
  let title: string | undefined;
  let description = '';
  let extendsHint: string | undefined;

  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/).slice(0, METADATA_LINE_LIMIT);

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (line.startsWith('# ')) {
      if (title === undefined) {
        title = line.slice(2).trim();
      }
    } else if (line.startsWith(EXTENDS_MARKER)) {
      if (extendsHint === undefined) {
        extendsHint = line.slice(EXTENDS_MARKER.length).trim();
      }
    } else if (line && !line.startsWith('#') && !line.startsWith('>')) {
      description = truncate(line, DESCRIPTION_MAX_LENGTH);
      break;
    }
  }

  const metadata: TemplateMetadata = {
    title: title || fallbackTitle,
    description,
  };
  if (extendsHint) {
    metadata.extends = extendsHint;
  }
  return metadata;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Base templates are the ones others build on, by naming convention
 */
export function isBaseTemplate(fileName: string): boolean {
  return fileName.toLowerCase().includes('base');
}
