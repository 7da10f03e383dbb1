import type { Dirent } from 'fs';
import { readFile, readdir, realpath, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import { logger } from '../utils/logger.js';
import {
  ConfigurationError,
  TemplateIOError,
  describeFsError,
  isErrnoException,
} from '../errors.js';
import { DEFAULT_EXCLUDE_PATTERNS, isExcluded } from './exclude.js';
import { extractMetadata, isBaseTemplate } from './metadata.js';

export interface TemplateEntry {
  /** Relative POSIX path from the template root; the stable identifier */
  readonly id: string;
  readonly path: string;
  readonly title: string;
  readonly description: string;
  /** Relative directory, `''` for templates at the root */
  readonly group: string;
  readonly extends?: string;
  readonly isBase: boolean;
}

export interface ScanOptions {
  extensions?: readonly string[];
  exclude?: readonly string[];
}

export const DEFAULT_EXTENSIONS = ['.md'];

/**
 * Code-unit ordering, independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Discover templates under a root directory.
 *
 * Entries come back ordered by relative path.
 */
export async function scanTemplates(
  root: string,
  options: ScanOptions = {}
): Promise<TemplateEntry[]> {
  const extensions = (options.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.toLowerCase());
  const exclude = options.exclude ?? DEFAULT_EXCLUDE_PATTERNS;

  await assertReadableDirectory(root);
  logger.debug(`Scanning templates in ${root}`);

  const files: string[] = [];
  await walk(root, '', files, { extensions, exclude }, new Set<string>());
  files.sort(compareCodeUnits);

  const entries: TemplateEntry[] = [];
  for (const id of files) {
    entries.push(await createEntry(root, id));
  }

  logger.debug(`Found ${entries.length} template(s)`);
  return entries;
}

async function assertReadableDirectory(root: string): Promise<void> {
  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new ConfigurationError(`Template root is not a directory: ${root}`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Template directory not found: ${root}`);
    }
    throw new ConfigurationError(
      `Template directory is not readable: ${root} (${describeFsError(error)})`
    );
  }
}

interface WalkFilters {
  extensions: readonly string[];
  exclude: readonly string[];
}

/**
 * Depth-first walk. Symbolic links are followed; `ancestors` holds the real
 * paths of the directories above `dir` so a link back up the tree is skipped.
 */
async function walk(
  dir: string,
  relativeDir: string,
  files: string[],
  filters: WalkFilters,
  ancestors: ReadonlySet<string>
): Promise<void> {
  let dirents: Dirent[];
  let realDir: string;
  try {
    realDir = await realpath(dir);
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    const shown = relativeDir || dir;
    if (relativeDir === '') {
      throw new ConfigurationError(
        `Template directory is not readable: ${shown} (${describeFsError(error)})`
      );
    }
    throw new TemplateIOError(`Cannot read directory ${shown}: ${describeFsError(error)}`);
  }

  if (ancestors.has(realDir)) {
    logger.debug(`Skipping ${relativeDir}/: links back to a parent directory`);
    return;
  }
  const lineage = new Set(ancestors).add(realDir);

  dirents.sort((a, b) => compareCodeUnits(a.name, b.name));

  for (const dirent of dirents) {
    const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;
    const kind = await resolveKind(join(dir, dirent.name), dirent, relativePath);

    if (kind === 'directory') {
      if (isExcluded(`${relativePath}/`, filters.exclude)) {
        logger.debug(`Skipping directory ${relativePath}/`);
        continue;
      }
      await walk(join(dir, dirent.name), relativePath, files, filters, lineage);
    } else if (kind === 'file') {
      if (!filters.extensions.includes(extname(dirent.name).toLowerCase())) {
        continue;
      }
      if (isExcluded(relativePath, filters.exclude)) {
        logger.debug(`Skipping ${relativePath}`);
        continue;
      }
      files.push(relativePath);
    }
  }
}

type EntryKind = 'file' | 'directory' | 'other';

async function resolveKind(path: string, dirent: Dirent, relativePath: string): Promise<EntryKind> {
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  if (!dirent.isSymbolicLink()) return 'other';

  try {
    const target = await stat(path);
    if (target.isDirectory()) return 'directory';
    return target.isFile() ? 'file' : 'other';
  } catch (error) {
    logger.warn(`Skipping broken link ${relativePath}: ${describeFsError(error)}`);
    return 'other';
  }
}

async function createEntry(root: string, id: string): Promise<TemplateEntry> {
  const segments = id.split('/');
  const path = join(root, ...segments);
  const fileName = basename(id);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new TemplateIOError(`Cannot read template ${id}: ${describeFsError(error)}`);
  }

  const metadata = extractMetadata(content, basename(fileName, extname(fileName)));

  const entry: TemplateEntry = {
    id,
    path,
    title: metadata.title,
    description: metadata.description,
    group: segments.slice(0, -1).join('/'),
    isBase: isBaseTemplate(fileName),
    ...(metadata.extends ? { extends: metadata.extends } : {}),
  };

  return Object.freeze(entry);
}
