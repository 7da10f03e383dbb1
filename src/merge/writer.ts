import { rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { TemplateIOError, describeFsError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { MergedDocument } from './merger.js';

export const STDOUT_TARGET = '-';

/**
 * Write the merged document to `outputPath`, or to stdout for `-`.
 *
 * The text goes to a temporary sibling first and is renamed into place,
 * so a failed write leaves no output file behind.
 */
export async function writeMergedDocument(
  document: MergedDocument,
  outputPath: string
): Promise<void> {
  if (outputPath === STDOUT_TARGET) {
    logger.write(document.bytes);
    return;
  }

  const tempPath = join(dirname(outputPath), `.${basename(outputPath)}.${process.pid}.tmp`);

  try {
    await writeFile(tempPath, document.bytes);
    await rename(tempPath, outputPath);
    logger.debug(`Wrote ${document.bytes.length} bytes to ${outputPath}`);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug(`Failed to remove ${tempPath}:`, cleanupError);
    });
    throw new TemplateIOError(
      `Cannot write output file ${outputPath}: ${describeFsError(error)}`
    );
  }
}
