/**
 * Reference finder: which project files mention a filename.
 */

import { errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import type { RelevantFile } from '../../types/project.js';
import { strategyFor } from './registry.js';

/**
 * Scan every file with the method of its type and return those that mention
 * `targetFileName`, in input order. A file that cannot be scanned is logged
 * and treated as not referencing.
 */
export async function findFileReferences(
  files: readonly RelevantFile[],
  targetFileName: string,
): Promise<RelevantFile[]> {
  const referencing: RelevantFile[] = [];
  for (const file of files) {
    try {
      if (await strategyFor(file.kind).references(file.path, targetFileName)) {
        referencing.push(file);
      }
    } catch (err) {
      getLogger('references').warn({ file: file.path, target: targetFileName, err: errorMessage(err) }, 'Failed to check references');
    }
  }
  return referencing;
}
