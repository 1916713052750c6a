/**
 * Reference updater: rewrite one referencing file after a rename.
 */

import { errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import type { FileKind, RelevantFile } from '../../types/project.js';
import type { VersionControl } from '../vcs/git.js';
import type { UpdateMethod } from './strategy.js';
import { strategyFor } from './registry.js';

export type UpdateStatus = 'updated' | 'unchanged' | 'manual' | 'failed';

/** Outcome of updating one referencing file. */
export interface ReferenceUpdate {
  file: string;
  kind: FileKind;
  method: UpdateMethod | null;
  status: UpdateStatus;
  /** Whether the edited file was staged in version control. */
  staged: boolean;
  error?: string;
}

export interface UpdateOptions {
  /** Version control to stage edited files with; null or absent to skip staging. */
  vcs?: VersionControl | null;
}

/**
 * Rewrite `oldFileName` to `newFileName` in `file` with the method of its type.
 * Never throws: a failure is logged and returned as a `failed` outcome,
 * leaving that reference stale.
 */
export async function updateFileReferences(
  file: RelevantFile,
  oldFileName: string,
  newFileName: string,
  options?: UpdateOptions,
): Promise<ReferenceUpdate> {
  const strategy = strategyFor(file.kind);
  let outcome: ReferenceUpdate;

  try {
    const result = await strategy.update(file.path, oldFileName, newFileName);
    outcome = {
      file: file.path,
      kind: file.kind,
      method: result.method,
      status: result.manual ? 'manual' : result.changed ? 'updated' : 'unchanged',
      staged: false,
    };
  } catch (err) {
    getLogger('references').warn({ file: file.path, from: oldFileName, to: newFileName, err: errorMessage(err) }, 'Failed to update references');
    return {
      file: file.path,
      kind: file.kind,
      method: null,
      status: 'failed',
      staged: false,
      error: errorMessage(err),
    };
  }

  if (outcome.status === 'manual') {
    getLogger('references').warn({ file: file.path, target: oldFileName }, 'File may reference the renamed file; check it manually');
    return outcome;
  }

  getLogger('references').info({ file: file.path, method: outcome.method, status: outcome.status }, 'Updated references');

  if (outcome.status === 'updated' && options?.vcs) {
    const added = await options.vcs.add(file.path);
    if (added.status === 0) {
      outcome.staged = true;
    } else {
      getLogger('references').warn({ file: file.path, output: added.output }, 'Failed to add modified file to git');
    }
  }
  return outcome;
}
