/**
 * Renamer: rename one project file on disk and in project membership.
 *
 * Sequence: remove the old path from the project, move the file (git mv when
 * available, plain rename otherwise), add the new path back. On failure the
 * file is moved back and the old membership restored before the error is
 * rethrown.
 */

import { rename } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import { ToolError, errorMessage } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import type { ProjectHandle, RenameRecord } from '../../types/project.js';
import type { VersionControl } from '../vcs/git.js';

export type MoveMethod = 'git' | 'fs';

export interface RenameOptions {
  /** Version control to move with; null for a plain filesystem move. */
  vcs: VersionControl | null;
  /** Extra attempts at adding the new path back to the project. */
  addRetries: number;
}

/** Move on disk, preferring version control. Returns how the file was moved. */
async function moveFile(oldPath: string, newPath: string, vcs: VersionControl | null): Promise<MoveMethod> {
  if (vcs) {
    const moved = await vcs.move(oldPath, newPath);
    if (moved.status === 0) return 'git';
    getLogger('rename').warn({ file: oldPath, output: moved.output }, 'Git move failed, using file system move');
  }
  await rename(oldPath, newPath);
  return 'fs';
}

function addWithRetry(project: ProjectHandle, filePath: string, metadata: string, retries: number): void {
  const attempts = 1 + Math.max(0, retries);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      project.addFile(filePath, metadata);
      if (project.hasFile(filePath)) return;
      lastError = new Error('file is not a project member after add');
    } catch (err) {
      lastError = err;
    }
    if (attempt < attempts) {
      getLogger('rename').warn({ file: filePath, attempt }, 'Failed to add file to project. Attempting again');
    }
  }
  throw new ToolError(
    ExitCode.FILE_ERROR,
    `Failed to add ${basename(filePath)} to project after ${attempts} attempt(s): ${errorMessage(lastError)}`,
    { cause: lastError },
  );
}

interface RenameProgress {
  metadata: string | undefined;
  moved: MoveMethod | null;
}

/** Undo a partial rename. Restore failures are logged, never thrown. */
async function restore(
  project: ProjectHandle,
  record: RenameRecord,
  progress: RenameProgress,
  vcs: VersionControl | null,
): Promise<void> {
  if (progress.moved) {
    try {
      if (project.hasFile(record.newPath)) project.removeFile(record.newPath);
      const back = progress.moved === 'git' && vcs ? await vcs.move(record.newPath, record.oldPath) : null;
      if (back === null || back.status !== 0) await rename(record.newPath, record.oldPath);
      getLogger('rename').info({ file: record.oldPath }, 'Moved file back');
    } catch (err) {
      getLogger('rename').error({ file: record.newPath, err: errorMessage(err) }, 'Failed to move file back');
    }
  }

  if (progress.metadata !== undefined && !project.hasFile(record.oldPath)) {
    try {
      project.addFile(record.oldPath, progress.metadata);
      getLogger('rename').info({ file: record.oldPath }, 'Restored original file to project');
    } catch (err) {
      getLogger('rename').error({ file: record.oldPath, err: errorMessage(err) }, 'Failed to restore original file to project');
    }
  }
}

/**
 * Rename `record.oldPath` to `record.newPath` on disk and in the project.
 * Refuses to overwrite an existing file. Entry metadata follows the file.
 */
export async function renameProjectFile(
  project: ProjectHandle,
  record: RenameRecord,
  options: RenameOptions,
): Promise<MoveMethod> {
  if (existsSync(record.newPath)) {
    throw new ToolError(ExitCode.ALREADY_EXISTS, `Cannot rename ${basename(record.oldPath)}: ${basename(record.newPath)} already exists`, {
      fix: 'Rename or remove the existing file first',
    });
  }

  const progress: RenameProgress = { metadata: undefined, moved: null };
  try {
    progress.metadata = project.removeFile(record.oldPath);
    progress.moved = await moveFile(record.oldPath, record.newPath, options.vcs);
    addWithRetry(project, record.newPath, progress.metadata, options.addRetries);
  } catch (err) {
    await restore(project, record, progress, options.vcs);
    if (err instanceof ToolError) throw err;
    throw new ToolError(ExitCode.FILE_ERROR, `Failed to rename ${basename(record.oldPath)}: ${errorMessage(err)}`, { cause: err });
  }

  getLogger('rename').info({ from: record.oldPath, to: record.newPath, via: progress.moved }, 'Renamed file');
  return progress.moved;
}
