/**
 * Project file enumeration and rename planning.
 */

import { basename, dirname, join } from 'node:path';
import type { ProjectFile, RelevantFile, RenameRecord } from '../../types/project.js';
import { splitFileName } from './file-types.js';

/** A file selected for renaming, with its planned new name. */
export interface RenameCandidate extends RenameRecord {
  file: RelevantFile;
  oldFileName: string;
  newFileName: string;
  /** Base name after removal; empty when the postfix was the whole base name. */
  newBaseName: string;
}

function isRelevant(file: ProjectFile): file is RelevantFile {
  return file.kind !== null;
}

/** Project files whose extension is in the allow-list, in project order. */
export function listRelevantFiles(files: readonly ProjectFile[]): RelevantFile[] {
  return files.filter(isRelevant);
}

/**
 * File name with every occurrence of the postfix removed from its base name;
 * the extension is kept (`ctrl_v1.slx`, `_v1` -> `ctrl.slx`).
 */
export function stripPostfix(fileName: string, postfix: string): string {
  const { base, ext } = splitFileName(fileName);
  return base.split(postfix).join('') + ext;
}

/**
 * Files whose base name contains the postfix (case-sensitive), with their new paths.
 */
export function planRenames(files: readonly RelevantFile[], postfix: string): RenameCandidate[] {
  const candidates: RenameCandidate[] = [];
  for (const file of files) {
    const oldFileName = basename(file.path);
    if (!splitFileName(oldFileName).base.includes(postfix)) continue;
    const newFileName = stripPostfix(oldFileName, postfix);
    candidates.push({
      file,
      oldFileName,
      newFileName,
      newBaseName: splitFileName(oldFileName).base.split(postfix).join(''),
      oldPath: file.path,
      newPath: join(dirname(file.path), newFileName),
    });
  }
  return candidates;
}

/** Comparison key of a path: forward slashes, lower case. */
export function pathKey(filePath: string): string {
  return filePath.replace(/\\/g, '/').toLowerCase();
}

/** Whether two paths name the same project file (case-insensitive, either separator). */
export function samePath(a: string, b: string): boolean {
  return pathKey(a) === pathKey(b);
}

/**
 * The file as it is after a rename: the renamed file gets its new path, others are unchanged.
 */
export function followRename(file: RelevantFile, record: RenameRecord): RelevantFile {
  if (!samePath(file.path, record.oldPath)) return file;
  const newFileName = basename(record.newPath);
  const dir = dirname(file.relativePath);
  return {
    ...file,
    path: record.newPath,
    relativePath: dir === '.' ? newFileName : `${dir}/${newFileName}`,
  };
}
