/**
 * Read-only project queries behind the `files` and `refs` commands.
 */

import { basename } from 'node:path';
import type { FileKind } from '../types/project.js';
import { openCurrentProject, type ProjectLocation } from './project/current.js';
import { listRelevantFiles } from './project/enumerate.js';
import { findFileReferences } from './references/finder.js';

export interface FileEntry {
  path: string;
  kind: FileKind;
}

export interface ProjectFilesResult {
  project: string;
  root: string;
  total: number;
  files: FileEntry[];
}

export interface ReferencesResult {
  project: string;
  target: string;
  references: FileEntry[];
}

/** Relevant project files with their type tags. */
export async function listProjectFiles(location?: ProjectLocation): Promise<ProjectFilesResult> {
  const project = await openCurrentProject(location);
  const files = listRelevantFiles(project.files).map((file) => ({ path: file.relativePath, kind: file.kind }));
  return { project: project.name, root: project.root, total: project.files.length, files };
}

/**
 * Project files that reference a file name. Accepts a bare name or a path;
 * only the final component is searched for.
 */
export async function findReferencesTo(file: string, location?: ProjectLocation): Promise<ReferencesResult> {
  const project = await openCurrentProject(location);
  const target = basename(file.replace(/\\/g, '/'));
  const referencing = await findFileReferences(listRelevantFiles(project.files), target);
  return {
    project: project.name,
    target,
    references: referencing.map((ref) => ({ path: ref.relativePath, kind: ref.kind })),
  };
}
