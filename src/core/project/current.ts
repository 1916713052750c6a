/**
 * Locate and open the current project.
 */

import { resolve } from 'node:path';
import { ProjectStore } from '../../store/project-store.js';
import { ToolError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { findProjectRoot } from '../paths.js';

export interface ProjectLocation {
  /** Explicit project root (the --project flag). */
  projectRoot?: string;
  /** Directory to search upward from when no root is given. */
  cwd?: string;
}

/**
 * Resolve the project root: the explicit root, or the nearest project
 * directory at or above `cwd`.
 */
export function resolveProjectRoot(location?: ProjectLocation): string {
  if (location?.projectRoot) return resolve(location.projectRoot);
  const found = findProjectRoot(location?.cwd ?? process.cwd());
  if (found === null) {
    throw new ToolError(ExitCode.NOT_FOUND, 'Failed to get current project: no *.prj file found in this directory or any parent', {
      fix: 'Run inside a project or pass --project <dir>',
    });
  }
  return found;
}

/**
 * Open the current project. Failure here aborts the whole run.
 */
export async function openCurrentProject(location?: ProjectLocation): Promise<ProjectStore> {
  return ProjectStore.open(resolveProjectRoot(location));
}
