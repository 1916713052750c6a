/**
 * Path resolution for project roots, metadata and tool configuration.
 *
 * Environment variables:
 *   MLPROJ_HOME - Global configuration directory (default: ~/.mlproj)
 *   MLPROJ_DIR  - Per-project tool directory name (default: .mlproj)
 */

import { resolve, dirname, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import { existsSync, readdirSync, statSync } from 'node:fs';

/** Project metadata directory, relative to the project root. */
export const PROJECT_METADATA_DIR = join('resources', 'project');

/** Membership tree inside the metadata directory. */
export const PROJECT_FILES_DIR = 'Root.type.Files';

/**
 * Get the global home directory.
 * Respects MLPROJ_HOME env var, defaults to ~/.mlproj.
 */
export function getToolHome(): string {
  return process.env['MLPROJ_HOME'] ?? join(homedir(), '.mlproj');
}

/**
 * Get the global config file path.
 */
export function getGlobalConfigPath(): string {
  return join(getToolHome(), 'config.json');
}

/**
 * Get the per-project tool directory (config, logs).
 */
export function getToolDir(projectRoot: string): string {
  const dir = process.env['MLPROJ_DIR'] ?? '.mlproj';
  return isAbsolute(dir) ? dir : join(projectRoot, dir);
}

/**
 * Get the path to the project's config.json file.
 */
export function getConfigPath(projectRoot: string): string {
  return join(getToolDir(projectRoot), 'config.json');
}

/**
 * Get the project metadata directory (resources/project).
 */
export function getMetadataDir(projectRoot: string): string {
  return join(projectRoot, PROJECT_METADATA_DIR);
}

/**
 * Get the membership tree root (resources/project/Root.type.Files).
 */
export function getMembershipDir(projectRoot: string): string {
  return join(getMetadataDir(projectRoot), PROJECT_FILES_DIR);
}

/**
 * List the `*.prj` files directly inside a directory, sorted by name.
 */
export function listProjectDefinitions(dir: string): string[] {
  try {
    return readdirSync(dir)
      .filter((name) => name.toLowerCase().endsWith('.prj'))
      .sort();
  } catch {
    return [];
  }
}

/**
 * Whether a directory is a project root: it holds a `*.prj` file
 * and a resources/project metadata directory.
 */
export function isProjectRoot(dir: string): boolean {
  const metadataDir = getMetadataDir(dir);
  if (!existsSync(metadataDir) || !statSync(metadataDir).isDirectory()) return false;
  return listProjectDefinitions(dir).length > 0;
}

/**
 * Walk up from a directory until a project root is found.
 * Returns null when the filesystem root is reached first.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let current = resolve(startDir);
  for (;;) {
    if (isProjectRoot(current)) return current;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
