/**
 * On-disk project membership store.
 *
 * Reads and writes the per-file metadata tree under
 * resources/project/Root.type.Files. A member `models/ctrl.slx` is recorded
 * by the entry file `models.type.File/ctrl.slx.type.File.xml`.
 *
 * Membership changes stay in memory until save(), which applies pending
 * removals and then additions while holding a lock on the metadata directory.
 */

import { readdir, readFile, rmdir, unlink } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { existsSync, statSync } from 'node:fs';
import { basename, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { atomicWrite } from './atomic.js';
import { withLock } from './lock.js';
import { ToolError, isErrnoCode } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getMembershipDir, getMetadataDir, isProjectRoot, listProjectDefinitions } from '../core/paths.js';
import { fileKindOf } from '../core/project/file-types.js';
import type { ProjectFile, ProjectHandle } from '../types/project.js';

/** Suffix of an entry file. */
const ENTRY_SUFFIX = '.type.File.xml';

/** Suffix of the directory holding a folder's child entries. */
const FOLDER_SUFFIX = '.type.File';

/** Metadata written for members added without carried-over metadata. */
export const DEFAULT_ENTRY_METADATA = '<?xml version="1.0" encoding="UTF-8"?>\n<Info/>\n';

interface MembershipEntry {
  relativePath: string;
  metadata: string;
  folder: boolean;
}

/** Case-insensitive, separator-agnostic membership key. */
function membershipKey(relativePath: string): string {
  return relativePath.replace(/\\/g, '/').toLowerCase();
}

/** Entry file path for a project-relative member path. */
export function entryFilePath(projectRoot: string, relativePath: string): string {
  const segments = relativePath.split('/');
  const leaf = segments.pop() ?? relativePath;
  return join(
    getMembershipDir(projectRoot),
    ...segments.map((segment) => segment + FOLDER_SUFFIX),
    leaf + ENTRY_SUFFIX,
  );
}

export class ProjectStore implements ProjectHandle {
  readonly name: string;
  readonly root: string;
  private readonly entries = new Map<string, MembershipEntry>();
  private readonly added = new Map<string, MembershipEntry>();
  private readonly removed = new Map<string, MembershipEntry>();

  private constructor(root: string, name: string, entries: MembershipEntry[]) {
    this.root = root;
    this.name = name;
    for (const entry of entries) {
      this.entries.set(membershipKey(entry.relativePath), entry);
    }
  }

  /**
   * Load a project's membership from disk.
   * Fails with NOT_FOUND when the directory is not a project root.
   */
  static async open(projectRoot: string): Promise<ProjectStore> {
    const root = resolve(projectRoot);
    if (!isProjectRoot(root)) {
      throw new ToolError(ExitCode.NOT_FOUND, `Not a project root: ${root}`, {
        fix: 'Run inside a project (a directory with a *.prj file and resources/project/) or pass --project <dir>',
      });
    }
    const [definition] = listProjectDefinitions(root);
    const name = definition ? basename(definition, extname(definition)) : basename(root);
    const entries = await readMembershipTree(root, getMembershipDir(root), '');
    return new ProjectStore(root, name, entries);
  }

  /** File members, ordered by relative path. Folder entries are excluded. */
  get files(): ProjectFile[] {
    return [...this.entries.values()]
      .filter((entry) => !entry.folder)
      .sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0))
      .map((entry) => ({
        path: join(this.root, ...entry.relativePath.split('/')),
        relativePath: entry.relativePath,
        kind: fileKindOf(entry.relativePath),
      }));
  }

  /** Whether there are membership changes not yet saved. */
  get dirty(): boolean {
    return this.added.size > 0 || this.removed.size > 0;
  }

  hasFile(filePath: string): boolean {
    const relativePath = this.toRelative(filePath);
    if (relativePath === null) return false;
    const entry = this.entries.get(membershipKey(relativePath));
    return entry !== undefined && !entry.folder;
  }

  addFile(filePath: string, metadata?: string): void {
    const relativePath = this.toRelative(filePath);
    if (relativePath === null) {
      throw new ToolError(ExitCode.INVALID_INPUT, `File is outside the project root: ${filePath}`);
    }
    const absolutePath = join(this.root, ...relativePath.split('/'));
    if (!existsSync(absolutePath) || !statSync(absolutePath).isFile()) {
      throw new ToolError(ExitCode.NOT_FOUND, `Cannot add missing file to project: ${absolutePath}`);
    }
    const key = membershipKey(relativePath);
    if (this.entries.has(key)) return;

    const entry: MembershipEntry = {
      relativePath,
      metadata: metadata ?? DEFAULT_ENTRY_METADATA,
      folder: false,
    };
    this.entries.set(key, entry);
    this.added.set(key, entry);
  }

  removeFile(filePath: string): string {
    const relativePath = this.toRelative(filePath);
    const key = relativePath === null ? null : membershipKey(relativePath);
    const entry = key === null ? undefined : this.entries.get(key);
    if (key === null || entry === undefined || entry.folder) {
      throw new ToolError(ExitCode.NOT_FOUND, `File is not in the project: ${filePath}`);
    }
    this.entries.delete(key);
    // A member added in this session was never written; only on-disk entries need deleting.
    if (!this.added.delete(key)) {
      this.removed.set(key, entry);
    }
    return entry.metadata;
  }

  /**
   * Persist pending membership changes.
   */
  async save(): Promise<void> {
    if (!this.dirty) return;
    await withLock(getMetadataDir(this.root), async () => {
      for (const entry of this.removed.values()) {
        await this.deleteEntryFile(entry.relativePath);
      }
      for (const entry of this.added.values()) {
        await atomicWrite(entryFilePath(this.root, entry.relativePath), entry.metadata);
      }
      this.removed.clear();
      this.added.clear();
    });
  }

  /**
   * Project-relative path (forward slashes) of a path, or null when it is
   * outside the root. Relative inputs resolve against the project root.
   */
  toRelative(filePath: string): string | null {
    const rel = relative(this.root, resolve(this.root, filePath));
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
    return rel.split(sep).join('/');
  }

  private async deleteEntryFile(relativePath: string): Promise<void> {
    const entryPath = entryFilePath(this.root, relativePath);
    try {
      await unlink(entryPath);
    } catch (err) {
      if (!isErrnoCode(err, 'ENOENT')) {
        throw new ToolError(ExitCode.FILE_ERROR, `Failed to delete project entry: ${entryPath}`, { cause: err });
      }
    }
    await pruneEmptyFolderDirs(getMembershipDir(this.root), relativePath.split('/').slice(0, -1));
  }
}

/**
 * Recursively read entry files under a membership directory.
 */
async function readMembershipTree(
  projectRoot: string,
  dir: string,
  prefix: string,
): Promise<MembershipEntry[]> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return [];
    throw new ToolError(ExitCode.FILE_ERROR, `Failed to read project metadata: ${dir}`, { cause: err });
  }

  const entries: MembershipEntry[] = [];
  const childDirs = new Set(
    dirents
      .filter((d) => d.isDirectory() && d.name.endsWith(FOLDER_SUFFIX))
      .map((d) => d.name.slice(0, -FOLDER_SUFFIX.length)),
  );

  for (const dirent of dirents) {
    if (dirent.isFile() && dirent.name.endsWith(ENTRY_SUFFIX)) {
      const name = dirent.name.slice(0, -ENTRY_SUFFIX.length);
      const relativePath = prefix + name;
      const diskPath = join(projectRoot, ...relativePath.split('/'));
      const folder = childDirs.has(name) || (existsSync(diskPath) && statSync(diskPath).isDirectory());
      entries.push({
        relativePath,
        metadata: await readFile(join(dir, dirent.name), 'utf8'),
        folder,
      });
    } else if (dirent.isDirectory() && dirent.name.endsWith(FOLDER_SUFFIX)) {
      const name = dirent.name.slice(0, -FOLDER_SUFFIX.length);
      entries.push(...(await readMembershipTree(projectRoot, join(dir, dirent.name), `${prefix}${name}/`)));
    }
  }
  return entries;
}

/**
 * Remove `*.type.File` directories left empty by an entry deletion,
 * deepest first, stopping at the first non-empty one.
 */
async function pruneEmptyFolderDirs(membershipDir: string, folders: string[]): Promise<void> {
  for (let depth = folders.length; depth > 0; depth--) {
    const dir = join(membershipDir, ...folders.slice(0, depth).map((segment) => segment + FOLDER_SUFFIX));
    try {
      const remaining = await readdir(dir);
      if (remaining.length > 0) return;
      await rmdir(dir);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) continue;
      throw new ToolError(ExitCode.FILE_ERROR, `Failed to prune project metadata: ${dir}`, { cause: err });
    }
  }
}
