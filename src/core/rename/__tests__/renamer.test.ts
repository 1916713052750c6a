/**
 * Tests for renaming one project file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile, rename, rm } from 'node:fs/promises';
import { renameProjectFile } from '../renamer.js';
import { ProjectStore } from '../../../store/project-store.js';
import { samePath } from '../../project/enumerate.js';
import { ToolError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { ProjectHandle } from '../../../types/project.js';
import type { CommandResult, VersionControl } from '../../vcs/git.js';
import { createProjectFixture, type ProjectFixture } from '../../../__tests__/project-fixture.js';

const OK: CommandResult = { status: 0, output: '' };

function movingVcs(moveStatus = 0): { vcs: VersionControl; moves: string[][] } {
  const moves: string[][] = [];
  const vcs: VersionControl = {
    isAvailable: async () => true,
    move: async (from, to) => {
      moves.push([from, to]);
      if (moveStatus !== 0) return { status: moveStatus, output: 'fatal: not under version control' };
      await rename(from, to);
      return OK;
    },
    add: async () => OK,
    status: async () => OK,
  };
  return { vcs, moves };
}

/** Project handle whose first `failures` adds of `failPath` throw. */
function failingAdds(store: ProjectStore, failPath: string, failures: number): ProjectHandle {
  let remaining = failures;
  return {
    name: store.name,
    root: store.root,
    get files() {
      return store.files;
    },
    hasFile: (filePath) => store.hasFile(filePath),
    addFile: (filePath, metadata) => {
      if (samePath(filePath, failPath) && remaining > 0) {
        remaining--;
        throw new Error('project is read-only');
      }
      store.addFile(filePath, metadata);
    },
    removeFile: (filePath) => store.removeFile(filePath),
    save: () => store.save(),
  };
}

describe('renameProjectFile', () => {
  let fixture: ProjectFixture;
  let oldPath: string;
  let newPath: string;

  beforeEach(async () => {
    fixture = await createProjectFixture({
      files: { 'scripts/run_v1.m': 'x = 1;' },
      metadata: { 'scripts/run_v1.m': '<Info Label="entry"/>' },
    });
    oldPath = fixture.path('scripts/run_v1.m');
    newPath = fixture.path('scripts/run.m');
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('moves the file and its membership', async () => {
    const project = await ProjectStore.open(fixture.root);
    expect(await renameProjectFile(project, { oldPath, newPath }, { vcs: null, addRetries: 1 })).toBe('fs');

    expect(existsSync(oldPath)).toBe(false);
    expect(await readFile(newPath, 'utf8')).toBe('x = 1;');
    expect(project.hasFile(oldPath)).toBe(false);
    expect(project.hasFile(newPath)).toBe(true);
    expect(project.removeFile(newPath)).toBe('<Info Label="entry"/>');
  });

  it('moves through version control when available', async () => {
    const project = await ProjectStore.open(fixture.root);
    const { vcs, moves } = movingVcs();
    expect(await renameProjectFile(project, { oldPath, newPath }, { vcs, addRetries: 1 })).toBe('git');
    expect(moves).toEqual([[oldPath, newPath]]);
    expect(existsSync(newPath)).toBe(true);
  });

  it('falls back to a file system move when git mv fails', async () => {
    const project = await ProjectStore.open(fixture.root);
    const { vcs } = movingVcs(128);
    expect(await renameProjectFile(project, { oldPath, newPath }, { vcs, addRetries: 1 })).toBe('fs');
    expect(existsSync(newPath)).toBe(true);
    expect(existsSync(oldPath)).toBe(false);
  });

  it('refuses to overwrite an existing file', async () => {
    await fixture.cleanup();
    fixture = await createProjectFixture({
      files: { 'scripts/run_v1.m': 'x = 1;' },
      untracked: { 'scripts/run.m': 'other' },
    });
    oldPath = fixture.path('scripts/run_v1.m');
    newPath = fixture.path('scripts/run.m');
    const project = await ProjectStore.open(fixture.root);

    const err = await renameProjectFile(project, { oldPath, newPath }, { vcs: null, addRetries: 1 }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof ToolError && err.code).toBe(ExitCode.ALREADY_EXISTS);
    expect(await readFile(newPath, 'utf8')).toBe('other');
    expect(project.hasFile(oldPath)).toBe(true);
  });

  it('retries adding the new path', async () => {
    const store = await ProjectStore.open(fixture.root);
    const project = failingAdds(store, newPath, 1);
    await renameProjectFile(project, { oldPath, newPath }, { vcs: null, addRetries: 1 });
    expect(store.hasFile(newPath)).toBe(true);
  });

  it('restores the original file when the new path cannot be added', async () => {
    const store = await ProjectStore.open(fixture.root);
    const project = failingAdds(store, newPath, 5);

    const err = await renameProjectFile(project, { oldPath, newPath }, { vcs: null, addRetries: 1 }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof ToolError && err.message).toBe(
      'Failed to add run.m to project after 2 attempt(s): project is read-only',
    );
    expect(existsSync(oldPath)).toBe(true);
    expect(existsSync(newPath)).toBe(false);
    expect(store.hasFile(oldPath)).toBe(true);
    expect(store.hasFile(newPath)).toBe(false);
    expect(store.removeFile(oldPath)).toBe('<Info Label="entry"/>');
  });

  it('reports the rename error when moving back also fails', async () => {
    const store = await ProjectStore.open(fixture.root);
    const project = failingAdds(store, newPath, 5);
    let moveCount = 0;
    const vcs: VersionControl = {
      isAvailable: async () => true,
      move: async (from, to) => {
        moveCount++;
        if (moveCount === 1) {
          await rename(from, to);
          return OK;
        }
        // The moved file disappears, so neither git nor fs can move it back.
        await rm(from);
        return { status: 128, output: 'fatal: bad source' };
      },
      add: async () => OK,
      status: async () => OK,
    };

    const err = await renameProjectFile(project, { oldPath, newPath }, { vcs, addRetries: 0 }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof ToolError && err.message).toBe(
      'Failed to add run.m to project after 1 attempt(s): project is read-only',
    );
    expect(moveCount).toBe(2);
    expect(existsSync(oldPath)).toBe(false);
    expect(existsSync(newPath)).toBe(false);
    expect(store.hasFile(oldPath)).toBe(false);
    expect(store.hasFile(newPath)).toBe(false);
  });

  it('fails for a file that is not a member', async () => {
    await fixture.cleanup();
    fixture = await createProjectFixture({ untracked: { 'scripts/run_v1.m': 'x = 1;' } });
    oldPath = fixture.path('scripts/run_v1.m');
    newPath = fixture.path('scripts/run.m');
    const project = await ProjectStore.open(fixture.root);

    const err = await renameProjectFile(project, { oldPath, newPath }, { vcs: null, addRetries: 0 }).catch(
      (e: unknown) => e,
    );
    expect(err instanceof ToolError && err.code).toBe(ExitCode.NOT_FOUND);
    expect(existsSync(oldPath)).toBe(true);
  });
});
