/**
 * Tests for path resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import {
  findProjectRoot,
  getConfigPath,
  getMembershipDir,
  getToolHome,
  isProjectRoot,
  listProjectDefinitions,
} from '../paths.js';

describe('getToolHome', () => {
  const origEnv = process.env['MLPROJ_HOME'];

  afterEach(() => {
    if (origEnv !== undefined) {
      process.env['MLPROJ_HOME'] = origEnv;
    } else {
      delete process.env['MLPROJ_HOME'];
    }
  });

  it('defaults to ~/.mlproj', () => {
    delete process.env['MLPROJ_HOME'];
    expect(getToolHome()).toBe(join(homedir(), '.mlproj'));
  });

  it('respects MLPROJ_HOME', () => {
    process.env['MLPROJ_HOME'] = '/custom/home';
    expect(getToolHome()).toBe('/custom/home');
  });
});

describe('getConfigPath', () => {
  const origDir = process.env['MLPROJ_DIR'];

  afterEach(() => {
    if (origDir !== undefined) process.env['MLPROJ_DIR'] = origDir;
    else delete process.env['MLPROJ_DIR'];
  });

  it('lives in the project tool directory', () => {
    delete process.env['MLPROJ_DIR'];
    expect(getConfigPath('/work/plant')).toBe(join('/work/plant', '.mlproj', 'config.json'));
  });

  it('honours an absolute MLPROJ_DIR', () => {
    process.env['MLPROJ_DIR'] = '/var/mlproj';
    expect(getConfigPath('/work/plant')).toBe(join('/var/mlproj', 'config.json'));
  });
});

describe('project root detection', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'mlproj-paths-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function makeProject(dir: string, prjNames: string[]): void {
    mkdirSync(getMembershipDir(dir), { recursive: true });
    for (const name of prjNames) writeFileSync(join(dir, name), '<Project/>');
  }

  it('needs both a .prj file and resources/project', () => {
    writeFileSync(join(tempDir, 'only.prj'), '<Project/>');
    expect(isProjectRoot(tempDir)).toBe(false);
    mkdirSync(getMembershipDir(tempDir), { recursive: true });
    expect(isProjectRoot(tempDir)).toBe(true);
  });

  it('lists .prj files sorted by name', () => {
    makeProject(tempDir, ['zeta.prj', 'Alpha.PRJ', 'notes.txt']);
    expect(listProjectDefinitions(tempDir)).toEqual(['Alpha.PRJ', 'zeta.prj']);
  });

  it('walks up to the nearest project root', () => {
    makeProject(tempDir, ['plant.prj']);
    const nested = join(tempDir, 'models', 'sub');
    mkdirSync(nested, { recursive: true });
    expect(findProjectRoot(nested)).toBe(tempDir);
  });
});
