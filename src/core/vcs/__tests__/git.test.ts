/**
 * Tests for the git adapter.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

interface FakeResult {
  err: Error | null;
  stdout: string;
  stderr: string;
}

interface FakeGit {
  calls: Array<{ cmd: string; args: string[]; cwd: string | undefined }>;
  next: FakeResult[];
}

const git = vi.hoisted((): FakeGit => ({ calls: [], next: [] }));

vi.mock('node:child_process', () => ({
  execFile: (
    cmd: string,
    args: string[],
    opts: { cwd?: string },
    cb: (err: Error | null, result: { stdout: string; stderr: string }) => void,
  ) => {
    git.calls.push({ cmd, args, cwd: opts.cwd });
    const result = git.next.shift() ?? { err: null, stdout: '', stderr: '' };
    cb(result.err, { stdout: result.stdout, stderr: result.stderr });
  },
}));

import { GitAdapter } from '../git.js';

function failure(code: number | string, stderr: string): FakeResult {
  const err = Object.assign(new Error(`Command failed with ${code}`), { code, stdout: '', stderr });
  return { err, stdout: '', stderr };
}

describe('GitAdapter', () => {
  beforeEach(() => {
    git.calls.length = 0;
    git.next.length = 0;
  });

  it('runs git in the project root', async () => {
    const adapter = new GitAdapter('/work/plant');
    await adapter.move('/work/plant/a_v1.m', '/work/plant/a.m');
    expect(git.calls).toEqual([
      { cmd: 'git', args: ['mv', '/work/plant/a_v1.m', '/work/plant/a.m'], cwd: '/work/plant' },
    ]);
  });

  it('is available inside a work tree', async () => {
    git.next.push({ err: null, stdout: 'true\n', stderr: '' });
    expect(await new GitAdapter('/work/plant').isAvailable()).toBe(true);
    expect(git.calls[0]?.args).toEqual(['rev-parse', '--is-inside-work-tree']);
  });

  it('is not available outside a work tree', async () => {
    git.next.push(failure(128, 'fatal: not a git repository'));
    expect(await new GitAdapter('/tmp').isAvailable()).toBe(false);
  });

  it('reports exit status and output of a failed command', async () => {
    git.next.push(failure(128, 'fatal: bad source\n'));
    expect(await new GitAdapter('/work/plant').add('missing.m')).toEqual({ status: 128, output: 'fatal: bad source' });
  });

  it('reports 127 when git cannot be started', async () => {
    git.next.push({ err: Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' }), stdout: '', stderr: '' });
    expect(await new GitAdapter('/work/plant').status()).toEqual({ status: 127, output: 'spawn git ENOENT' });
  });

  it('returns short status output', async () => {
    git.next.push({ err: null, stdout: 'R  a_v1.m -> a.m\n', stderr: '' });
    expect(await new GitAdapter('/work/plant').status()).toEqual({ status: 0, output: 'R  a_v1.m -> a.m' });
    expect(git.calls[0]?.args).toEqual(['status', '--short']);
  });
});
