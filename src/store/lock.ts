/**
 * Project metadata locking using proper-lockfile.
 * Keeps two runs from rewriting the same project metadata at once.
 */

import lockfile from 'proper-lockfile';
import { ToolError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

const LOCK_OPTIONS = {
  retries: {
    retries: 3,
    minTimeout: 100,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  realpath: false,
};

/**
 * Run `fn` while holding an exclusive lock on a path.
 * The lock is released when `fn` settles.
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const release = await lockfile.lock(lockPath, LOCK_OPTIONS).catch((err: unknown) => {
    throw new ToolError(ExitCode.LOCK_TIMEOUT, `Failed to acquire lock: ${lockPath}`, {
      fix: 'Another mlproj-refactor run may be saving this project. Wait and retry.',
      cause: err,
    });
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}
