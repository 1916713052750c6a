/**
 * Atomic file write operations using write-file-atomic.
 * Ensures writes are crash-safe: temp file -> rename.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ToolError, isErrnoCode } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 * Strings are encoded with `encoding` (utf8 by default); buffers are written as-is.
 */
export async function atomicWrite(
  filePath: string,
  data: string | Buffer,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    if (typeof data === 'string') {
      await writeFileAtomic(filePath, data, {
        encoding: options?.encoding ?? 'utf8',
        mode: options?.mode,
      });
    } else {
      await writeFileAtomic(filePath, data, { mode: options?.mode });
    }
  } catch (err) {
    throw new ToolError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) {
      return null;
    }
    throw new ToolError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file's raw bytes, throwing a FILE_ERROR (or NOT_FOUND) on failure.
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err: unknown) {
    throw new ToolError(
      isErrnoCode(err, 'ENOENT') ? ExitCode.NOT_FOUND : ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}
