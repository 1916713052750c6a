/**
 * Error type with exit code integration.
 */

import type { ExitCode } from '../types/exit-codes.js';

/**
 * Structured error for mlproj-refactor operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class ToolError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ToolError';
    this.code = code;
    this.fix = options?.fix;
  }
}

/**
 * Message of any thrown value, for logs and per-file outcome records.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Whether an error is a Node.js errno error with the given code (e.g. ENOENT).
 */
export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
