/**
 * Central output dispatch for CLI commands.
 *
 * Provides cliOutput() which replaces `console.log(formatSuccess(data))`.
 * Checks the resolved format (JSON/human/quiet) and dispatches to either
 * the JSON envelope (formatSuccess) or a human-readable renderer.
 *
 * Commands call:
 *   cliOutput(data, { command: 'refs', message, human: renderRefs })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import type { ToolError } from '../../core/errors.js';

/** Renders a command result for a terminal. */
export type HumanRenderer<T> = (data: T, quiet: boolean) => string;

export interface CliOutputOptions<T> {
  /** Command name, used as the envelope operation. */
  command: string;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Human renderer; pretty-printed JSON when absent. */
  human?: HumanRenderer<T>;
}

/** Fallback human renderer. */
export function renderGeneric(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<T>(data: T, opts: CliOutputOptions<T>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = opts.human ? opts.human(data, ctx.quiet) : renderGeneric(data);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(data, opts.message, opts.command));
}

/**
 * Output an error in the resolved format.
 * JSON goes to stderr as an error envelope; human mode prints a plain message
 * with the fix hint.
 */
export function cliError(error: ToolError, command?: string): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(`Error: ${error.message} (${error.code})`);
    if (error.fix) console.error(`Fix: ${error.fix}`);
    return;
  }

  console.error(formatError(error, command));
}
