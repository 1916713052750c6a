/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 */

import type { OutputFormat } from '../../types/config.js';
import { ToolError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Resolved output format with where it came from. */
export interface FormatResolution {
  format: OutputFormat;
  source: 'flag' | 'config' | 'default';
  quiet: boolean;
}

/**
 * Resolve output format from Commander.js option values.
 *
 * Precedence: --json / --human flag, then the configured default, then JSON.
 * Passing both flags is an input error.
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault?: OutputFormat,
): FormatResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (json && human) {
    throw new ToolError(ExitCode.INVALID_INPUT, 'Cannot combine --json and --human');
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
