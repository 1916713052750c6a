/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when color is not supported.
 */

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode symbols are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Status symbols and colors
// ---------------------------------------------------------------------------

const STATUS_SYMBOLS_UNICODE: Record<string, string> = {
  renamed: '✔',
  updated: '✔',
  planned: '→',
  unchanged: '·',
  manual: '⚠',
  failed: '✘',
};

const STATUS_SYMBOLS_ASCII: Record<string, string> = {
  renamed: '+',
  updated: '+',
  planned: '>',
  unchanged: '.',
  manual: '!',
  failed: 'x',
};

/** Map a rename or update status to a display symbol. Falls back to '?' for unknown values. */
export function statusSymbol(status: string): string {
  const map = unicodeEnabled ? STATUS_SYMBOLS_UNICODE : STATUS_SYMBOLS_ASCII;
  return map[status] ?? '?';
}

/** Map a rename or update status to a color escape. */
export function statusColor(status: string): string {
  switch (status) {
    case 'renamed':
    case 'updated':   return GREEN;
    case 'planned':   return CYAN;
    case 'manual':    return YELLOW;
    case 'failed':    return RED;
    case 'unchanged': return DIM;
    default: return '';
  }
}

/** Create a horizontal rule. */
export function hRule(width: number = 65): string {
  return (unicodeEnabled ? '─' : '-').repeat(width);
}
