/**
 * Per-invocation configuration, resolved once in the preAction hook.
 */

import type { ToolConfig } from '../types/config.js';
import { defaultConfig } from '../core/config.js';

let currentConfig: ToolConfig | null = null;

export function setRunConfig(config: ToolConfig): void {
  currentConfig = config;
}

/** The merged configuration, or defaults when no hook has run (tests). */
export function getRunConfig(): ToolConfig {
  return currentConfig ?? defaultConfig();
}

/** Config values set by command flags; they override every config layer. */
export function flagOverrides(opts: Record<string, unknown>): Record<string, unknown> | undefined {
  if (opts['git'] === false) return { git: { enabled: false } };
  return undefined;
}
