/**
 * Configuration engine.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { ToolConfig } from '../types/config.js';
import { readJson } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { ToolError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: ToolConfig = {
  output: {
    defaultFormat: 'json',
  },
  logging: {
    level: 'info',
    filePath: 'logs/refactor.log',
    maxFileSize: 5 * 1024 * 1024, // 5MB
    maxFiles: 5,
  },
  git: {
    enabled: true,
    stageUpdatedFiles: true,
  },
  rename: {
    addRetries: 1,
  },
};

export const ToolConfigSchema = z.object({
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  git: z.object({
    enabled: z.boolean(),
    stageUpdatedFiles: z.boolean(),
  }),
  rename: z.object({
    addRetries: z.number().int().min(0).max(5),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'MLPROJ_FORMAT': 'output.defaultFormat',
  'MLPROJ_LOG_LEVEL': 'logging.level',
  'MLPROJ_LOG_FILE': 'logging.filePath',
  'MLPROJ_GIT_ENABLED': 'git.enabled',
  'MLPROJ_GIT_STAGE': 'git.stageUpdatedFiles',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readConfigLayer(path: string): Promise<Record<string, unknown> | null> {
  const data = await readJson(path);
  if (data === null) return null;
  if (!isPlainObject(data)) {
    throw new ToolError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${path}`);
  }
  return data;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars < overrides
 *
 * @param projectRoot - Project root whose .mlproj/config.json is layered in (optional)
 * @param overrides - Values from CLI flags
 */
export async function loadConfig(
  projectRoot?: string,
  overrides?: Record<string, unknown>,
): Promise<ToolConfig> {
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULTS) };

  const globalConfig = await readConfigLayer(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  if (projectRoot) {
    const projectConfig = await readConfigLayer(getConfigPath(projectRoot));
    if (projectConfig) {
      merged = deepMerge(merged, projectConfig);
    }
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  if (overrides) {
    merged = deepMerge(merged, overrides);
  }

  const parsed = ToolConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ToolError(ExitCode.CONFIG_ERROR, `Invalid configuration: ${issues}`, {
      fix: `Check ${projectRoot ? getConfigPath(projectRoot) : getGlobalConfigPath()} and MLPROJ_* environment variables`,
    });
  }
  return parsed.data;
}

/**
 * Default configuration, for callers that run without a config layer (tests, library use).
 */
export function defaultConfig(): ToolConfig {
  return structuredClone(DEFAULTS);
}
