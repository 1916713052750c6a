/**
 * Configuration type definitions.
 * Covers project and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the project's .mlproj/ directory (default: 'logs/refactor.log') */
  filePath: string;
  /** Maximum log file size in bytes before rotation (default: 5MB) */
  maxFileSize: number;
  /** Number of rotated log files to keep (default: 5) */
  maxFiles: number;
}

/** Version-control configuration. */
export interface GitConfig {
  /** Use git when the project is inside a work tree. */
  enabled: boolean;
  /** `git add` every file whose references were rewritten. */
  stageUpdatedFiles: boolean;
}

/** Rename behaviour. */
export interface RenameConfig {
  /** Extra attempts at re-adding a renamed file to the project. */
  addRetries: number;
}

/** Merged configuration. */
export interface ToolConfig {
  output: OutputConfig;
  logging: LoggingConfig;
  git: GitConfig;
  rename: RenameConfig;
}
