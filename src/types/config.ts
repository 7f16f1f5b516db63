/**
 * Configuration type definitions for taskdown.
 * Covers project and global config with cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to .taskdown/ (default: 'logs/taskdown.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** taskdown configuration (config.json). */
export interface TaskdownConfig {
  /** Directory holding one `{project}.md` document per project. */
  tasksDir: string;
  /** Root directory for files written by `generate_task_file`. */
  scaffoldDir: string;
  logging: LoggingConfig;
}

/** Where a resolved config value came from. */
export type ConfigSource = 'default' | 'global' | 'project' | 'env';

/** A config value paired with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
