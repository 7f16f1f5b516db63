/**
 * Configuration engine for taskdown.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { ConfigSource, ResolvedValue, TaskdownConfig } from '../types/config.js';
import { readJsonObject, isPlainObject } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { TaskdownError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: TaskdownConfig = {
  tasksDir: 'tasks',
  scaffoldDir: '.',
  logging: {
    level: 'info',
    filePath: 'logs/taskdown.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TASKDOWN_TASKS_DIR': 'tasksDir',
  'TASKDOWN_SCAFFOLD_DIR': 'scaffoldDir',
  'TASKDOWN_LOG_LEVEL': 'logging.level',
  'TASKDOWN_LOG_FILE': 'logging.filePath',
};

const configSchema = z.object({
  tasksDir: z.string().min(1),
  scaffoldDir: z.string().min(1),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
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
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
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

function defaultsCopy(): Record<string, unknown> {
  return deepMerge({}, { ...DEFAULTS, logging: { ...DEFAULTS.logging } });
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<TaskdownConfig> {
  let merged = defaultsCopy();

  const globalConfig = await readJsonObject(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  const projectConfig = await readJsonObject(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'config';
    throw new TaskdownError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`,
      { fix: `Check ${getConfigPath(cwd)} and TASKDOWN_* environment variables` },
    );
  }
  return parsed.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, Record<string, unknown> | null]> = [
    ['project', await readJsonObject(getConfigPath(cwd))],
    ['global', await readJsonObject(getGlobalConfigPath())],
  ];
  for (const [source, layer] of layers) {
    if (!layer) continue;
    const val = getNestedValue(layer, path);
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue(defaultsCopy(), path), source: 'default' };
}
