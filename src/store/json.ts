/**
 * JSON file reads for configuration files.
 */

import { readTextIfExists } from './atomic.js';
import { TaskdownError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON object file.
 * Returns null if the file does not exist.
 */
export async function readJsonObject(filePath: string): Promise<Record<string, unknown> | null> {
  const content = await readTextIfExists(filePath);
  if (content === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new TaskdownError(
      ExitCode.CONFIG_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
  if (!isPlainObject(parsed)) {
    throw new TaskdownError(ExitCode.CONFIG_ERROR, `Expected a JSON object in: ${filePath}`);
  }
  return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
