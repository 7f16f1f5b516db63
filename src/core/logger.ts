/**
 * pino logging for taskdown.
 *
 * One root logger per process, written to a rotating file by the pino-roll
 * transport. Modules take child loggers from getLogger('subsystem').
 *
 * stdout belongs to the MCP protocol, so nothing here ever writes to it.
 * Before initLogger() runs, getLogger() hands out children of a stderr
 * logger instead (silent under vitest).
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/**
 * Size string pino-roll understands ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  const units: Array<[number, string]> = [
    [1024 * 1024 * 1024, 'g'],
    [1024 * 1024, 'm'],
    [1024, 'k'],
  ];
  for (const [unit, suffix] of units) {
    if (bytes >= unit) return `${Math.floor(bytes / unit)}${suffix}`;
  }
  return `${bytes}`;
}

/**
 * Start file logging under the project data directory.
 *
 * @param dataDir - Absolute path of the `.taskdown` directory
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  const file = join(dataDir, config.filePath);
  mkdirSync(dirname(file), { recursive: true });

  // pino-roll runs in a worker thread and rotates by size and by day.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: { count: config.maxFiles, removeOtherLogFiles: true },
    },
  });

  rootLogger = pino(
    { level: config.level, formatters, timestamp: pino.stdTimeFunctions.isoTime },
    transport,
  );
  return rootLogger;
}

function fallback(): pino.Logger {
  fallbackLogger ??= pino(
    { level: process.env['VITEST'] === 'true' ? 'silent' : 'warn', formatters },
    pino.destination(2),
  );
  return fallbackLogger;
}

/**
 * Child logger bound to a subsystem name. Safe to call at any time.
 */
export function getLogger(subsystem: string): pino.Logger {
  return (rootLogger ?? fallback()).child({ subsystem });
}

/**
 * Flush pending entries and drop the root logger. Called on shutdown.
 */
export function closeLogger(): void {
  rootLogger?.flush();
  rootLogger = null;
}
