/**
 * Centralized engine error helper.
 *
 * Engines import `engineError()` from this module to produce consistently
 * typed error results with correct exit codes and pino logging.
 *
 * STRING_TO_EXIT is the mapping from string error codes to numeric exit
 * codes; the names follow the ExitCode enum with an `E_` prefix.
 */

import { getLogger } from '../../core/logger.js';
import { TaskdownError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Result type returned by all engine functions.
 */
export interface EngineResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    exitCode?: number;
    details?: Record<string, unknown>;
    fix?: string;
  };
}

export const STRING_TO_EXIT: Record<string, number> = {
  E_GENERAL: ExitCode.GENERAL_ERROR,
  E_GENERAL_ERROR: ExitCode.GENERAL_ERROR,
  E_INTERNAL: ExitCode.GENERAL_ERROR,
  E_NO_HANDLER: ExitCode.GENERAL_ERROR,
  E_INVALID_INPUT: ExitCode.INVALID_INPUT,
  E_MISSING_PARAMS: ExitCode.INVALID_INPUT,
  E_INVALID_OPERATION: ExitCode.INVALID_INPUT,
  E_FILE_ERROR: ExitCode.FILE_ERROR,
  E_NOT_FOUND: ExitCode.NOT_FOUND,
  E_CONFIG_ERROR: ExitCode.CONFIG_ERROR,

  // Special codes (100+) - NOT errors
  E_ALREADY_EXISTS: ExitCode.ALREADY_EXISTS,
};

/**
 * Derive pino log level from exit code.
 *
 * - 100+: informational -> 'debug'
 * - internal errors (1, 3, 8) -> 'error'
 * - other user errors -> 'warn'
 */
function logLevel(exitCode: number): 'error' | 'warn' | 'debug' {
  if (exitCode === 0 || exitCode >= 100) return 'debug';
  if (exitCode === ExitCode.GENERAL_ERROR || exitCode === ExitCode.FILE_ERROR || exitCode === ExitCode.CONFIG_ERROR) {
    return 'error';
  }
  return 'warn';
}

/**
 * Create a typed engine error result with pino logging and correct exit code.
 *
 * @param code - String error code (e.g., 'E_NOT_FOUND')
 */
export function engineError<T>(
  code: string,
  message: string,
  options?: {
    details?: Record<string, unknown>;
    fix?: string;
  },
): EngineResult<T> {
  const exitCode = STRING_TO_EXIT[code] ?? ExitCode.GENERAL_ERROR;
  const level = logLevel(exitCode);

  // Lazy logger acquisition: picks up the file logger once initLogger() ran.
  const logger = getLogger('engine');
  logger[level]({ code, exitCode, ...(options?.details && { details: options.details }) }, message);

  return {
    success: false,
    error: {
      code,
      message,
      exitCode,
      ...(options?.details && { details: options.details }),
      ...(options?.fix && { fix: options.fix }),
    },
  };
}

/**
 * Convert a thrown value into an engine error result.
 * TaskdownError keeps its exit code; anything else is E_GENERAL.
 */
export function engineErrorFrom<T>(err: unknown): EngineResult<T> {
  if (err instanceof TaskdownError) {
    const { code, message, fix } = err.toJSON();
    return engineError(code, message, fix ? { fix } : undefined);
  }
  const message = err instanceof Error ? err.message : String(err);
  return engineError('E_GENERAL', message);
}

/**
 * Create an engine success result.
 */
export function engineSuccess<T>(data: T): EngineResult<T> {
  return { success: true, data };
}
