/**
 * taskdown error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** Serialized form, matching the dispatch error shape. */
export interface TaskdownErrorJSON {
  /** `E_` plus the exit code name, e.g. E_NOT_FOUND. */
  code: string;
  exitCode: ExitCode;
  message: string;
  fix?: string;
}

/**
 * Thrown by core operations. Carries the exit code the caller should see
 * and, where one exists, a suggested fix.
 */
export class TaskdownError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TaskdownError';
    this.code = code;
    this.fix = options?.fix;
  }

  toJSON(): TaskdownErrorJSON {
    return {
      code: `E_${getExitCodeName(this.code)}`,
      exitCode: this.code,
      message: this.message,
      ...(this.fix && { fix: this.fix }),
    };
  }
}
