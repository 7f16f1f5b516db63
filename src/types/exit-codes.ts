/**
 * Process exit codes.
 *
 * 1-99 are failures. 100 and up report an outcome that is not a failure,
 * such as creating a task file that already exists; the CLI exits 0 for those.
 */
export enum ExitCode {
  SUCCESS = 0,

  GENERAL_ERROR = 1,
  /** Missing or malformed parameters, bad project names. */
  INVALID_INPUT = 2,
  /** A document or generated file could not be read or written. */
  FILE_ERROR = 3,
  /** No document for the project, or no task with the given title. */
  NOT_FOUND = 4,
  CONFIG_ERROR = 8,

  ALREADY_EXISTS = 101,
}

export function isErrorCode(code: number): boolean {
  return code >= 1 && code < 100;
}

/** Enum member name, e.g. 'NOT_FOUND'. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
