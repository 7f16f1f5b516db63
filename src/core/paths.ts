/**
 * Path resolution for taskdown.
 *
 * Environment variables:
 *   TASKDOWN_HOME - Global directory (default: ~/.taskdown)
 *   TASKDOWN_DIR  - Project data directory (default: .taskdown)
 */

import { isAbsolute, join, resolve, sep } from 'node:path';
import { homedir } from 'node:os';
import { TaskdownError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** File extension of task documents. */
export const DOCUMENT_EXTENSION = '.md';

/**
 * Get the global taskdown home directory.
 * Respects TASKDOWN_HOME, defaults to ~/.taskdown.
 */
export function getTaskdownHome(): string {
  return process.env['TASKDOWN_HOME'] ?? join(homedir(), '.taskdown');
}

/**
 * Get the absolute path to the project data directory.
 * Respects TASKDOWN_DIR, defaults to `.taskdown` under cwd.
 */
export function getTaskdownDir(cwd?: string): string {
  const dir = process.env['TASKDOWN_DIR'] ?? '.taskdown';
  return isAbsolute(dir) ? dir : resolve(cwd ?? process.cwd(), dir);
}

/** Path to the project's config.json. */
export function getConfigPath(cwd?: string): string {
  return join(getTaskdownDir(cwd), 'config.json');
}

/** Path to the global config.json. */
export function getGlobalConfigPath(): string {
  return join(getTaskdownHome(), 'config.json');
}

/**
 * Resolve a configured path against cwd. Absolute paths pass through;
 * a leading `~/` expands to the home directory.
 */
export function resolveProjectPath(relativePath: string, cwd?: string): string {
  if (isAbsolute(relativePath)) {
    return relativePath;
  }
  if (relativePath.startsWith('~/') || relativePath === '~') {
    return resolve(homedir(), relativePath.slice(2));
  }
  return resolve(cwd ?? process.cwd(), relativePath);
}

/**
 * Reject project names that would escape the tasks directory.
 */
export function assertProjectName(projectName: string): void {
  if (!projectName || projectName.trim().length === 0) {
    throw new TaskdownError(ExitCode.INVALID_INPUT, 'Project name is required');
  }
  if (projectName.includes('/') || projectName.includes('\\') || projectName.includes(sep) || projectName.includes('..')) {
    throw new TaskdownError(
      ExitCode.INVALID_INPUT,
      `Invalid project name: ${projectName}`,
      { fix: 'Use a plain name without path separators or ".."' },
    );
  }
}

/**
 * Path of a project's task document inside `tasksDir`.
 */
export function getDocumentPath(tasksDir: string, projectName: string): string {
  assertProjectName(projectName);
  return join(tasksDir, `${projectName}${DOCUMENT_EXTENSION}`);
}
