/**
 * Parameter sanitizer middleware.
 *
 * Trims the project name and rejects names that would escape the tasks
 * directory before any handler touches the file system.
 */

import { assertProjectName } from '../../core/paths.js';
import { ExitCode } from '../../types/exit-codes.js';
import { createDispatchMeta } from '../lib/meta.js';
import type { DispatchRequest, DispatchResponse, Middleware, DispatchNext } from '../types.js';

export function createSanitizer(): Middleware {
  return async (req: DispatchRequest, next: DispatchNext): Promise<DispatchResponse> => {
    const startTime = Date.now();
    const projectName = req.params?.['projectName'];
    if (typeof projectName === 'string') {
      const trimmed = projectName.trim();
      try {
        assertProjectName(trimmed);
      } catch (error) {
        return {
          _meta: createDispatchMeta(req, startTime),
          success: false,
          error: {
            code: 'E_INVALID_INPUT',
            exitCode: ExitCode.INVALID_INPUT,
            message: error instanceof Error ? error.message : String(error),
          },
        };
      }
      req.params = { ...req.params, projectName: trimmed };
    }

    return next();
  };
}
