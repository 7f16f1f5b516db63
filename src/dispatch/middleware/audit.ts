/**
 * Audit trail middleware.
 *
 * Writes one pino entry (subsystem: 'audit') per mutate operation, and per
 * failed query, to the project log file.
 */

import { getLogger } from '../../core/logger.js';
import type { DispatchRequest, DispatchResponse, Middleware, DispatchNext } from '../types.js';

export interface AuditEntry {
  timestamp: string;
  requestId: string;
  domain: string;
  operation: string;
  source: 'mcp' | 'cli';
  projectName?: string;
  taskTitle?: string;
  success: boolean;
  exitCode: number;
  durationMs: number;
  error?: string;
}

function stringParam(params: Record<string, unknown> | undefined, name: string): string | undefined {
  const value = params?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Build the audit entry for a finished request.
 */
export function buildAuditEntry(req: DispatchRequest, response: DispatchResponse, durationMs: number): AuditEntry {
  return {
    timestamp: new Date().toISOString(),
    requestId: req.requestId,
    domain: req.domain,
    operation: req.operation,
    source: req.source,
    projectName: stringParam(req.params, 'projectName'),
    taskTitle: stringParam(req.params, 'taskTitle') ?? stringParam(req.params, 'title'),
    success: response.success,
    exitCode: response.error?.exitCode ?? 0,
    durationMs,
    ...(response.error && { error: response.error.message }),
  };
}

/**
 * Creates an audit middleware. Content params (descriptions, PRD text) are
 * never logged, only the project and task the request touched.
 */
export function createAudit(): Middleware {
  return async (req: DispatchRequest, next: DispatchNext): Promise<DispatchResponse> => {
    const startTime = Date.now();
    const response = await next();

    if (req.gateway === 'query' && response.success) return response;

    const entry = buildAuditEntry(req, response, Date.now() - startTime);
    // Lazy acquisition so the file logger set up by the entry point is used.
    getLogger('audit').info(
      {
        requestId: entry.requestId,
        source: entry.source,
        projectName: entry.projectName,
        taskTitle: entry.taskTitle,
        success: entry.success,
        exitCode: entry.exitCode,
        durationMs: entry.durationMs,
        ...(entry.error && { error: entry.error }),
      },
      `${req.gateway} ${entry.domain}.${entry.operation}`,
    );

    return response;
  };
}
