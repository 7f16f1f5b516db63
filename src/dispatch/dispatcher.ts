/**
 * Central Dispatcher -- Routes requests through middleware to domain handlers.
 *
 * The dispatcher is the single entry point for both CLI and MCP adapters.
 * It resolves operations, validates parameters, runs the middleware pipeline,
 * and delegates to the appropriate domain handler. It never throws.
 *
 * Flow: DispatchRequest → resolve → param validation → middleware → handler
 */

import type { DispatchRequest, DispatchResponse, DomainHandler, Middleware } from './types.js';
import { resolve, validateRequiredParams } from './registry.js';
import { buildParamSchema } from './lib/param-utils.js';
import { createDispatchMeta } from './lib/meta.js';
import { compose } from './middleware/pipeline.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from '../core/logger.js';

export interface DispatcherConfig {
  handlers: Map<string, DomainHandler>;
  middlewares?: Middleware[];
}

export class Dispatcher {
  private handlers: Map<string, DomainHandler>;
  private pipeline: Middleware;

  constructor(config: DispatcherConfig) {
    this.handlers = config.handlers;
    this.pipeline = config.middlewares?.length
      ? compose(config.middlewares)
      : (_req, next) => next();
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResponse> {
    const startTime = Date.now();
    const fail = (domain: string, operation: string, error: NonNullable<DispatchResponse['error']>): DispatchResponse => ({
      _meta: createDispatchMeta({ ...request, domain, operation }, startTime),
      success: false,
      error,
    });

    // 1. Resolve operation from registry
    const resolved = resolve(request.gateway, request.domain, request.operation);
    if (!resolved) {
      return fail(request.domain, request.operation, {
        code: 'E_INVALID_OPERATION',
        exitCode: ExitCode.INVALID_INPUT,
        message: `Unknown operation: ${request.gateway}:${request.domain}.${request.operation}`,
      });
    }

    // 2. Validate required params
    const missing = validateRequiredParams(resolved.def, request.params);
    if (missing.length > 0) {
      return fail(resolved.domain, resolved.operation, {
        code: 'E_MISSING_PARAMS',
        exitCode: ExitCode.INVALID_INPUT,
        message: `Missing required parameters: ${missing.join(', ')}`,
        details: { missing },
      });
    }

    // 3. Validate param types
    const parsed = buildParamSchema(resolved.def).safeParse(request.params ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join('.') ?? 'params';
      return fail(resolved.domain, resolved.operation, {
        code: 'E_INVALID_INPUT',
        exitCode: ExitCode.INVALID_INPUT,
        message: `Invalid parameter ${where}: ${issue?.message ?? 'invalid value'}`,
      });
    }
    const params: Record<string, unknown> = parsed.data;

    // 4. Look up domain handler
    const handler = this.handlers.get(resolved.domain);
    if (!handler) {
      return fail(resolved.domain, resolved.operation, {
        code: 'E_NO_HANDLER',
        exitCode: ExitCode.GENERAL_ERROR,
        message: `No handler for domain: ${resolved.domain}`,
      });
    }

    // 5. Run middleware pipeline with terminal handler
    const validated: DispatchRequest = { ...request, domain: resolved.domain, operation: resolved.operation, params };
    const terminal = async (): Promise<DispatchResponse> => {
      const current = validated.params;
      if (validated.gateway === 'query') {
        return handler.query(resolved.operation, current, validated.source);
      }
      return handler.mutate(resolved.operation, current, validated.source);
    };

    let response: DispatchResponse;
    try {
      response = await this.pipeline(validated, terminal);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      getLogger('dispatch').error({ err, operation: resolved.operation }, message);
      return fail(resolved.domain, resolved.operation, {
        code: 'E_INTERNAL',
        exitCode: ExitCode.GENERAL_ERROR,
        message,
      });
    }

    // 6. Stamp timing and tracing metadata
    response._meta.duration_ms = Date.now() - startTime;
    response._meta.requestId = request.requestId;
    response._meta.source = request.source;

    return response;
  }
}
