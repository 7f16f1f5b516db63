/**
 * Tasks Domain Handler (Dispatch Layer)
 *
 * Handles every task document operation. Params arrive already checked
 * against the operation's zod schema; the accessors below only narrow
 * `unknown` to the declared types.
 */

import type { DomainHandler, DispatchResponse, Gateway, Source } from '../types.js';
import { TASKS_DOMAIN } from '../types.js';
import { ExitCode } from '../../types/exit-codes.js';
import { createDispatchMeta } from '../lib/meta.js';
import { getLogger } from '../../core/logger.js';
import { isTaskStatus } from '../../core/document/codec.js';
import type { TaskContext } from '../../core/tasks/index.js';
import type { EngineResult } from '../engines/_error.js';
import {
  taskAdd,
  taskComplexityEstimate,
  taskDependents,
  taskExpand,
  taskFileCreate,
  taskFileGenerate,
  taskNext,
  taskPrdParse,
  taskStatusUpdate,
  taskSuggest,
} from '../engines/task-engine.js';

type Params = Record<string, unknown> | undefined;

function str(params: Params, name: string): string {
  const value = params?.[name];
  return typeof value === 'string' ? value : '';
}

function optStr(params: Params, name: string): string | undefined {
  const value = params?.[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function strList(params: Params, name: string): string[] | undefined {
  const value = params?.[name];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

function bool(params: Params, name: string): boolean {
  return params?.[name] === true;
}

// ---------------------------------------------------------------------------
// TasksHandler
// ---------------------------------------------------------------------------

export class TasksHandler implements DomainHandler {
  constructor(private readonly ctx: TaskContext) {}

  // -----------------------------------------------------------------------
  // Query
  // -----------------------------------------------------------------------

  async query(operation: string, params?: Record<string, unknown>, source?: Source): Promise<DispatchResponse> {
    const startTime = Date.now();
    const projectName = str(params, 'projectName');

    try {
      switch (operation) {
        case 'next': {
          const result = await taskNext(this.ctx, projectName);
          return this.wrapEngineResult(result, 'query', operation, startTime, source);
        }

        case 'dependents': {
          const result = await taskDependents(this.ctx, projectName, str(params, 'taskTitle'));
          return this.wrapEngineResult(result, 'query', operation, startTime, source);
        }

        case 'complexity.estimate': {
          const result = await taskComplexityEstimate(this.ctx, projectName, str(params, 'taskTitle'));
          return this.wrapEngineResult(result, 'query', operation, startTime, source);
        }

        case 'suggest': {
          const result = await taskSuggest(this.ctx, projectName, str(params, 'taskTitle'));
          return this.wrapEngineResult(result, 'query', operation, startTime, source);
        }

        default:
          return this.unsupported('query', operation, startTime, source);
      }
    } catch (error) {
      return this.handleError('query', operation, error, startTime, source);
    }
  }

  // -----------------------------------------------------------------------
  // Mutate
  // -----------------------------------------------------------------------

  async mutate(operation: string, params?: Record<string, unknown>, source?: Source): Promise<DispatchResponse> {
    const startTime = Date.now();
    const projectName = str(params, 'projectName');

    try {
      switch (operation) {
        case 'file.create': {
          const result = await taskFileCreate(this.ctx, projectName);
          return this.wrapEngineResult(result, 'mutate', operation, startTime, source);
        }

        case 'add': {
          const result = await taskAdd(this.ctx, {
            projectName,
            title: str(params, 'title'),
            description: str(params, 'description'),
            subtasks: strList(params, 'subtasks'),
            batchMode: bool(params, 'batchMode'),
          });
          return this.wrapEngineResult(result, 'mutate', operation, startTime, source);
        }

        case 'prd.parse': {
          const result = await taskPrdParse(this.ctx, projectName, str(params, 'prdContent'));
          return this.wrapEngineResult(result, 'mutate', operation, startTime, source);
        }

        case 'status.update': {
          const status = optStr(params, 'status') ?? 'done';
          if (!isTaskStatus(status)) {
            return this.errorResponse('mutate', operation, 'E_INVALID_INPUT', `Invalid status: ${status}`, startTime, source);
          }
          const result = await taskStatusUpdate(this.ctx, {
            projectName,
            taskTitle: str(params, 'taskTitle'),
            subtaskTitle: optStr(params, 'subtaskTitle'),
            status,
          });
          return this.wrapEngineResult(result, 'mutate', operation, startTime, source);
        }

        case 'expand': {
          const result = await taskExpand(this.ctx, projectName, str(params, 'taskTitle'));
          return this.wrapEngineResult(result, 'mutate', operation, startTime, source);
        }

        case 'file.generate': {
          const result = await taskFileGenerate(this.ctx, projectName, str(params, 'taskTitle'));
          return this.wrapEngineResult(result, 'mutate', operation, startTime, source);
        }

        default:
          return this.unsupported('mutate', operation, startTime, source);
      }
    } catch (error) {
      return this.handleError('mutate', operation, error, startTime, source);
    }
  }

  // -----------------------------------------------------------------------
  // Supported operations
  // -----------------------------------------------------------------------

  getSupportedOperations(): { query: string[]; mutate: string[] } {
    return {
      query: ['next', 'dependents', 'complexity.estimate', 'suggest'],
      mutate: ['file.create', 'add', 'prd.parse', 'status.update', 'expand', 'file.generate'],
    };
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private wrapEngineResult(
    result: EngineResult,
    gateway: Gateway,
    operation: string,
    startTime: number,
    source?: Source,
  ): DispatchResponse {
    return {
      _meta: createDispatchMeta({ gateway, domain: TASKS_DOMAIN, operation, source }, startTime),
      success: result.success,
      ...(result.success ? { data: result.data } : {}),
      ...(result.error ? { error: result.error } : {}),
    };
  }

  private unsupported(gateway: Gateway, operation: string, startTime: number, source?: Source): DispatchResponse {
    return this.errorResponse(
      gateway,
      operation,
      'E_INVALID_OPERATION',
      `Unknown ${TASKS_DOMAIN} ${gateway}: ${operation}`,
      startTime,
      source,
    );
  }

  private errorResponse(
    gateway: Gateway,
    operation: string,
    code: string,
    message: string,
    startTime: number,
    source?: Source,
  ): DispatchResponse {
    return {
      _meta: createDispatchMeta({ gateway, domain: TASKS_DOMAIN, operation, source }, startTime),
      success: false,
      error: { code, message, exitCode: ExitCode.INVALID_INPUT },
    };
  }

  private handleError(
    gateway: Gateway,
    operation: string,
    error: unknown,
    startTime: number,
    source?: Source,
  ): DispatchResponse {
    const message = error instanceof Error ? error.message : String(error);
    getLogger('domain:tasks').error({ gateway, operation, err: error }, message);
    return {
      _meta: createDispatchMeta({ gateway, domain: TASKS_DOMAIN, operation, source }, startTime),
      success: false,
      error: { code: 'E_INTERNAL', message, exitCode: ExitCode.GENERAL_ERROR },
    };
  }
}
