/**
 * CLI Adapter for the dispatch layer.
 *
 * Provides dispatchFromCli(), the single entry point for CLI commands that
 * route through the dispatch pipeline.
 */

import { randomUUID } from 'node:crypto';
import type { DispatchResponse } from '../types.js';
import { Dispatcher } from '../dispatcher.js';
import { createDomainHandlers } from '../domains/index.js';
import { createSanitizer } from '../middleware/sanitizer.js';
import { createAudit } from '../middleware/audit.js';
import type { OperationDef } from '../registry.js';
import { renderResponse, responseResult } from '../lib/render.js';
import { STRING_TO_EXIT } from '../engines/_error.js';
import { ExitCode, isErrorCode } from '../../types/exit-codes.js';
import type { TaskContext } from '../../core/tasks/index.js';

/**
 * Create a Dispatcher for CLI requests against one task context.
 */
export function createCliDispatcher(ctx: TaskContext): Dispatcher {
  return new Dispatcher({
    handlers: createDomainHandlers(ctx),
    middlewares: [
      createSanitizer(),
      createAudit(),
    ],
  });
}

export interface CliOutputOptions {
  /** Print the structured result as JSON instead of the message. */
  json?: boolean;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Process exit code for a response. Informational outcomes (100+) exit 0.
 */
export function exitCodeFor(response: DispatchResponse): number {
  if (response.success) return ExitCode.SUCCESS;
  const errorCode = response.error?.code ?? 'E_GENERAL';
  const exitCode = response.error?.exitCode ?? STRING_TO_EXIT[errorCode] ?? ExitCode.GENERAL_ERROR;
  return isErrorCode(exitCode) ? exitCode : ExitCode.SUCCESS;
}

/**
 * Build a DispatchRequest, dispatch it and print the outcome.
 *
 * Success and informational outcomes go to stdout, failures to stderr.
 * Returns the process exit code; the caller decides when to exit.
 */
export async function dispatchFromCli(
  dispatcher: Dispatcher,
  def: OperationDef,
  params: Record<string, unknown>,
  outputOpts: CliOutputOptions = {},
): Promise<number> {
  const response = await dispatcher.dispatch({
    gateway: def.gateway,
    domain: def.domain,
    operation: def.operation,
    params,
    source: 'cli',
    requestId: randomUUID(),
  });

  const exitCode = exitCodeFor(response);
  const out = outputOpts.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const err = outputOpts.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  if (exitCode !== ExitCode.SUCCESS) {
    err(renderResponse(response, def));
    if (response.error?.fix) {
      err(`Fix: ${response.error.fix}`);
    }
  } else if (outputOpts.json && response.success) {
    out(JSON.stringify(responseResult(response), null, 2));
  } else {
    out(renderResponse(response, def));
  }

  return exitCode;
}
