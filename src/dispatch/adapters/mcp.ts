/**
 * MCP Adapter for the dispatch layer.
 *
 * Provides handleMcpToolCall(), the single entry point for MCP tool calls.
 * Each tool maps to one registry operation; the reply is always a single
 * string.
 */

import { randomUUID } from 'node:crypto';
import type { DispatchResponse } from '../types.js';
import { Dispatcher } from '../dispatcher.js';
import { createDomainHandlers } from '../domains/index.js';
import { createSanitizer } from '../middleware/sanitizer.js';
import { createAudit } from '../middleware/audit.js';
import { OPERATIONS, resolveTool, type OperationDef } from '../registry.js';
import { buildMcpInputSchema, type JSONSchemaObject } from '../lib/param-utils.js';
import { renderResponse } from '../lib/render.js';
import { isErrorCode } from '../../types/exit-codes.js';
import type { TaskContext } from '../../core/tasks/index.js';

/**
 * Create a Dispatcher for MCP requests against one task context.
 */
export function createMcpDispatcher(ctx: TaskContext): Dispatcher {
  return new Dispatcher({
    handlers: createDomainHandlers(ctx),
    middlewares: [
      createSanitizer(),
      createAudit(),
    ],
  });
}

/** Tool descriptor as listed by the server. */
export interface McpToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchemaObject;
}

/**
 * Tool list generated from the operation registry.
 */
export function listMcpTools(operations: readonly OperationDef[] = OPERATIONS): McpToolDefinition[] {
  return operations.map(def => ({
    name: def.tool,
    description: def.description,
    inputSchema: buildMcpInputSchema(def),
  }));
}

export interface McpToolResult {
  text: string;
  /** True for failures; informational outcomes such as "already exists" are not errors. */
  isError: boolean;
  response?: DispatchResponse;
}

/**
 * Handle an MCP tool call.
 *
 * Translates the tool name and arguments into a DispatchRequest, executes it
 * through the dispatcher and renders the response to its string form.
 */
export async function handleMcpToolCall(
  dispatcher: Dispatcher,
  tool: string,
  args?: Record<string, unknown>,
  requestId?: string,
): Promise<McpToolResult> {
  const def = resolveTool(tool);
  if (!def) {
    return { text: `Unknown tool: ${tool}`, isError: true };
  }

  const response = await dispatcher.dispatch({
    gateway: def.gateway,
    domain: def.domain,
    operation: def.operation,
    params: args,
    source: 'mcp',
    requestId: requestId ?? randomUUID(),
  });

  const exitCode = response.error?.exitCode ?? 1;
  return {
    text: renderResponse(response, def),
    isError: !response.success && isErrorCode(exitCode),
    response,
  };
}
