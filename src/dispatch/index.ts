/**
 * Dispatch layer public API.
 *
 * Single entry point for the dispatch layer. Both CLI and MCP adapters
 * import from here to create and use the dispatcher.
 */

export { Dispatcher, type DispatcherConfig } from './dispatcher.js';
export { createDomainHandlers } from './domains/index.js';
export { compose } from './middleware/pipeline.js';
export { createSanitizer } from './middleware/sanitizer.js';
export { createAudit } from './middleware/audit.js';
export { createDispatchMeta } from './lib/meta.js';
export { renderResponse, responseResult } from './lib/render.js';
export {
  OPERATIONS, resolve, resolveTool, resolveCommand, validateRequiredParams,
  type OperationDef,
} from './registry.js';
export { createMcpDispatcher, handleMcpToolCall, listMcpTools, type McpToolDefinition, type McpToolResult } from './adapters/mcp.js';
export { createCliDispatcher, dispatchFromCli, exitCodeFor, type CliOutputOptions } from './adapters/cli.js';
export type {
  Gateway, Source, ParamDef, ParamType,
  DispatchRequest, DispatchResponse, DispatchError, DomainHandler,
  Middleware, DispatchNext,
} from './types.js';
