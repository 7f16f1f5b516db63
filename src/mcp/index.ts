/**
 * taskdown MCP server entry point.
 *
 * Exposes one tool per task operation over stdio. Every tool call is
 * routed through the dispatcher and answered with a single text block.
 *
 * stdout carries the protocol; diagnostics go to the log file.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createMcpDispatcher, handleMcpToolCall, listMcpTools } from '../dispatch/adapters/mcp.js';
import { createTaskContext, type TaskContext } from '../core/tasks/index.js';
import { loadConfig } from '../core/config.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { getTaskdownDir } from '../core/paths.js';
import { getPackageVersion } from '../core/version.js';

export const SERVER_NAME = 'taskdown';

/**
 * Build an MCP server bound to one task context. The caller connects it
 * to a transport.
 */
export function createMcpServer(ctx: TaskContext): Server {
  const dispatcher = createMcpDispatcher(ctx);
  const log = getLogger('mcp');

  const server = new Server(
    {
      name: SERVER_NAME,
      version: getPackageVersion(),
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: listMcpTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    log.debug({ tool: name }, 'Tool call');

    const result = await handleMcpToolCall(dispatcher, name, args);
    return {
      content: [{ type: 'text', text: result.text }],
      isError: result.isError,
    };
  });

  return server;
}

/**
 * Load config, start file logging and serve over stdio until a signal
 * arrives.
 */
export async function startMcpServer(cwd: string = process.cwd()): Promise<void> {
  const config = await loadConfig(cwd);
  initLogger(getTaskdownDir(cwd), config.logging);
  const log = getLogger('mcp');

  const ctx = await createTaskContext(config, { cwd });
  const server = createMcpServer(ctx);

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'Shutting down');
    try {
      await server.close();
    } catch (err) {
      log.error({ err }, 'Error during shutdown');
    }
    closeLogger();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(new StdioServerTransport());
  log.info({ tasksDir: ctx.store.tasksDir }, 'Server started');
}
