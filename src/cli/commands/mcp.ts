/**
 * CLI mcp command - serve the task tools over stdio.
 */

import { Command } from 'commander';
import type { CliRuntime } from '../runtime.js';

export function registerMcpCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('mcp')
    .description('Start the MCP server on stdio')
    .action(async () => {
      const { startMcpServer } = await import('../../mcp/index.js');
      await startMcpServer(runtime.cwd);
    });
}
