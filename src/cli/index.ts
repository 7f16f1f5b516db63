/**
 * taskdown CLI.
 */

import { Command } from 'commander';
import { registerTaskCommands } from './commands/tasks.js';
import { registerConfigCommand } from './commands/config.js';
import { registerMcpCommand } from './commands/mcp.js';
import { createCliRuntime, type CliRuntimeOptions } from './runtime.js';
import { initLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getTaskdownDir } from '../core/paths.js';
import { getPackageVersion } from '../core/version.js';

export interface ProgramOptions extends CliRuntimeOptions {
  /** Start file logging before each command (default true). */
  fileLogging?: boolean;
}

/** Commands that set up their own logging. */
const SELF_LOGGING = new Set(['mcp']);

export function createProgram(options: ProgramOptions = {}): Command {
  const runtime = createCliRuntime(options);
  const program = new Command();

  program
    .name('taskdown')
    .description('Markdown task files for projects, as a CLI and MCP tools')
    .version(getPackageVersion())
    .option('--json', 'Print the structured result as JSON');

  registerTaskCommands(program, runtime);
  registerConfigCommand(program, runtime);
  registerMcpCommand(program, runtime);

  // Initialize the file logger before any command runs. Config errors are
  // reported by the command itself, so logging stays on the stderr fallback.
  let loggerInitialized = options.fileLogging === false;
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    if (loggerInitialized || SELF_LOGGING.has(actionCommand.name())) return;
    loggerInitialized = true;
    try {
      const config = await loadConfig(runtime.cwd);
      initLogger(getTaskdownDir(runtime.cwd), config.logging);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      runtime.stderr(`Warning: file logging disabled: ${message}`);
    }
  });

  return program;
}

/**
 * Parse argv and run the matching command.
 */
export async function runCli(argv: string[] = process.argv, options: ProgramOptions = {}): Promise<void> {
  await createProgram(options).parseAsync(argv);
}
