/**
 * Shared state for one CLI invocation.
 */

import type { Dispatcher } from '../dispatch/dispatcher.js';
import { createCliDispatcher } from '../dispatch/adapters/cli.js';
import type { TextGenerator } from '../core/assist/generator.js';
import { createTaskContext } from '../core/tasks/index.js';
import { loadConfig } from '../core/config.js';

export interface CliRuntime {
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
  /** Built on first use from the resolved config, then reused. */
  dispatcher: () => Promise<Dispatcher>;
}

export interface CliRuntimeOptions {
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  setExitCode?: (code: number) => void;
  generator?: TextGenerator;
}

export function createCliRuntime(options: CliRuntimeOptions = {}): CliRuntime {
  const cwd = options.cwd ?? process.cwd();
  let dispatcher: Promise<Dispatcher> | null = null;

  return {
    cwd,
    stdout: options.stdout ?? ((text: string) => process.stdout.write(`${text}\n`)),
    stderr: options.stderr ?? ((text: string) => process.stderr.write(`${text}\n`)),
    setExitCode: options.setExitCode ?? ((code: number) => { process.exitCode = code; }),
    dispatcher: () => {
      dispatcher ??= loadConfig(cwd)
        .then(config => createTaskContext(config, { cwd, generator: options.generator }))
        .then(createCliDispatcher);
      return dispatcher;
    },
  };
}
