/**
 * Task commands, one per registry operation.
 *
 * Arguments and options come from each operation's ParamDef list, so the
 * CLI and the MCP tools accept the same parameters.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { OPERATIONS, type OperationDef } from '../../dispatch/registry.js';
import type { ParamDef } from '../../dispatch/types.js';
import { dispatchFromCli } from '../../dispatch/adapters/cli.js';
import {
  buildCommanderArgs,
  buildCommanderOptionString,
  camelToKebab,
  commanderOptionKey,
} from '../../dispatch/lib/param-utils.js';
import { TaskdownError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { CliRuntime } from '../runtime.js';

function argumentSpec(param: ParamDef): string {
  const name = camelToKebab(param.name);
  return param.required ? `<${name}>` : `[${name}]`;
}

/** Coerce a raw Commander value to the param's declared type. */
function coerce(param: ParamDef, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  switch (param.type) {
    case 'number':
      return Number(value);
    case 'array':
      return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
    default:
      return value;
  }
}

async function readParamFile(cwd: string, filePath: string): Promise<string> {
  const absolute = resolve(cwd, filePath);
  try {
    return await readFile(absolute, 'utf-8');
  } catch (err) {
    throw new TaskdownError(ExitCode.FILE_ERROR, `Cannot read file: ${absolute}`, { cause: err });
  }
}

/**
 * Collect dispatch params from a parsed command.
 */
export async function collectParams(
  def: OperationDef,
  command: Command,
  cwd: string,
): Promise<Record<string, unknown>> {
  const { positionals, options } = buildCommanderArgs(def);
  const params: Record<string, unknown> = {};

  const args: unknown[] = command.processedArgs;
  positionals.forEach((param, i) => {
    if (args[i] !== undefined) params[param.name] = coerce(param, args[i]);
  });

  const opts: Record<string, unknown> = command.opts();
  for (const param of options) {
    const value = opts[commanderOptionKey(param)];
    if (value !== undefined) params[param.name] = coerce(param, value);
  }

  for (const param of [...positionals, ...options]) {
    const value = params[param.name];
    if (param.cli?.readFile && typeof value === 'string') {
      params[param.name] = await readParamFile(cwd, value);
    }
  }

  return params;
}

function registerOperation(program: Command, def: OperationDef, runtime: CliRuntime): void {
  const command = program.command(def.command).description(def.description);
  const { positionals, options } = buildCommanderArgs(def);

  for (const param of positionals) {
    command.argument(argumentSpec(param), param.description);
  }
  for (const param of options) {
    command.option(buildCommanderOptionString(param), param.description);
  }

  command.action(async () => {
    const json = command.optsWithGlobals()['json'] === true;
    try {
      const params = await collectParams(def, command, runtime.cwd);
      const dispatcher = await runtime.dispatcher();
      const code = await dispatchFromCli(dispatcher, def, params, {
        json,
        stdout: runtime.stdout,
        stderr: runtime.stderr,
      });
      runtime.setExitCode(code);
    } catch (err) {
      if (!(err instanceof TaskdownError)) throw err;
      runtime.stderr(`${def.errorLabel}: ${err.message}`);
      if (err.fix) runtime.stderr(`Fix: ${err.fix}`);
      runtime.setExitCode(err.code);
    }
  });
}

export function registerTaskCommands(program: Command, runtime: CliRuntime): void {
  for (const def of OPERATIONS) {
    registerOperation(program, def, runtime);
  }
}
