/**
 * CLI config command - read resolved configuration values.
 */

import { Command } from 'commander';
import { getConfigValue } from '../../core/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { CliRuntime } from '../runtime.js';

export function registerConfigCommand(program: Command, runtime: CliRuntime): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value and where it came from')
    .action(async (key: string) => {
      const resolved = await getConfigValue(key, runtime.cwd);
      if (resolved.value === undefined) {
        runtime.stderr(`Unknown config key: ${key}`);
        runtime.setExitCode(ExitCode.NOT_FOUND);
        return;
      }
      runtime.stdout(JSON.stringify({ key, value: resolved.value, source: resolved.source }, null, 2));
    });
}
