#!/usr/bin/env node
import { runCli } from './index.js';

runCli().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
