/**
 * CLI adapter tests: exit codes and output routing.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createCliDispatcher, dispatchFromCli, exitCodeFor } from '../cli.js';
import type { Dispatcher } from '../../dispatcher.js';
import type { DispatchResponse } from '../../types.js';
import { resolveTool, type OperationDef } from '../../registry.js';
import { createTaskContext } from '../../../core/tasks/index.js';

function op(tool: string): OperationDef {
  const def = resolveTool(tool);
  if (!def) throw new Error(`no operation for ${tool}`);
  return def;
}

function response(success: boolean, error?: DispatchResponse['error']): DispatchResponse {
  return {
    _meta: {
      gateway: 'mutate',
      domain: 'tasks',
      operation: 'add',
      timestamp: '2026-01-01T00:00:00.000Z',
      duration_ms: 0,
      source: 'cli',
      requestId: 'r',
    },
    success,
    ...(error && { error }),
  };
}

describe('exitCodeFor', () => {
  it('returns 0 on success', () => {
    expect(exitCodeFor(response(true))).toBe(0);
  });

  it('returns the error exit code', () => {
    expect(exitCodeFor(response(false, { code: 'E_NOT_FOUND', exitCode: 4, message: 'x' }))).toBe(4);
  });

  it('falls back to the code mapping when no exit code is set', () => {
    expect(exitCodeFor(response(false, { code: 'E_INVALID_INPUT', message: 'x' }))).toBe(2);
  });

  it('treats informational codes as success', () => {
    expect(exitCodeFor(response(false, { code: 'E_ALREADY_EXISTS', exitCode: 101, message: 'x' }))).toBe(0);
  });
});

describe('dispatchFromCli', () => {
  let testDir: string;
  let dispatcher: Dispatcher;
  let stdout: string[];
  let stderr: string[];
  const sinks = (json = false) => ({
    json,
    stdout: (text: string) => { stdout.push(text); },
    stderr: (text: string) => { stderr.push(text); },
  });

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'taskdown-cli-'));
    const ctx = await createTaskContext({ tasksDir: 'tasks', scaffoldDir: 'src' }, { cwd: testDir });
    dispatcher = createCliDispatcher(ctx);
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('prints the message on success', async () => {
    const code = await dispatchFromCli(dispatcher, op('create_task_file'), { projectName: 'demo' }, sinks());

    expect(code).toBe(0);
    expect(stdout).toEqual([`Created new task file at ${join(testDir, 'tasks', 'demo.md')}`]);
    expect(stderr).toEqual([]);
  });

  it('prints an existing file notice to stdout and exits 0', async () => {
    await dispatchFromCli(dispatcher, op('create_task_file'), { projectName: 'demo' }, sinks());
    const code = await dispatchFromCli(dispatcher, op('create_task_file'), { projectName: 'demo' }, sinks());

    expect(code).toBe(0);
    expect(stdout[1]).toBe(`Task file already exists at ${join(testDir, 'tasks', 'demo.md')}`);
  });

  it('prints failures and their fix to stderr', async () => {
    const code = await dispatchFromCli(dispatcher, op('add_task'), { projectName: 'ghost', title: 'T', description: 'D' }, sinks());

    expect(code).toBe(4);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      'Task file not found for project ghost',
      'Fix: Create the task file first or pass batchMode to create it',
    ]);
  });

  it('prints the structured result with --json', async () => {
    await dispatchFromCli(dispatcher, op('create_task_file'), { projectName: 'demo' }, sinks());
    await dispatchFromCli(
      dispatcher,
      op('add_task'),
      { projectName: 'demo', title: 'Auth', description: 'login' },
      sinks(),
    );
    await dispatchFromCli(
      dispatcher,
      op('add_task'),
      { projectName: 'demo', title: 'Profile', description: 'needs auth' },
      sinks(),
    );
    stdout = [];

    const code = await dispatchFromCli(dispatcher, op('get_task_dependencies'), { projectName: 'demo', taskTitle: 'Auth' }, sinks(true));

    expect(code).toBe(0);
    expect(JSON.parse(stdout[0] ?? '')).toEqual([{ title: 'Profile', status: 'todo' }]);
  });

  it('prints all-complete as JSON null with --json', async () => {
    await dispatchFromCli(dispatcher, op('create_task_file'), { projectName: 'demo' }, sinks());
    stdout = [];

    await dispatchFromCli(dispatcher, op('get_next_task'), { projectName: 'demo' }, sinks(true));

    expect(stdout).toEqual(['null']);
  });
});
