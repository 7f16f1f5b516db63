/**
 * End-to-end CLI tests against a temp project directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { createProgram } from '../index.js';
import { collectParams } from '../commands/tasks.js';
import { resolveTool } from '../../dispatch/registry.js';

describe('taskdown CLI', () => {
  let testDir: string;
  let stdout: string[];
  let stderr: string[];
  let exitCodes: number[];

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({
      cwd: testDir,
      fileLogging: false,
      stdout: text => { stdout.push(text); },
      stderr: text => { stderr.push(text); },
      setExitCode: code => { exitCodes.push(code); },
    });
    program.exitOverride();
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
    await program.parseAsync(args, { from: 'user' });
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'taskdown-cli-'));
    vi.stubEnv('TASKDOWN_HOME', join(testDir, 'home'));
    stdout = [];
    stderr = [];
    exitCodes = [];
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(testDir, { recursive: true, force: true });
  });

  it('creates a project document with init', async () => {
    await run('init', 'demo');

    expect(stdout).toEqual([`Created new task file at ${join(testDir, 'tasks', 'demo.md')}`]);
    expect(exitCodes).toEqual([0]);
  });

  it('adds a task with repeated subtask options and reads it back', async () => {
    await run('init', 'demo');
    await run('add', 'demo', 'T1', 'desc', '-s', 's1', 's2');
    await run('next', 'demo');

    expect(stdout[1]).toBe("Added new task 'T1' to demo");
    expect(JSON.parse(stdout[2] ?? '')).toEqual({ task: 'T1', subtask: 's1', description: 'desc\n' });
  });

  it('marks a subtask done with status', async () => {
    await run('init', 'demo');
    await run('add', 'demo', 'T1', 'desc', '--subtask', 's1');
    await run('status', 'demo', 'T1', 'done', '--subtask', 's1');
    await run('next', 'demo');

    expect(stdout.slice(2)).toEqual(['Updated status of subtask to done', 'All tasks are completed!']);
  });

  it('creates the document on a batch add', async () => {
    await run('add', 'bulk', 'T1', 'desc', '--batch');

    expect(stdout).toEqual(["Added new task 'T1' to bulk"]);
    expect(await readFile(join(testDir, 'tasks', 'bulk.md'), 'utf-8')).toContain('## Task: T1');
  });

  it('plans from a PRD file', async () => {
    await writeFile(join(testDir, 'prd.md'), '# Product\n');
    await run('plan', 'demo', 'prd.md');

    expect(stdout).toEqual([`Successfully created tasks from PRD in ${join(testDir, 'tasks', 'demo.md')}`]);
  });

  it('reports an unreadable PRD file with the operation label', async () => {
    await run('plan', 'demo', 'missing.md');

    expect(stderr).toEqual([`Error parsing PRD: Cannot read file: ${join(testDir, 'missing.md')}`]);
    expect(exitCodes).toEqual([3]);
  });

  it('exits with the error code on a missing document', async () => {
    await run('next', 'ghost');

    expect(stderr).toEqual(['Task file not found for project ghost']);
    expect(exitCodes).toEqual([4]);
  });

  it('prints the structured result with --json', async () => {
    await run('init', 'demo');
    await run('add', 'demo', 'Build API', 'REST');
    await run('--json', 'estimate', 'demo', 'Build API');

    expect(JSON.parse(stdout[2] ?? '')).toEqual({ task: 'Build API', complexity: 'medium', estimated_hours: 8 });
  });

  it('writes a scaffold file under the configured directory', async () => {
    await mkdir(join(testDir, '.taskdown'), { recursive: true });
    await writeFile(join(testDir, '.taskdown', 'config.json'), JSON.stringify({ scaffoldDir: 'generated' }));
    await run('init', 'demo');
    await run('add', 'demo', 'Build API', 'REST');
    await run('scaffold', 'demo', 'Build API');

    expect(stdout[2]).toBe(`Generated file template at ${join(testDir, 'generated', 'demo', 'build_api.ts')}`);
  });

  it('reports a config value with its source', async () => {
    await run('config', 'get', 'tasksDir');

    expect(JSON.parse(stdout[0] ?? '')).toEqual({ key: 'tasksDir', value: 'tasks', source: 'default' });
  });

  it('reports an unknown config key', async () => {
    await run('config', 'get', 'nope');

    expect(stderr).toEqual(['Unknown config key: nope']);
    expect(exitCodes).toEqual([4]);
  });

  it('rejects a missing positional argument', async () => {
    await expect(run('add', 'demo')).rejects.toMatchObject({ code: 'commander.missingArgument' });
  });
});

describe('collectParams', () => {
  it('splits a comma-separated array option', async () => {
    const base = resolveTool('add_task');
    if (!base) throw new Error('add_task missing');
    const def = {
      ...base,
      params: [{ name: 'labels', type: 'array' as const, required: false, description: 'Labels', cli: { flag: 'labels' } }],
    };
    const command = new Command('tag').option('--labels <labels>');
    command.parseOptions(['--labels', 'a, b,c']);

    const params = await collectParams(def, command, tmpdir());

    expect(params).toEqual({ labels: ['a', 'b', 'c'] });
  });
});
