/**
 * Tests for replacing a document with PRD-derived tasks.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { parsePrd } from '../prd.js';
import { createTaskFile } from '../create.js';
import { appendTask } from '../add.js';
import { encodeTasks } from '../../document/codec.js';
import { makeContext, makeTempDir } from './helpers.js';
import type { TaskContext } from '../context.js';

const PRD = [
  '# Journal',
  '',
  '## Key Features',
  '- Daily entries',
  '- AI mood detection',
  '',
].join('\n');

describe('parsePrd', () => {
  let testDir: string;
  let ctx: TaskContext;

  beforeEach(async () => {
    testDir = await makeTempDir();
    ctx = await makeContext(testDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('overwrites previous content with the full encoding of the derived tasks', async () => {
    await createTaskFile(ctx, 'demo');
    await appendTask(ctx, { projectName: 'demo', title: 'Old', description: '' });

    const result = await parsePrd(ctx, 'demo', PRD);

    expect(result.tasks.map(t => t.title)).toEqual([
      'Project Setup',
      'Implement Core Features',
      'Authentication & Local Storage',
      'Implement AI Features',
      'Enhance UI/UX',
      'Implement Cloud Features',
    ]);
    expect(await readFile(result.path, 'utf8')).toBe(encodeTasks(result.tasks));
  });

  it('creates the document when it does not exist', async () => {
    const result = await parsePrd(ctx, 'fresh', '');

    expect(result.tasks).toHaveLength(4);
    expect(ctx.store.exists('fresh')).toBe(true);
  });

  it('keeps derivation metadata through a reload', async () => {
    await parsePrd(ctx, 'demo', PRD);

    const [setup, core] = await ctx.store.load('demo');
    expect(setup).toMatchObject({ category: '[INFRA]', priority: 'P0', complexity: 'low', estimatedHours: 4 });
    expect(core?.dependencies).toEqual([1]);
    expect(core?.subtasks).toEqual([{ title: 'Daily entries', status: 'todo' }]);
  });
});
