/**
 * Shared fixtures for task operation tests.
 */

import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTaskContext, type TaskContext } from '../context.js';
import type { GenerationRequest, TextGenerator } from '../../assist/generator.js';

/** Generator that records prompts and answers from a fixed table. */
export class RecordingGenerator implements TextGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly replies: Partial<Record<GenerationRequest['kind'], string>> = {}) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.replies[request.kind] ?? '';
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'taskdown-tasks-'));
}

/** Context rooted at `dir`: documents under tasks/, scaffolds under src/. */
export async function makeContext(dir: string, generator?: TextGenerator): Promise<TaskContext> {
  return createTaskContext({ tasksDir: 'tasks', scaffoldDir: 'src' }, { cwd: dir, generator });
}
