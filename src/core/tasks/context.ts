/**
 * Per-process task context.
 *
 * Built once at startup from the resolved config and handed to every
 * operation, so operations never reach for process-wide state.
 */

import { TaskStore } from '../../store/task-store.js';
import { PlaceholderGenerator, type TextGenerator } from '../assist/generator.js';
import { resolveProjectPath } from '../paths.js';
import type { TaskdownConfig } from '../../types/config.js';

export interface TaskContext {
  store: TaskStore;
  generator: TextGenerator;
  /** Absolute root for files written by generateTaskFile(). */
  scaffoldDir: string;
}

export interface CreateTaskContextOptions {
  cwd?: string;
  /** Defaults to the placeholder generator. */
  generator?: TextGenerator;
}

/**
 * Resolve configured directories, create the tasks directory and wire the
 * store and generator together.
 */
export async function createTaskContext(
  config: Pick<TaskdownConfig, 'tasksDir' | 'scaffoldDir'>,
  options: CreateTaskContextOptions = {},
): Promise<TaskContext> {
  const store = new TaskStore({ tasksDir: resolveProjectPath(config.tasksDir, options.cwd) });
  await store.init();
  return {
    store,
    generator: options.generator ?? new PlaceholderGenerator(),
    scaffoldDir: resolveProjectPath(config.scaffoldDir, options.cwd),
  };
}
