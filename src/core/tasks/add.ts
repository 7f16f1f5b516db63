/**
 * Task creation by compact append.
 *
 * The new section is appended to the raw document text rather than
 * re-encoding the whole list, so existing content is kept byte for byte.
 */

import { appendTaskSection } from '../document/codec.js';
import { TaskdownError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { todoSubtasks, type Task } from '../../types/task.js';
import type { TaskContext } from './context.js';

/** Options for appending a task. */
export interface AppendTaskOptions {
  projectName: string;
  title: string;
  description: string;
  subtasks?: string[];
  /** Create the document on the fly instead of failing with NOT_FOUND. */
  allowMissingDocument?: boolean;
}

/** Result of appending a task. */
export interface AppendTaskResult {
  path: string;
  task: Task;
}

/**
 * Append a new todo task (with todo subtasks) to a project's document.
 */
export async function appendTask(ctx: TaskContext, options: AppendTaskOptions): Promise<AppendTaskResult> {
  const { projectName } = options;
  const existing = await ctx.store.readRaw(projectName);

  if (existing === null && !options.allowMissingDocument) {
    throw new TaskdownError(
      ExitCode.NOT_FOUND,
      `Task file not found for project ${projectName}`,
      { fix: 'Create the task file first or pass batchMode to create it' },
    );
  }

  const task: Task = {
    title: options.title,
    description: options.description,
    subtasks: todoSubtasks(options.subtasks ?? []),
    status: 'todo',
  };

  const path = await ctx.store.writeRaw(projectName, appendTaskSection(existing, task));
  return { path, task };
}
