/**
 * Task and subtask status updates.
 */

import { getLogger } from '../logger.js';
import type { Task, TaskStatus } from '../../types/task.js';
import type { TaskContext } from './context.js';

/** Options for a status update. */
export interface UpdateStatusOptions {
  projectName: string;
  taskTitle: string;
  /** When set, the subtask of that title is updated instead of the task. */
  subtaskTitle?: string;
  status: TaskStatus;
}

/** Result of a status update. */
export interface UpdateStatusResult {
  path: string;
  target: 'task' | 'subtask';
  status: TaskStatus;
  /** False when no task (or subtask) had the given title. */
  matched: boolean;
}

/**
 * Set the status of the first task titled `taskTitle`, or of its first
 * subtask titled `subtaskTitle`. Titles match exactly.
 *
 * An unknown title is not an error: the document is re-encoded unchanged
 * and the result reports `matched: false`.
 */
export function applyStatus(tasks: Task[], options: Omit<UpdateStatusOptions, 'projectName'>): boolean {
  const task = tasks.find(t => t.title === options.taskTitle);
  if (!task) return false;

  if (options.subtaskTitle) {
    const subtask = task.subtasks.find(s => s.title === options.subtaskTitle);
    if (!subtask) return false;
    subtask.status = options.status;
  } else {
    task.status = options.status;
  }
  return true;
}

/**
 * Load, update and re-encode a project's document.
 * The document is always rewritten in the full numbered form.
 */
export async function updateTaskStatus(ctx: TaskContext, options: UpdateStatusOptions): Promise<UpdateStatusResult> {
  const tasks = await ctx.store.load(options.projectName);
  const matched = applyStatus(tasks, options);

  if (!matched) {
    getLogger('tasks').warn(
      { project: options.projectName, task: options.taskTitle, subtask: options.subtaskTitle },
      'Status update matched no task; document rewritten unchanged',
    );
  }

  const path = await ctx.store.save(options.projectName, tasks);
  return {
    path,
    target: options.subtaskTitle ? 'subtask' : 'task',
    status: options.status,
    matched,
  };
}
