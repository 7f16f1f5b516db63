/**
 * Next actionable subtask selection.
 */

import type { Task } from '../../types/task.js';
import type { TaskContext } from './context.js';

/** The next piece of work: a todo subtask and its parent task. */
export interface NextTask {
  task: string;
  subtask: string;
  description: string;
}

/**
 * Pick the first todo subtask of the first todo task that still has one.
 * Tasks marked done are skipped, and so are tasks without subtasks.
 * Returns null when nothing is left, including for an empty list.
 */
export function selectNextTask(tasks: readonly Task[]): NextTask | null {
  for (const task of tasks) {
    if (task.status !== 'todo') continue;

    const subtask = task.subtasks.find(s => s.status === 'todo');
    if (subtask) {
      return { task: task.title, subtask: subtask.title, description: task.description };
    }
  }
  return null;
}

/**
 * Next actionable subtask of a project, or null when all work is done.
 */
export async function getNextTask(ctx: TaskContext, projectName: string): Promise<NextTask | null> {
  return selectNextTask(await ctx.store.load(projectName));
}
