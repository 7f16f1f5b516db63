/**
 * Free-text dependents lookup.
 *
 * This is a heuristic: a task "depends on" another when its description
 * mentions the other's title. The numbered dependencies written by PRD
 * derivation are not consulted.
 */

import type { Task, TaskStatus } from '../../types/task.js';
import type { TaskContext } from './context.js';

export interface DependentTask {
  title: string;
  status: TaskStatus;
}

/**
 * Tasks other than `taskTitle` whose description contains `taskTitle`,
 * compared case-insensitively, in document order.
 */
export function findDependents(tasks: readonly Task[], taskTitle: string): DependentTask[] {
  const needle = taskTitle.toLowerCase();
  return tasks
    .filter(t => t.title !== taskTitle && t.description.toLowerCase().includes(needle))
    .map(t => ({ title: t.title, status: t.status }));
}

export async function getTaskDependents(ctx: TaskContext, projectName: string, taskTitle: string): Promise<DependentTask[]> {
  return findDependents(await ctx.store.load(projectName), taskTitle);
}
