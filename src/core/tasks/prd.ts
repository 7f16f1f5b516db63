/**
 * Replace a project's document with tasks derived from a PRD.
 */

import { deriveTasksFromPrd } from '../prd/derive.js';
import type { Task } from '../../types/task.js';
import type { TaskContext } from './context.js';

/** Result of deriving tasks from a PRD. */
export interface ParsePrdResult {
  path: string;
  tasks: Task[];
}

/**
 * Derive the task skeleton from `prdContent` and overwrite the project's
 * document with its full encoding. Any previous content is replaced.
 */
export async function parsePrd(ctx: TaskContext, projectName: string, prdContent: string): Promise<ParsePrdResult> {
  const tasks = deriveTasksFromPrd(prdContent);
  const path = await ctx.store.save(projectName, tasks);
  return { path, tasks };
}
