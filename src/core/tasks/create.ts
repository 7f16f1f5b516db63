/**
 * Task document creation.
 */

import { EMPTY_DOCUMENT } from '../document/constants.js';
import { TaskdownError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { TaskContext } from './context.js';

/**
 * Create an empty task document holding only the title line.
 * Throws ALREADY_EXISTS (informational) when the project has one.
 */
export async function createTaskFile(ctx: TaskContext, projectName: string): Promise<{ path: string }> {
  const path = ctx.store.pathFor(projectName);
  if (ctx.store.exists(projectName)) {
    throw new TaskdownError(ExitCode.ALREADY_EXISTS, `Task file already exists at ${path}`);
  }
  await ctx.store.writeRaw(projectName, EMPTY_DOCUMENT);
  return { path };
}
