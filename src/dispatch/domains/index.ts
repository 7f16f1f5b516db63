/**
 * Domain Handler Registry -- Maps domain names to handler instances.
 */

import type { DomainHandler } from '../types.js';
import { TASKS_DOMAIN } from '../types.js';
import type { TaskContext } from '../../core/tasks/index.js';
import { TasksHandler } from './tasks.js';

export { TasksHandler };

/**
 * Create the handler map for a task context.
 */
export function createDomainHandlers(ctx: TaskContext): Map<string, DomainHandler> {
  const handlers = new Map<string, DomainHandler>();
  handlers.set(TASKS_DOMAIN, new TasksHandler(ctx));
  return handlers;
}
