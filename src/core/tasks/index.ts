/**
 * Task operations barrel export.
 */

export { createTaskContext, type TaskContext, type CreateTaskContextOptions } from './context.js';
export { createTaskFile } from './create.js';
export { appendTask, type AppendTaskOptions, type AppendTaskResult } from './add.js';
export { parsePrd, type ParsePrdResult } from './prd.js';
export { updateTaskStatus, applyStatus, type UpdateStatusOptions, type UpdateStatusResult } from './status.js';
export { getNextTask, selectNextTask, type NextTask } from './next.js';
export { getTaskDependents, findDependents, type DependentTask } from './dependents.js';
export {
  findTask,
  expandTask,
  estimateTaskComplexity,
  suggestNextActions,
  generateTaskFile,
  slugifyTitle,
  SCAFFOLD_EXTENSION,
  type ExpandTaskResult,
  type ComplexityEstimate,
  type NextActions,
  type GenerateTaskFileResult,
} from './assist.js';
