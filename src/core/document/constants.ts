/**
 * Fixed text of the task document format.
 */

import type { TaskCategory, TaskPriority } from '../../types/task.js';

/** Title line every document starts with. */
export const DOCUMENT_TITLE = '# Project Tasks';

/** Content of a freshly created document. */
export const EMPTY_DOCUMENT = `${DOCUMENT_TITLE}\n\n`;

/** Category legend, in the order it is written. */
export const CATEGORY_LEGEND: ReadonlyArray<readonly [TaskCategory, string]> = [
  ['[MVP]', 'Core functionality tasks'],
  ['[AI]', 'AI-related features'],
  ['[UX]', 'User experience improvements'],
  ['[INFRA]', 'Infrastructure and setup'],
];

/** Priority legend, in the order it is written. */
export const PRIORITY_LEGEND: ReadonlyArray<readonly [TaskPriority, string]> = [
  ['P0', 'Blocker/Critical'],
  ['P1', 'High Priority'],
  ['P2', 'Medium Priority'],
  ['P3', 'Low Priority'],
];

/** Priority written when a task has none. */
export const DEFAULT_PRIORITY: TaskPriority = 'P2';

/** Separator line closing every task section. */
export const TASK_SEPARATOR = '---';
