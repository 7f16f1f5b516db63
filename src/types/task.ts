/**
 * Task document type definitions.
 *
 * A task document is an ordered list of tasks persisted as one Markdown
 * file per project. Order is significant: the first task is index 1, and
 * derived dependencies refer to tasks by that index.
 */

/** Completion state shared by tasks and subtasks. */
export type TaskStatus = 'todo' | 'done';

/** All valid status values. */
export const TASK_STATUSES: readonly TaskStatus[] = ['todo', 'done'] as const;

/** Category tags written into numbered task headers. */
export type TaskCategory = '[MVP]' | '[AI]' | '[UX]' | '[INFRA]';

/** Priority tags written into numbered task headers. */
export type TaskPriority = 'P0' | 'P1' | 'P2' | 'P3';

/** Complexity estimate buckets. */
export type TaskComplexity = 'low' | 'medium' | 'high';

/** Checklist item under a task. Subtasks do not nest. */
export interface Subtask {
  title: string;
  status: TaskStatus;
}

/** One unit of work in a task document. */
export interface Task {
  /** Lookup key within a document. The first match wins. */
  title: string;
  description: string;
  status: TaskStatus;
  subtasks: Subtask[];

  // Derivation metadata, populated by PRD derivation or recovered on decode.
  category?: TaskCategory;
  priority?: TaskPriority;
  complexity?: TaskComplexity;
  estimatedHours?: number;
  /** 1-based indices of the tasks this one depends on. */
  dependencies?: number[];
}

/** Estimated hours for each complexity bucket. */
export const COMPLEXITY_HOURS: Readonly<Record<TaskComplexity, number>> = {
  low: 4,
  medium: 8,
  high: 16,
};

/** Build a todo subtask list from plain titles. */
export function todoSubtasks(titles: readonly string[]): Subtask[] {
  return titles.map(title => ({ title, status: 'todo' }));
}
