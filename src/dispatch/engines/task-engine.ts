/**
 * Task engine.
 *
 * Thin wrappers over core/tasks that never throw: each returns an
 * EngineResult whose data pairs the caller-facing message with the
 * structured result behind it.
 */

import {
  appendTask,
  createTaskFile,
  estimateTaskComplexity,
  expandTask,
  generateTaskFile,
  getNextTask,
  getTaskDependents,
  parsePrd,
  suggestNextActions,
  updateTaskStatus,
  type ComplexityEstimate,
  type DependentTask,
  type NextActions,
  type NextTask,
  type TaskContext,
} from '../../core/tasks/index.js';
import type { TaskStatus } from '../../types/task.js';
import { engineErrorFrom, engineSuccess, type EngineResult } from './_error.js';

/** Engine payload: the text shown to the caller plus its structured source. */
export interface TaskOutput<T> {
  message: string;
  result: T;
}

/** Message returned when no todo subtask is left. */
export const ALL_COMPLETE_MESSAGE = 'All tasks are completed!';

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export async function taskFileCreate(
  ctx: TaskContext,
  projectName: string,
): Promise<EngineResult<TaskOutput<{ path: string }>>> {
  try {
    const result = await createTaskFile(ctx, projectName);
    return engineSuccess({ message: `Created new task file at ${result.path}`, result });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskAdd(
  ctx: TaskContext,
  params: { projectName: string; title: string; description: string; subtasks?: string[]; batchMode?: boolean },
): Promise<EngineResult<TaskOutput<{ path: string; title: string }>>> {
  try {
    const { path, task } = await appendTask(ctx, {
      projectName: params.projectName,
      title: params.title,
      description: params.description,
      subtasks: params.subtasks,
      allowMissingDocument: params.batchMode === true,
    });
    return engineSuccess({
      message: `Added new task '${params.title}' to ${params.projectName}`,
      result: { path, title: task.title },
    });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskPrdParse(
  ctx: TaskContext,
  projectName: string,
  prdContent: string,
): Promise<EngineResult<TaskOutput<{ path: string; titles: string[] }>>> {
  try {
    const { path, tasks } = await parsePrd(ctx, projectName, prdContent);
    return engineSuccess({
      message: `Successfully created tasks from PRD in ${path}`,
      result: { path, titles: tasks.map(t => t.title) },
    });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskStatusUpdate(
  ctx: TaskContext,
  params: { projectName: string; taskTitle: string; subtaskTitle?: string; status: TaskStatus },
): Promise<EngineResult<TaskOutput<{ path: string; matched: boolean }>>> {
  try {
    const result = await updateTaskStatus(ctx, params);
    return engineSuccess({
      message: `Updated status of ${result.target} to ${result.status}`,
      result: { path: result.path, matched: result.matched },
    });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskNext(
  ctx: TaskContext,
  projectName: string,
): Promise<EngineResult<TaskOutput<NextTask | null>>> {
  try {
    const result = await getNextTask(ctx, projectName);
    return engineSuccess({ message: result ? pretty(result) : ALL_COMPLETE_MESSAGE, result });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskDependents(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<EngineResult<TaskOutput<DependentTask[]>>> {
  try {
    const result = await getTaskDependents(ctx, projectName, taskTitle);
    return engineSuccess({ message: pretty(result), result });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskExpand(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<EngineResult<TaskOutput<{ path: string; added: string[] }>>> {
  try {
    const { path, added } = await expandTask(ctx, projectName, taskTitle);
    return engineSuccess({
      message: `Expanded task '${taskTitle}' with new subtasks`,
      result: { path, added },
    });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskComplexityEstimate(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<EngineResult<TaskOutput<ComplexityEstimate>>> {
  try {
    const result = await estimateTaskComplexity(ctx, projectName, taskTitle);
    return engineSuccess({ message: pretty(result), result });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskSuggest(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<EngineResult<TaskOutput<NextActions>>> {
  try {
    const result = await suggestNextActions(ctx, projectName, taskTitle);
    return engineSuccess({ message: pretty(result), result });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}

export async function taskFileGenerate(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<EngineResult<TaskOutput<{ path: string }>>> {
  try {
    const result = await generateTaskFile(ctx, projectName, taskTitle);
    return engineSuccess({ message: `Generated file template at ${result.path}`, result });
  } catch (err: unknown) {
    return engineErrorFrom(err);
  }
}
