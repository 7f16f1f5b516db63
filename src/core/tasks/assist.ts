/**
 * Generator-backed task operations.
 *
 * Each operation looks a task up by exact title, builds a prompt from its
 * description and hands it to the context's TextGenerator. Only
 * expandTask() and generateTaskFile() write anything.
 */

import { join } from 'node:path';
import { parseGeneratedComplexity, parseGeneratedList } from '../assist/generator.js';
import { writeTextAtomic } from '../../store/atomic.js';
import { assertProjectName } from '../paths.js';
import { TaskdownError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { COMPLEXITY_HOURS, todoSubtasks, type Task, type TaskComplexity } from '../../types/task.js';
import type { TaskContext } from './context.js';

/** Extension of scaffolded implementation files. */
export const SCAFFOLD_EXTENSION = '.ts';

/**
 * First task titled `taskTitle`.
 * Throws NOT_FOUND when there is none.
 */
export function findTask(tasks: readonly Task[], taskTitle: string): Task {
  const task = tasks.find(t => t.title === taskTitle);
  if (!task) {
    throw new TaskdownError(ExitCode.NOT_FOUND, `Task '${taskTitle}' not found`);
  }
  return task;
}

export interface ExpandTaskResult {
  path: string;
  task: Task;
  /** Titles of the subtasks appended by this call. */
  added: string[];
}

/**
 * Append generated subtasks (as todo) to a task and save the document.
 * Existing subtasks are kept.
 */
export async function expandTask(ctx: TaskContext, projectName: string, taskTitle: string): Promise<ExpandTaskResult> {
  const tasks = await ctx.store.load(projectName);
  const task = findTask(tasks, taskTitle);

  const reply = await ctx.generator.generate({
    kind: 'subtasks',
    prompt: `Break down this task into smaller, actionable subtasks: ${task.description}`,
  });
  const added = parseGeneratedList(reply);
  task.subtasks.push(...todoSubtasks(added));

  const path = await ctx.store.save(projectName, tasks);
  return { path, task, added };
}

export interface ComplexityEstimate {
  task: string;
  complexity: TaskComplexity;
  estimated_hours: number;
}

/**
 * Estimate a task's complexity. Nothing is persisted.
 */
export async function estimateTaskComplexity(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<ComplexityEstimate> {
  const task = findTask(await ctx.store.load(projectName), taskTitle);

  const reply = await ctx.generator.generate({
    kind: 'complexity',
    prompt: `Estimate the complexity of this task (low/medium/high): ${task.description}`,
  });
  const complexity = parseGeneratedComplexity(reply);

  return { task: task.title, complexity, estimated_hours: COMPLEXITY_HOURS[complexity] };
}

export interface NextActions {
  task: string;
  suggestions: string[];
}

/**
 * Suggest follow-up actions for a task. Nothing is persisted.
 */
export async function suggestNextActions(ctx: TaskContext, projectName: string, taskTitle: string): Promise<NextActions> {
  const task = findTask(await ctx.store.load(projectName), taskTitle);

  const reply = await ctx.generator.generate({
    kind: 'next-actions',
    prompt: `Suggest next actions for this task: ${task.description}`,
  });

  return { task: task.title, suggestions: parseGeneratedList(reply) };
}

/**
 * File-name slug for a task title: lowercase, whitespace to `_`, anything
 * outside [a-z0-9_-] dropped.
 *
 * @example
 * ```ts
 * slugifyTitle('Project Setup');    // 'project_setup'
 * slugifyTitle('UI/UX: Polish!');   // 'uiux_polish'
 * ```
 */
export function slugifyTitle(title: string): string {
  const slug = title
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_-]/g, '');
  return slug || 'task';
}

export interface GenerateTaskFileResult {
  path: string;
}

/**
 * Write a generated implementation template for a task to
 * `{scaffoldDir}/{project}/{slug}.ts`, replacing any previous file.
 */
export async function generateTaskFile(
  ctx: TaskContext,
  projectName: string,
  taskTitle: string,
): Promise<GenerateTaskFileResult> {
  assertProjectName(projectName);
  const task = findTask(await ctx.store.load(projectName), taskTitle);

  const template = await ctx.generator.generate({
    kind: 'file-template',
    prompt: `Generate a file template for implementing: ${task.description}`,
  });

  const path = join(ctx.scaffoldDir, projectName, `${slugifyTitle(task.title)}${SCAFFOLD_EXTENSION}`);
  await writeTextAtomic(path, template);
  return { path };
}
