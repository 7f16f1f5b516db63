/**
 * File-backed task document store.
 *
 * One store is built per process with an explicit tasks directory and passed
 * to every operation. Each project maps to `{tasksDir}/{project}.md`.
 * There is no locking: concurrent writers to one project race and the last
 * write wins.
 */

import { mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { writeTextAtomic, readTextIfExists } from './atomic.js';
import { decodeTasks, encodeTasks } from '../core/document/codec.js';
import { getDocumentPath } from '../core/paths.js';
import { TaskdownError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { Task } from '../types/task.js';

export interface TaskStoreOptions {
  /** Absolute directory holding the project documents. */
  tasksDir: string;
}

export class TaskStore {
  readonly tasksDir: string;

  constructor(options: TaskStoreOptions) {
    this.tasksDir = options.tasksDir;
  }

  /** Create the tasks directory if it is missing. */
  async init(): Promise<void> {
    try {
      await mkdir(this.tasksDir, { recursive: true });
    } catch (err) {
      throw new TaskdownError(
        ExitCode.FILE_ERROR,
        `Cannot create tasks directory: ${this.tasksDir}`,
        { cause: err },
      );
    }
  }

  /** Document path for a project. Rejects names with path separators. */
  pathFor(projectName: string): string {
    return getDocumentPath(this.tasksDir, projectName);
  }

  exists(projectName: string): boolean {
    return existsSync(this.pathFor(projectName));
  }

  /** Raw document text, or null when the project has no document. */
  async readRaw(projectName: string): Promise<string | null> {
    return readTextIfExists(this.pathFor(projectName));
  }

  /** Overwrite the project document with raw text. */
  async writeRaw(projectName: string, content: string): Promise<string> {
    const path = this.pathFor(projectName);
    await writeTextAtomic(path, content);
    return path;
  }

  /**
   * Decode a project's document.
   * Throws NOT_FOUND when the project has no document.
   */
  async load(projectName: string): Promise<Task[]> {
    const content = await this.readRaw(projectName);
    if (content === null) {
      throw new TaskdownError(
        ExitCode.NOT_FOUND,
        `Task file not found for project ${projectName}`,
        { fix: `Create it first with create_task_file or 'taskdown init ${projectName}'` },
      );
    }
    return decodeTasks(content);
  }

  /** Re-encode and overwrite a project's document. */
  async save(projectName: string, tasks: readonly Task[]): Promise<string> {
    return this.writeRaw(projectName, encodeTasks(tasks));
  }
}
