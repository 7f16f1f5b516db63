/**
 * Markdown task document codec.
 *
 * Two header shapes exist in the wild:
 *   - `## Task: {title}`, written by the compact single-task append
 *   - `## Task {n}: {category} {title} ({priority})`, written by the full encoder
 *
 * decodeTasks() reads both, and reads back the structural lines the full
 * encoder writes (dependencies, complexity, hours, status, subtasks heading)
 * so that a decode -> encode cycle keeps derivation metadata.
 *
 * Unrecognized lines are never errors: they become description text or are
 * skipped, which keeps hand-edited files loadable.
 */

import {
  COMPLEXITY_HOURS,
  type Task,
  type TaskCategory,
  type TaskComplexity,
  type TaskPriority,
  type TaskStatus,
} from '../../types/task.js';
import {
  CATEGORY_LEGEND,
  DEFAULT_PRIORITY,
  DOCUMENT_TITLE,
  EMPTY_DOCUMENT,
  PRIORITY_LEGEND,
  TASK_SEPARATOR,
} from './constants.js';

const PLAIN_HEADER = /^##\s+Task:\s+(.+)$/;
const NUMBERED_HEADER = /^##\s+Task\s+\d+:\s+(.+)$/;
const CHECKLIST_ITEM = /^-\s+\[(.)\]\s+(.+)$/;
const DEPENDENCY_ITEM = /^-\s+Task\s+(\d+)\s*$/;
const SECTION_HEADING = /^###\s+(Dependencies|Subtasks):\s*$/;
const COMPLEXITY_LINE = /^###\s+Complexity:\s+(\S+)\s*$/;
const HOURS_LINE = /^Estimated hours:\s+(\d+(?:\.\d+)?)\s*$/;
const STATUS_LINE = /^###\s+Status:\s+(\S+)\s*$/;
const LEADING_CATEGORY = /^(\[[A-Z]+\])\s+(.+)$/;
const TRAILING_PRIORITY = /^(.+?)\s+\((P\d)\)$/;

type Section = 'none' | 'dependencies' | 'subtasks';

export function isTaskCategory(value: string): value is TaskCategory {
  return CATEGORY_LEGEND.some(([category]) => category === value);
}

export function isTaskPriority(value: string): value is TaskPriority {
  return PRIORITY_LEGEND.some(([priority]) => priority === value);
}

export function isTaskComplexity(value: string): value is TaskComplexity {
  return value === 'low' || value === 'medium' || value === 'high';
}

export function isTaskStatus(value: string): value is TaskStatus {
  return value === 'todo' || value === 'done';
}

function openTask(title: string): Task {
  return { title, description: '', subtasks: [], status: 'todo' };
}

/**
 * Split the body of a numbered header into category, title and priority.
 * Unknown bracket tags and priorities stay part of the title.
 */
function openNumberedTask(body: string): Task {
  let rest = body.trim();
  let category: TaskCategory | undefined;
  let priority: TaskPriority | undefined;

  const cat = LEADING_CATEGORY.exec(rest);
  if (cat?.[1] && cat[2] && isTaskCategory(cat[1])) {
    category = cat[1];
    rest = cat[2];
  }

  const pri = TRAILING_PRIORITY.exec(rest);
  if (pri?.[1] && pri[2] && isTaskPriority(pri[2])) {
    priority = pri[2];
    rest = pri[1];
  }

  const task = openTask(rest);
  if (category) task.category = category;
  if (priority) task.priority = priority;
  return task;
}

/**
 * Parse document text into an ordered task list.
 */
export function decodeTasks(text: string): Task[] {
  const tasks: Task[] = [];
  let current: Task | null = null;
  let section: Section = 'none';
  // `### Status:` is only metadata directly under the header, and
  // `Estimated hours:` only directly under `### Complexity:`.
  let atHead = false;
  let afterComplexity = false;

  for (const line of text.split(/\r?\n/)) {
    const plain = PLAIN_HEADER.exec(line);
    const numbered = plain ? null : NUMBERED_HEADER.exec(line);
    if (plain?.[1] || numbered?.[1]) {
      if (current) tasks.push(current);
      current = plain?.[1] ? openTask(plain[1]) : openNumberedTask(numbered?.[1] ?? '');
      section = 'none';
      atHead = true;
      afterComplexity = false;
      continue;
    }

    if (!current) continue;
    if (!line.trim()) continue;

    const expectHours = afterComplexity;
    afterComplexity = false;

    if (atHead) {
      atHead = false;
      const status = STATUS_LINE.exec(line);
      if (status?.[1] && isTaskStatus(status[1])) {
        current.status = status[1];
        continue;
      }
    }

    const item = CHECKLIST_ITEM.exec(line);
    if (item?.[1] && item[2]) {
      current.subtasks.push({
        title: item[2],
        status: item[1] === 'x' ? 'done' : 'todo',
      });
      continue;
    }

    const heading = SECTION_HEADING.exec(line);
    if (heading) {
      section = heading[1] === 'Dependencies' ? 'dependencies' : 'subtasks';
      continue;
    }

    const dependency = section === 'dependencies' ? DEPENDENCY_ITEM.exec(line) : null;
    if (dependency?.[1]) {
      (current.dependencies ??= []).push(Number(dependency[1]));
      continue;
    }

    const complexity = COMPLEXITY_LINE.exec(line);
    if (complexity?.[1] && isTaskComplexity(complexity[1])) {
      current.complexity = complexity[1];
      section = 'none';
      afterComplexity = true;
      continue;
    }

    const hours = expectHours ? HOURS_LINE.exec(line) : null;
    if (hours?.[1]) {
      current.estimatedHours = Number(hours[1]);
      continue;
    }

    if (!line.startsWith('-')) {
      current.description += line + '\n';
    }
  }

  if (current) tasks.push(current);
  return tasks;
}

function renderPreamble(): string {
  let content = `${DOCUMENT_TITLE}\n\n`;

  content += '## Categories\n';
  for (const [category, label] of CATEGORY_LEGEND) {
    content += `- ${category} ${label}\n`;
  }
  content += '\n';

  content += '## Priority Levels\n';
  for (const [priority, label] of PRIORITY_LEGEND) {
    content += `- ${priority}: ${label}\n`;
  }
  content += '\n';

  return content;
}

function renderSubtasks(task: Task): string {
  if (task.subtasks.length === 0) return '';
  let content = '### Subtasks:\n\n';
  for (const subtask of task.subtasks) {
    content += `- [${subtask.status === 'done' ? 'x' : ' '}] ${subtask.title}\n`;
  }
  return content + '\n';
}

function renderDescription(task: Task): string {
  const description = task.description.trim();
  return description ? `${description}\n\n` : '';
}

/**
 * Serialize a task list into a full document: preamble, then one numbered
 * section per task.
 */
export function encodeTasks(tasks: readonly Task[]): string {
  let content = renderPreamble();

  tasks.forEach((task, i) => {
    const category = task.category ?? '';
    const priority = task.priority ?? DEFAULT_PRIORITY;
    content += `## Task ${i + 1}: ${category} ${task.title} (${priority})\n\n`;

    if (task.status === 'done') {
      content += '### Status: done\n\n';
    }

    content += renderDescription(task);

    if (task.dependencies?.length) {
      content += '### Dependencies:\n';
      for (const dep of task.dependencies) {
        content += `- Task ${dep}\n`;
      }
      content += '\n';
    }

    if (task.complexity) {
      const hours = task.estimatedHours ?? COMPLEXITY_HOURS[task.complexity];
      content += `### Complexity: ${task.complexity}\n`;
      content += `Estimated hours: ${hours}\n\n`;
    }

    content += renderSubtasks(task);
    content += `${TASK_SEPARATOR}\n\n`;
  });

  return content;
}

/**
 * Render one task in the compact form used when appending:
 * a `## Task: {title}` header, no index, category or priority.
 */
export function encodeTaskSection(task: Task): string {
  return `\n## Task: ${task.title}\n\n`
    + renderDescription(task)
    + renderSubtasks(task)
    + `${TASK_SEPARATOR}\n\n`;
}

/**
 * Append a compact task section to raw document text. An empty (or
 * missing) document gets the title line first.
 */
export function appendTaskSection(existing: string | null, task: Task): string {
  const base = (existing ?? '').trim() || EMPTY_DOCUMENT;
  return `${base.trimEnd()}\n\n${encodeTaskSection(task)}`;
}
