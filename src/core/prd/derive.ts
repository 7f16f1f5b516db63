/**
 * Derive a task list skeleton from a requirements document.
 *
 * The skeleton is fixed: six phases in a fixed order. Only two of them
 * take their subtasks from the document, both from the "Key Features"
 * section, and those two are dropped when the section (or its AI items)
 * is missing. Dependencies are literal indices into the full six-task
 * skeleton and are not renumbered when a task is dropped.
 */

import { todoSubtasks, type Task } from '../../types/task.js';
import { extractBulletPoints, parseSections } from './sections.js';

/** Section whose bullets feed the feature tasks. */
export const KEY_FEATURES_SECTION = 'Key Features';

/** Key features split by the phase that will build them. */
export interface FeatureSplit {
  mvp: string[];
  ai: string[];
}

/**
 * Split feature bullets into MVP and AI groups.
 * A bullet may land in both groups (e.g. "Summarize entries") or neither
 * (e.g. "AI sync to the cloud" is AI, never MVP).
 */
export function splitFeatures(features: readonly string[]): FeatureSplit {
  const mvp = features.filter(f => !f.includes('AI') && !f.toLowerCase().includes('cloud'));
  const ai = features.filter(f => {
    const lower = f.toLowerCase();
    return f.includes('AI') || lower.includes('summarize') || lower.includes('pattern');
  });
  return { mvp, ai };
}

function projectSetup(): Task {
  return {
    title: 'Project Setup',
    description: 'Set up the Next.js project with TypeScript and Tailwind CSS',
    status: 'todo',
    category: '[INFRA]',
    priority: 'P0',
    complexity: 'low',
    estimatedHours: 4,
    dependencies: [],
    subtasks: todoSubtasks([
      'Initialize Next.js project',
      'Configure TypeScript',
      'Set up Tailwind CSS',
      'Configure development environment',
      'Set up testing framework',
    ]),
  };
}

function coreFeatures(features: readonly string[]): Task {
  return {
    title: 'Implement Core Features',
    description: 'Implement the core MVP features of the journaling app',
    status: 'todo',
    category: '[MVP]',
    priority: 'P0',
    complexity: 'medium',
    estimatedHours: 8,
    dependencies: [1],
    subtasks: todoSubtasks(features),
  };
}

function authAndStorage(): Task {
  return {
    title: 'Authentication & Local Storage',
    description: 'Implement user authentication and local storage features',
    status: 'todo',
    category: '[MVP]',
    priority: 'P1',
    complexity: 'medium',
    estimatedHours: 8,
    dependencies: [1],
    subtasks: todoSubtasks([
      'Implement email authentication',
      'Set up local storage with IndexedDB',
      'Add user session management',
      'Implement data persistence',
    ]),
  };
}

function aiFeatures(features: readonly string[]): Task {
  return {
    title: 'Implement AI Features',
    description: 'Add AI-powered features for insights and analysis',
    status: 'todo',
    category: '[AI]',
    priority: 'P2',
    complexity: 'high',
    estimatedHours: 16,
    dependencies: [2, 3],
    subtasks: todoSubtasks(features),
  };
}

function uiUx(): Task {
  return {
    title: 'Enhance UI/UX',
    description: 'Implement UI/UX improvements and polish',
    status: 'todo',
    category: '[UX]',
    priority: 'P2',
    complexity: 'medium',
    estimatedHours: 8,
    dependencies: [2],
    subtasks: todoSubtasks([
      'Implement dark/light mode',
      'Add responsive design',
      'Create minimalist editor',
      'Add keyboard shortcuts',
    ]),
  };
}

function cloudFeatures(): Task {
  return {
    title: 'Implement Cloud Features',
    description: 'Add cloud sync and advanced storage features',
    status: 'todo',
    category: '[INFRA]',
    priority: 'P3',
    complexity: 'high',
    estimatedHours: 16,
    dependencies: [2, 3],
    subtasks: todoSubtasks([
      'Set up cloud sync',
      'Implement end-to-end encryption',
      'Add offline support',
      'Create backup/restore functionality',
    ]),
  };
}

/**
 * Build the derived task list for a requirements document.
 */
export function deriveTasksFromPrd(prdContent: string): Task[] {
  const sections = parseSections(prdContent);
  const keyFeatures = sections.get(KEY_FEATURES_SECTION);
  const split = keyFeatures === undefined
    ? null
    : splitFeatures(extractBulletPoints(keyFeatures));

  const tasks: Task[] = [projectSetup()];
  if (split) {
    tasks.push(coreFeatures(split.mvp));
  }
  tasks.push(authAndStorage());
  if (split && split.ai.length > 0) {
    tasks.push(aiFeatures(split.ai));
  }
  tasks.push(uiUx(), cloudFeatures());
  return tasks;
}
