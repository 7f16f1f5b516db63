/**
 * Text generation capability.
 *
 * Operations that need generated text (subtask breakdowns, complexity
 * estimates, next-action suggestions, file templates) go through a
 * TextGenerator injected with the task context. The placeholder
 * implementation returns fixed replies and is the default until a real
 * model integration is wired in.
 */

import type { TaskComplexity } from '../../types/task.js';

/** What the caller wants back; lets a generator shape its reply. */
export type GenerationKind = 'subtasks' | 'complexity' | 'next-actions' | 'file-template';

/** A single generation call. */
export interface GenerationRequest {
  kind: GenerationKind;
  prompt: string;
}

/** Capability interface for an external text generator. */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

const PLACEHOLDER_SUBTASKS = [
  'Research existing solutions',
  'Design implementation approach',
  'Write initial code',
  'Test functionality',
  'Review and refine',
];

const PLACEHOLDER_NEXT_ACTIONS = [
  'Review existing codebase',
  'Set up development environment',
  'Create initial test cases',
  'Implement core functionality',
  'Write documentation',
];

const PLACEHOLDER_TEMPLATE = [
  '// File generated from task',
  '',
  'export function main(): void {',
  '  // Implement functionality here',
  '}',
  '',
].join('\n');

/**
 * Generator that ignores the prompt and answers with fixed text.
 */
export class PlaceholderGenerator implements TextGenerator {
  async generate(request: GenerationRequest): Promise<string> {
    switch (request.kind) {
      case 'subtasks':
        return PLACEHOLDER_SUBTASKS.join('\n');
      case 'complexity':
        return 'medium';
      case 'next-actions':
        return PLACEHOLDER_NEXT_ACTIONS.join('\n');
      case 'file-template':
        return PLACEHOLDER_TEMPLATE;
    }
  }
}

const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/;
const CHECKBOX = /^\[.\]\s+/;

/**
 * Read a generated list: one item per non-blank line, with bullet,
 * numbering and checkbox markers removed.
 */
export function parseGeneratedList(reply: string): string[] {
  return reply
    .split(/\r?\n/)
    .map(line => line.trim().replace(LIST_MARKER, '').replace(CHECKBOX, '').trim())
    .filter(line => line.length > 0);
}

/**
 * Read a generated complexity estimate. The first of low/medium/high that
 * appears as a word wins; anything else falls back to medium.
 */
export function parseGeneratedComplexity(reply: string): TaskComplexity {
  const match = /\b(low|medium|high)\b/i.exec(reply);
  const word = match?.[1]?.toLowerCase();
  if (word === 'low' || word === 'medium' || word === 'high') {
    return word;
  }
  return 'medium';
}
