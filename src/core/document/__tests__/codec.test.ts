/**
 * Tests for the Markdown task document codec.
 */

import { describe, it, expect } from 'vitest';
import {
  appendTaskSection,
  decodeTasks,
  encodeTaskSection,
  encodeTasks,
} from '../codec.js';
import type { Task } from '../../../types/task.js';

const PREAMBLE =
  '# Project Tasks\n\n'
  + '## Categories\n'
  + '- [MVP] Core functionality tasks\n'
  + '- [AI] AI-related features\n'
  + '- [UX] User experience improvements\n'
  + '- [INFRA] Infrastructure and setup\n\n'
  + '## Priority Levels\n'
  + '- P0: Blocker/Critical\n'
  + '- P1: High Priority\n'
  + '- P2: Medium Priority\n'
  + '- P3: Low Priority\n\n';

function task(title: string, overrides: Partial<Task> = {}): Task {
  return { title, description: '', status: 'todo', subtasks: [], ...overrides };
}

describe('decodeTasks', () => {
  it('reads plain headers, descriptions and checklist items', () => {
    const text = [
      '# Project Tasks',
      '',
      'stray line before any task',
      '## Task: Write docs',
      'Explain setup',
      '- [x] Draft',
      '- [ ] Review',
      '- not a checklist item',
      '',
      '## Task: Ship',
    ].join('\n');

    expect(decodeTasks(text)).toEqual([
      {
        title: 'Write docs',
        description: 'Explain setup\n',
        status: 'todo',
        subtasks: [
          { title: 'Draft', status: 'done' },
          { title: 'Review', status: 'todo' },
        ],
      },
      { title: 'Ship', description: '', status: 'todo', subtasks: [] },
    ]);
  });

  it('treats any status character other than x as todo', () => {
    const [decoded] = decodeTasks('## Task: A\n- [~] Maybe\n- [X] Upper');
    expect(decoded?.subtasks).toEqual([
      { title: 'Maybe', status: 'todo' },
      { title: 'Upper', status: 'todo' },
    ]);
  });

  it('ignores checklist items before the first task', () => {
    expect(decodeTasks('- [x] orphan\n\n')).toEqual([]);
  });

  it('returns an empty list for empty input', () => {
    expect(decodeTasks('')).toEqual([]);
  });

  it('reads numbered headers with category and priority', () => {
    const [decoded] = decodeTasks('## Task 2: [AI] Smart search (P1)\n');
    expect(decoded).toEqual({
      title: 'Smart search',
      description: '',
      status: 'todo',
      subtasks: [],
      category: '[AI]',
      priority: 'P1',
    });
  });

  it('keeps unknown tags as part of the title', () => {
    const [decoded] = decodeTasks('## Task 1: [FOO] Thing (P9)\n');
    expect(decoded?.title).toBe('[FOO] Thing (P9)');
    expect(decoded?.category).toBeUndefined();
    expect(decoded?.priority).toBeUndefined();
  });

  it('reads a numbered header without category', () => {
    const [decoded] = decodeTasks('## Task 1:  Plain (P2)\n');
    expect(decoded?.title).toBe('Plain');
    expect(decoded?.category).toBeUndefined();
    expect(decoded?.priority).toBe('P2');
  });

  it('reads structural lines into metadata instead of the description', () => {
    const text = [
      '## Task 3: [MVP] Auth (P1)',
      '',
      '### Status: done',
      '',
      'Login flow',
      '',
      '### Dependencies:',
      '- Task 1',
      '- Task 2',
      '',
      '### Complexity: medium',
      'Estimated hours: 8',
      '',
      '### Subtasks:',
      '',
      '- [ ] Email login',
      '',
      '---',
    ].join('\n');

    expect(decodeTasks(text)).toEqual([
      {
        title: 'Auth',
        description: 'Login flow\n',
        status: 'done',
        subtasks: [{ title: 'Email login', status: 'todo' }],
        category: '[MVP]',
        priority: 'P1',
        dependencies: [1, 2],
        complexity: 'medium',
        estimatedHours: 8,
      },
    ]);
  });

  it('keeps status and hours lines that sit inside the description', () => {
    const text = [
      '## Task: T',
      '',
      'Budget',
      'Estimated hours: 3',
      '### Status: done',
      '',
      '---',
    ].join('\n');

    const [decoded] = decodeTasks(text);
    expect(decoded?.description).toBe('Budget\nEstimated hours: 3\n### Status: done\n');
    expect(decoded?.status).toBe('todo');
    expect(decoded?.estimatedHours).toBeUndefined();
  });

  it('does not read "- Task n" lines outside a dependencies section', () => {
    const [decoded] = decodeTasks('## Task: A\n- Task 4\n');
    expect(decoded?.dependencies).toBeUndefined();
  });
});

describe('encodeTasks', () => {
  it('writes only the preamble for an empty list', () => {
    expect(encodeTasks([])).toBe(PREAMBLE);
  });

  it('writes a numbered section with every metadata block', () => {
    const text = encodeTasks([
      task('Project Setup', {
        description: '  Set up the repo  \n',
        category: '[INFRA]',
        priority: 'P0',
        complexity: 'low',
        estimatedHours: 4,
        dependencies: [],
        subtasks: [
          { title: 'a', status: 'todo' },
          { title: 'b', status: 'done' },
        ],
      }),
    ]);

    expect(text).toBe(
      PREAMBLE
      + '## Task 1: [INFRA] Project Setup (P0)\n\n'
      + 'Set up the repo\n\n'
      + '### Complexity: low\n'
      + 'Estimated hours: 4\n\n'
      + '### Subtasks:\n\n'
      + '- [ ] a\n'
      + '- [x] b\n\n'
      + '---\n\n',
    );
  });

  it('defaults priority to P2 and category to empty', () => {
    const text = encodeTasks([task('Plain')]);
    expect(text).toBe(PREAMBLE + '## Task 1:  Plain (P2)\n\n---\n\n');
  });

  it('writes dependencies and a done status', () => {
    const text = encodeTasks([task('A'), task('B', { status: 'done', dependencies: [1] })]);
    expect(text.endsWith(
      '## Task 2:  B (P2)\n\n'
      + '### Status: done\n\n'
      + '### Dependencies:\n'
      + '- Task 1\n\n'
      + '---\n\n',
    )).toBe(true);
  });

  it('derives hours from complexity when none are set', () => {
    const text = encodeTasks([task('Big', { complexity: 'high' })]);
    expect(text).toContain('### Complexity: high\nEstimated hours: 16\n\n');
  });

  it('survives a decode/encode cycle unchanged', () => {
    const tasks: Task[] = [
      task('Project Setup', {
        description: 'Set up tooling\nPin versions',
        category: '[INFRA]',
        priority: 'P0',
        complexity: 'low',
        estimatedHours: 4,
        subtasks: [{ title: 'Init', status: 'done' }],
      }),
      task('Core', {
        description: 'Build it',
        status: 'done',
        dependencies: [1],
        subtasks: [
          { title: 'One', status: 'todo' },
          { title: 'Two', status: 'done' },
        ],
      }),
      task('Loose ends'),
    ];

    const once = encodeTasks(tasks);
    const decoded = decodeTasks(once);

    expect(encodeTasks(decoded)).toBe(once);
    expect(decoded.map(t => t.title)).toEqual(['Project Setup', 'Core', 'Loose ends']);
    expect(decoded.map(t => t.status)).toEqual(['todo', 'done', 'todo']);
    expect(decoded[0]?.description).toBe('Set up tooling\nPin versions\n');
    expect(decoded[1]?.subtasks).toEqual([
      { title: 'One', status: 'todo' },
      { title: 'Two', status: 'done' },
    ]);
  });

  it('round-trips a description that looks like metadata', () => {
    const [decoded] = decodeTasks(encodeTasks([
      task('T', { description: 'Budget\nEstimated hours: 3\n### Status: done\n' }),
    ]));
    expect(decoded?.description).toBe('Budget\nEstimated hours: 3\n### Status: done\n');
    expect(decoded?.status).toBe('todo');
    expect(decoded?.estimatedHours).toBeUndefined();
  });

  it('writes the done status above the description', () => {
    const text = encodeTasks([task('T', { status: 'done', description: 'Ship it' })]);
    expect(text).toBe(PREAMBLE + '## Task 1:  T (P2)\n\n### Status: done\n\nShip it\n\n---\n\n');
    expect(decodeTasks(text)[0]?.status).toBe('done');
  });
});

describe('encodeTaskSection', () => {
  it('renders the compact header form', () => {
    const section = encodeTaskSection(task('T1', {
      description: 'desc',
      subtasks: [{ title: 's1', status: 'todo' }],
    }));
    expect(section).toBe('\n## Task: T1\n\ndesc\n\n### Subtasks:\n\n- [ ] s1\n\n---\n\n');
  });

  it('omits empty description and subtasks', () => {
    expect(encodeTaskSection(task('Bare'))).toBe('\n## Task: Bare\n\n---\n\n');
  });
});

describe('appendTaskSection', () => {
  it('starts an empty document with the title line', () => {
    expect(appendTaskSection(null, task('T1'))).toBe('# Project Tasks\n\n\n## Task: T1\n\n---\n\n');
    expect(appendTaskSection('  \n', task('T1'))).toBe('# Project Tasks\n\n\n## Task: T1\n\n---\n\n');
  });

  it('appends after existing content', () => {
    const existing = '# Project Tasks\n\n\n## Task: A\n\n---\n\n';
    expect(appendTaskSection(existing, task('B'))).toBe(
      '# Project Tasks\n\n\n## Task: A\n\n---\n\n\n## Task: B\n\n---\n\n',
    );
  });

  it('produces text decodeTasks reads back', () => {
    const text = appendTaskSection(null, task('T1', {
      description: 'desc',
      subtasks: [
        { title: 's1', status: 'todo' },
        { title: 's2', status: 'todo' },
      ],
    }));
    expect(decodeTasks(text)).toEqual([
      {
        title: 'T1',
        description: 'desc\n',
        status: 'todo',
        subtasks: [
          { title: 's1', status: 'todo' },
          { title: 's2', status: 'todo' },
        ],
      },
    ]);
  });
});
