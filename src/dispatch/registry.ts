/**
 * Operation registry.
 *
 * One entry per operation. Each entry names the MCP tool and CLI command
 * that expose it and the `ParamDef[]` both surfaces are generated from.
 */

import { TASK_STATUSES } from '../types/task.js';
import { TASKS_DOMAIN, type Gateway, type ParamDef } from './types.js';

export interface OperationDef {
  gateway: Gateway;
  domain: string;
  operation: string;
  /** MCP tool name. */
  tool: string;
  /** CLI command name. */
  command: string;
  description: string;
  /** Prefix for failure messages, e.g. "Error adding task". */
  errorLabel: string;
  params: ParamDef[];
}

const projectName: ParamDef = {
  name: 'projectName',
  type: 'string',
  required: true,
  description: 'Name of the project',
  cli: { positional: true },
};

const taskTitle: ParamDef = {
  name: 'taskTitle',
  type: 'string',
  required: true,
  description: 'Title of the task',
  cli: { positional: true },
};

export const OPERATIONS: readonly OperationDef[] = [
  {
    gateway: 'mutate',
    domain: TASKS_DOMAIN,
    operation: 'file.create',
    tool: 'create_task_file',
    command: 'init',
    description: "Create a new markdown task file for a project",
    errorLabel: 'Error creating task file',
    params: [projectName],
  },
  {
    gateway: 'mutate',
    domain: TASKS_DOMAIN,
    operation: 'add',
    tool: 'add_task',
    command: 'add',
    description: "Add a new task to a project's task file",
    errorLabel: 'Error adding task',
    params: [
      projectName,
      { name: 'title', type: 'string', required: true, description: 'Task title', cli: { positional: true } },
      {
        name: 'description',
        type: 'string',
        required: true,
        allowEmpty: true,
        description: 'Task description',
        cli: { positional: true },
      },
      {
        name: 'subtasks',
        type: 'array',
        required: false,
        description: 'Subtask titles',
        cli: { flag: 'subtask', short: '-s', variadic: true },
      },
      {
        name: 'batchMode',
        type: 'boolean',
        required: false,
        description: 'Create the task file if it does not exist (for bulk additions)',
        cli: { flag: 'batch' },
      },
    ],
  },
  {
    gateway: 'mutate',
    domain: TASKS_DOMAIN,
    operation: 'prd.parse',
    tool: 'parse_prd',
    command: 'plan',
    description: "Parse a PRD and replace the project's tasks with the derived plan",
    errorLabel: 'Error parsing PRD',
    params: [
      projectName,
      {
        name: 'prdContent',
        type: 'string',
        required: true,
        description: 'PRD text (a file path on the command line)',
        cli: { positional: true, readFile: true },
      },
    ],
  },
  {
    gateway: 'mutate',
    domain: TASKS_DOMAIN,
    operation: 'status.update',
    tool: 'update_task_status',
    command: 'status',
    description: 'Update the status of a task or subtask',
    errorLabel: 'Error updating status',
    params: [
      projectName,
      taskTitle,
      {
        name: 'status',
        type: 'string',
        required: false,
        description: 'New status (todo/done, default done)',
        cli: { positional: true },
        mcp: { enum: TASK_STATUSES },
      },
      {
        name: 'subtaskTitle',
        type: 'string',
        required: false,
        description: 'Update this subtask instead of the task',
        cli: { flag: 'subtask', short: '-s' },
      },
    ],
  },
  {
    gateway: 'query',
    domain: TASKS_DOMAIN,
    operation: 'next',
    tool: 'get_next_task',
    command: 'next',
    description: 'Get the next actionable subtask',
    errorLabel: 'Error getting next task',
    params: [projectName],
  },
  {
    gateway: 'query',
    domain: TASKS_DOMAIN,
    operation: 'dependents',
    tool: 'get_task_dependencies',
    command: 'dependents',
    description: "List tasks whose description mentions a task's title",
    errorLabel: 'Error getting dependencies',
    params: [projectName, taskTitle],
  },
  {
    gateway: 'mutate',
    domain: TASKS_DOMAIN,
    operation: 'expand',
    tool: 'expand_task',
    command: 'expand',
    description: 'Break a task down into generated subtasks',
    errorLabel: 'Error expanding task',
    params: [projectName, taskTitle],
  },
  {
    gateway: 'query',
    domain: TASKS_DOMAIN,
    operation: 'complexity.estimate',
    tool: 'estimate_task_complexity',
    command: 'estimate',
    description: 'Estimate the complexity of a task',
    errorLabel: 'Error estimating complexity',
    params: [projectName, taskTitle],
  },
  {
    gateway: 'query',
    domain: TASKS_DOMAIN,
    operation: 'suggest',
    tool: 'suggest_next_actions',
    command: 'suggest',
    description: 'Suggest next actions for a task',
    errorLabel: 'Error suggesting actions',
    params: [projectName, taskTitle],
  },
  {
    gateway: 'mutate',
    domain: TASKS_DOMAIN,
    operation: 'file.generate',
    tool: 'generate_task_file',
    command: 'scaffold',
    description: "Generate an implementation file template from a task's description",
    errorLabel: 'Error generating file',
    params: [projectName, taskTitle],
  },
];

export interface ResolvedOperation {
  domain: string;
  operation: string;
  def: OperationDef;
}

/**
 * Look up an operation by gateway, domain and name.
 */
export function resolve(gateway: Gateway, domain: string, operation: string): ResolvedOperation | undefined {
  const def = OPERATIONS.find(
    op => op.gateway === gateway && op.domain === domain && op.operation === operation,
  );
  return def ? { domain: def.domain, operation: def.operation, def } : undefined;
}

/** Look up an operation by its MCP tool name. */
export function resolveTool(tool: string): OperationDef | undefined {
  return OPERATIONS.find(op => op.tool === tool);
}

/** Look up an operation by its CLI command name. */
export function resolveCommand(command: string): OperationDef | undefined {
  return OPERATIONS.find(op => op.command === command);
}

/**
 * Names of required params that are missing or null. An empty string is
 * missing too unless the param sets `allowEmpty`.
 */
export function validateRequiredParams(def: OperationDef, params?: Record<string, unknown>): string[] {
  const provided = params ?? {};
  return def.params
    .filter(p => p.required)
    .filter(p => {
      const value = provided[p.name];
      return value === undefined || value === null || (value === '' && !p.allowEmpty);
    })
    .map(p => p.name);
}
