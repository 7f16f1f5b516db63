import { describe, it, expect } from 'vitest';
import {
  OPERATIONS,
  resolve,
  resolveCommand,
  resolveTool,
  validateRequiredParams,
} from '../registry.js';

describe('Operation Registry', () => {
  it('registers ten operations split across both gateways', () => {
    expect(OPERATIONS).toHaveLength(10);
    expect(OPERATIONS.filter(op => op.gateway === 'query')).toHaveLength(4);
    expect(OPERATIONS.filter(op => op.gateway === 'mutate')).toHaveLength(6);
  });

  it('gives every operation a unique tool and command name', () => {
    const tools = new Set(OPERATIONS.map(op => op.tool));
    const commands = new Set(OPERATIONS.map(op => op.command));
    expect(tools.size).toBe(OPERATIONS.length);
    expect(commands.size).toBe(OPERATIONS.length);
  });

  it('lists query operations', () => {
    expect(OPERATIONS.filter(op => op.gateway === 'query').map(op => op.tool)).toEqual([
      'get_next_task',
      'get_task_dependencies',
      'estimate_task_complexity',
      'suggest_next_actions',
    ]);
  });

  it('resolves by gateway, domain and operation', () => {
    const result = resolve('mutate', 'tasks', 'status.update');
    expect(result?.def.tool).toBe('update_task_status');
    expect(resolve('query', 'tasks', 'status.update')).toBeUndefined();
    expect(resolve('mutate', 'other', 'add')).toBeUndefined();
  });

  it('resolves by tool and command name', () => {
    expect(resolveTool('parse_prd')?.operation).toBe('prd.parse');
    expect(resolveCommand('scaffold')?.tool).toBe('generate_task_file');
    expect(resolveTool('nope')).toBeUndefined();
  });

  it('reports missing, null and empty required params', () => {
    const add = resolveTool('add_task');
    expect(add).toBeDefined();
    if (!add) return;

    expect(validateRequiredParams(add, undefined)).toEqual(['projectName', 'title', 'description']);
    expect(validateRequiredParams(add, { projectName: '', title: null, description: null })).toEqual([
      'projectName',
      'title',
      'description',
    ]);
    expect(validateRequiredParams(add, { projectName: 'p', title: 't', description: 'd' })).toEqual([]);
  });

  it('accepts an empty description but not an empty title', () => {
    const add = resolveTool('add_task');
    expect(add).toBeDefined();
    if (!add) return;

    expect(validateRequiredParams(add, { projectName: 'p', title: 'T1', description: '' })).toEqual([]);
    expect(validateRequiredParams(add, { projectName: 'p', title: '', description: '' })).toEqual(['title']);
  });

  it('leaves status optional on update_task_status', () => {
    const update = resolveTool('update_task_status');
    expect(update).toBeDefined();
    if (!update) return;

    expect(validateRequiredParams(update, { projectName: 'p', taskTitle: 'T1' })).toEqual([]);
  });
});
