/**
 * Param derivation utilities for the dispatch layer.
 *
 * Converts `OperationDef.params` into the shapes required by:
 *  - Commander.js (CLI adapter): positionals + option strings
 *  - MCP JSON Schema (MCP adapter): tool inputSchema object
 *  - zod (dispatcher): runtime validation of incoming params
 */

import { z } from 'zod';
import type { OperationDef } from '../registry.js';
import type { ParamDef } from '../types.js';

// ---------------------------------------------------------------------------
// JSON Schema subset for MCP inputSchema
// ---------------------------------------------------------------------------

export type JsonSchemaType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface JsonSchemaProperty {
  type: JsonSchemaType;
  description: string;
  enum?: string[];
  items?: { type: JsonSchemaType };
}

export interface JSONSchemaObject {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

// ---------------------------------------------------------------------------
// 1. buildMcpInputSchema
// ---------------------------------------------------------------------------

/**
 * Build a JSON Schema `inputSchema` object from an `OperationDef`.
 *
 * Params with `mcp.hidden` are skipped; `required: true` params are listed
 * in `required[]`.
 */
export function buildMcpInputSchema(def: OperationDef): JSONSchemaObject {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const param of def.params) {
    if (param.mcp?.hidden === true) continue;

    const prop: JsonSchemaProperty = {
      type: paramTypeToJsonSchema(param.type),
      description: param.description,
    };

    if (param.type === 'array') {
      prop.items = { type: 'string' };
    }

    if (param.mcp?.enum) {
      prop.enum = [...param.mcp.enum];
    }

    properties[param.name] = prop;

    if (param.required) {
      required.push(param.name);
    }
  }

  return { type: 'object', properties, required };
}

function paramTypeToJsonSchema(t: ParamDef['type']): JsonSchemaType {
  switch (t) {
    case 'string':  return 'string';
    case 'number':  return 'number';
    case 'boolean': return 'boolean';
    case 'array':   return 'array';
  }
}

// ---------------------------------------------------------------------------
// 2. buildParamSchema
// ---------------------------------------------------------------------------

function paramToZod(param: ParamDef): z.ZodTypeAny {
  let schema: z.ZodTypeAny;
  switch (param.type) {
    case 'string': {
      const allowed = param.mcp?.enum;
      schema = allowed
        ? z.string().refine(v => allowed.includes(v), { message: `Expected one of: ${allowed.join(', ')}` })
        : z.string();
      break;
    }
    case 'number':
      schema = z.number();
      break;
    case 'boolean':
      schema = z.boolean();
      break;
    case 'array':
      schema = z.array(z.string());
      break;
  }
  return param.required ? schema : schema.optional();
}

/**
 * zod object schema for an operation's params. Unknown keys are stripped.
 */
export function buildParamSchema(def: OperationDef): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of def.params) {
    shape[param.name] = paramToZod(param);
  }
  return z.object(shape);
}

// ---------------------------------------------------------------------------
// 3. buildCommanderArgs
// ---------------------------------------------------------------------------

export interface CommanderArgSplit {
  /** Params that map to `.argument('<name>')` or `.argument('[name]')`. */
  positionals: ParamDef[];
  /** Params that map to `.option(...)` calls. */
  options: ParamDef[];
}

/**
 * Split `OperationDef.params` into positional arguments and option flags.
 * Params with no `cli` key are MCP-only and excluded from both.
 */
export function buildCommanderArgs(def: OperationDef): CommanderArgSplit {
  const positionals: ParamDef[] = [];
  const options: ParamDef[] = [];

  for (const param of def.params) {
    if (param.cli === undefined) continue;

    if (param.cli.positional === true) {
      positionals.push(param);
    } else {
      options.push(param);
    }
  }

  return { positionals, options };
}

// ---------------------------------------------------------------------------
// 4. buildCommanderOptionString
// ---------------------------------------------------------------------------

/**
 * Build the Commander option string for a single non-positional ParamDef.
 *
 * Examples:
 *   { name:'subtaskTitle', type:'string', cli:{short:'-s', flag:'subtask'} }
 *     → '-s, --subtask <subtask>'
 *   { name:'batchMode', type:'boolean', cli:{flag:'batch'} }
 *     → '--batch'
 *   { name:'subtasks', type:'array', cli:{flag:'subtask', variadic:true} }
 *     → '--subtask <subtask...>'
 */
export function buildCommanderOptionString(param: ParamDef): string {
  const flagName = param.cli?.flag ?? camelToKebab(param.name);
  const short = param.cli?.short;

  if (param.type === 'boolean') {
    return short ? `${short}, --${flagName}` : `--${flagName}`;
  }

  const placeholder = param.type === 'array' && param.cli?.variadic
    ? `<${flagName}...>`
    : `<${flagName}>`;
  return short
    ? `${short}, --${flagName} ${placeholder}`
    : `--${flagName} ${placeholder}`;
}

/**
 * Convert a camelCase string to kebab-case.
 * e.g. 'subtaskTitle' → 'subtask-title'
 */
export function camelToKebab(s: string): string {
  return s.replace(/([A-Z])/g, '-$1').toLowerCase();
}

/**
 * Property name Commander uses for an option's value
 * (the camelCase form of its long flag).
 */
export function commanderOptionKey(param: ParamDef): string {
  const flagName = param.cli?.flag ?? camelToKebab(param.name);
  return flagName.replace(/-([a-z])/g, (_m, c: string) => c.toUpperCase());
}
