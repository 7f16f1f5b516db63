/**
 * Dispatch layer shared types.
 *
 * Defines the request/response shapes used by both CLI and MCP adapters.
 * Every operation flows through:
 *   DispatchRequest → Middleware → DomainHandler → DispatchResponse
 */

// ---------------------------------------------------------------------------
// Gateway & Source
// ---------------------------------------------------------------------------

/** Read-only queries vs document-modifying mutations. */
export type Gateway = 'query' | 'mutate';

/** Where the request originated. */
export type Source = 'cli' | 'mcp';

// ---------------------------------------------------------------------------
// ParamDef: per-operation parameter descriptor
// ---------------------------------------------------------------------------

/** Runtime value type of a parameter. */
export type ParamType = 'string' | 'number' | 'boolean' | 'array';

/** How a parameter appears on the command line. MCP-only params have no `cli`. */
export interface ParamCliDef {
  /** Positional argument instead of an option. */
  positional?: boolean;
  /** Short alias for an option, e.g. `-s`. */
  short?: string;
  /** Long option name when it differs from the kebab-cased param name. */
  flag?: string;
  /** Array option taking several values (`--subtask a b`); otherwise comma-separated. */
  variadic?: boolean;
  /** The argument is a file path; the param value is the file's text. */
  readFile?: boolean;
}

/** How a parameter appears in the MCP tool input schema. */
export interface ParamMcpDef {
  /** Left out of the tool's input schema. */
  hidden?: boolean;
  /** Allowed values, emitted as a JSON Schema `enum` and enforced by zod. */
  enum?: readonly string[];
}

/**
 * One parameter of an operation. The same definition drives the Commander
 * arguments, the MCP input schema and the dispatcher's zod validation.
 */
export interface ParamDef {
  /** camelCase key in `params`. */
  name: string;
  type: ParamType;
  /** Required positional (`<name>`) on the CLI, `required[]` in MCP. */
  required: boolean;
  /** A required string that may be `''`. Without this, `''` counts as missing. */
  allowEmpty?: boolean;
  description: string;
  cli?: ParamCliDef;
  mcp?: ParamMcpDef;
}

/** The single domain this tool serves. */
export const TASKS_DOMAIN = 'tasks';

// ---------------------------------------------------------------------------
// DispatchRequest
// ---------------------------------------------------------------------------

/**
 * Request shape that both CLI and MCP adapters produce.
 *
 * The dispatcher resolves it against the operation registry before passing
 * it through the middleware pipeline and into a DomainHandler.
 */
export interface DispatchRequest {
  gateway: Gateway;
  /** Target domain. */
  domain: string;
  /** Domain-specific operation name. */
  operation: string;
  params?: Record<string, unknown>;
  source: Source;
  /** Unique request identifier for tracing. */
  requestId: string;
}

// ---------------------------------------------------------------------------
// DispatchResponse
// ---------------------------------------------------------------------------

/** Structured error shape. */
export interface DispatchError {
  /** Machine-readable error code (E_NOT_FOUND, E_INVALID_INPUT, …). */
  code: string;
  /** Process exit code matching `code`. */
  exitCode?: number;
  message: string;
  details?: Record<string, unknown>;
  /** Suggested next step for the caller. */
  fix?: string;
}

/**
 * Response returned by the dispatcher.
 *
 * Adapters translate this into their wire format:
 * - CLI adapter → stdout/stderr text + exit code
 * - MCP adapter → a single text content item
 */
export interface DispatchResponse {
  _meta: {
    gateway: Gateway;
    domain: string;
    operation: string;
    timestamp: string;
    duration_ms: number;
    source: Source;
    requestId: string;
  };
  success: boolean;
  data?: unknown;
  error?: DispatchError;
}

// ---------------------------------------------------------------------------
// DomainHandler
// ---------------------------------------------------------------------------

/**
 * Contract for domain handlers.
 */
export interface DomainHandler {
  /** Execute a read-only query operation. */
  query(operation: string, params?: Record<string, unknown>, source?: Source): Promise<DispatchResponse>;

  /** Execute a document-modifying mutation operation. */
  mutate(operation: string, params?: Record<string, unknown>, source?: Source): Promise<DispatchResponse>;

  /** Declared operations for introspection and validation. */
  getSupportedOperations(): { query: string[]; mutate: string[] };
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/** Async function that produces a DispatchResponse. */
export type DispatchNext = () => Promise<DispatchResponse>;

/**
 * Middleware function signature.
 *
 * Receives the request and a `next` continuation. Can short-circuit by
 * returning early or wrap the response on the way back.
 */
export type Middleware = (
  request: DispatchRequest,
  next: DispatchNext,
) => Promise<DispatchResponse>;
