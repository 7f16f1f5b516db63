/**
 * taskdown - markdown task files for projects.
 *
 * Library entry point. The CLI and the MCP server are built from the same
 * pieces exported here.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type { Task, Subtask, TaskStatus, TaskCategory, TaskPriority, TaskComplexity } from './types/task.js';
export { TASK_STATUSES, COMPLEXITY_HOURS } from './types/task.js';
export type { TaskdownConfig, LoggingConfig } from './types/config.js';

// Core
export { TaskdownError } from './core/errors.js';
export { loadConfig, getConfigValue } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Document codec
export { decodeTasks, encodeTasks, encodeTaskSection, appendTaskSection } from './core/document/codec.js';

// PRD derivation
export { deriveTasksFromPrd, splitFeatures } from './core/prd/derive.js';
export { parseSections, extractBulletPoints } from './core/prd/sections.js';

// Text generation
export {
  PlaceholderGenerator,
  type TextGenerator,
  type GenerationRequest,
  type GenerationKind,
} from './core/assist/generator.js';

// Store
export { TaskStore, type TaskStoreOptions } from './store/task-store.js';

// Task operations
export * from './core/tasks/index.js';

// Adapters
export { createMcpServer, startMcpServer } from './mcp/index.js';
export { createProgram, runCli } from './cli/index.js';
