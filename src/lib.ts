/**
 * Plancraft Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Errors
export {
  PlancraftError,
  NotFoundError,
  InvalidArgumentError,
  PreconditionFailedError,
  isPlancraftError,
  type PlancraftErrorCode,
} from './errors.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type PlancraftConfig } from './config/index.js';

// Storage
export * as store from './store/index.js';
export { MemoryDocumentStore, JsonFileDocumentStore, type DocumentStore } from './store/index.js';

// Planning
export * as planning from './planning/index.js';

// Execution
export * as orchestrator from './orchestrator/index.js';
export { ExecutionEngine, ExecutionLog } from './orchestrator/index.js';

// Self-correction
export * as correction from './correction/index.js';

// Service wiring
export {
  createServices,
  createFileServices,
  type PlancraftServices,
  type ServiceLimits,
} from './services.js';

// HTTP server
export * as server from './server/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
