import { getConfig, type PlancraftConfig } from './config/index.js';
import { JsonFileDocumentStore, type DocumentStore } from './store/index.js';
import { PlanningService } from './planning/index.js';
import { ExecutionEngine, ExecutionLog } from './orchestrator/index.js';

/**
 * The planning and execution services sharing one document store.
 */
export interface PlancraftServices {
  store: DocumentStore;
  planning: PlanningService;
  engine: ExecutionEngine;
  executionLog: ExecutionLog;
}

export type ServiceLimits = Pick<
  PlancraftConfig,
  'planHistoryLimit' | 'executionLimit' | 'executionLogLimit' | 'defaultMaxSteps'
>;

export function createServices(
  store: DocumentStore,
  limits: ServiceLimits = getConfig()
): PlancraftServices {
  const executionLog = new ExecutionLog(store, limits.executionLogLimit);
  return {
    store,
    planning: new PlanningService(store, { planHistoryLimit: limits.planHistoryLimit }),
    engine: new ExecutionEngine(store, executionLog, {
      planHistoryLimit: limits.planHistoryLimit,
      executionLimit: limits.executionLimit,
      defaultMaxSteps: limits.defaultMaxSteps,
    }),
    executionLog,
  };
}

/**
 * Services over the JSON document in the configured data directory.
 */
export function createFileServices(config: PlancraftConfig = getConfig()): PlancraftServices {
  return createServices(new JsonFileDocumentStore(config.dataDir), config);
}
