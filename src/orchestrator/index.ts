export {
  ExecutionEngine,
  COMPLETED_RESULT_SUMMARY,
  MAX_RUN_STEPS,
  MIN_RUN_STEPS,
  MAX_EXECUTION_PAGE,
  type ExecutionEngineOptions,
} from './execution-engine.js';
export {
  ExecutionLog,
  isLogEntry,
  DEFAULT_LOG_PAGE,
  MAX_LOG_PAGE,
  type LogEntryInput,
  type ExecutionRecordInput,
  type LogQueryOptions,
} from './execution-log.js';
export {
  applyTaskAction,
  dependenciesCompleted,
  deriveExecutionState,
  getProgressDescription,
  isTaskAction,
  isTerminalState,
  normalizeExecution,
} from './state-machine.js';
