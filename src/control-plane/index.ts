// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  gray,
  magenta,
  formatStatus,
  formatDate,
  formatRelativeTime,
  truncate,
  padRight,
  padLeft,
  formatPlanDetail,
  formatPlanList,
  formatExecutionDetail,
  formatExecutionList,
  formatLogList,
  formatTable,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

// Validators
export { formatZodErrors, type ValidationError } from './validators.js';

// CLI
export { createProgram, runCli } from './cli.js';
export { defaultServiceProvider, type ServiceProvider } from './context.js';
