import type {
  Execution,
  ExecutionLogItem,
  ExecutionState,
  Plan,
  TaskStatus,
} from '../types/index.js';
import { getProgressDescription, isLogEntry } from '../orchestrator/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function gray(text: string): string {
  return colorize(text, 'gray');
}

export function magenta(text: string): string {
  return colorize(text, 'magenta');
}

/**
 * Format an execution state or task status with appropriate color.
 */
export function formatStatus(status: ExecutionState | TaskStatus): string {
  const statusColors: Record<ExecutionState | TaskStatus, keyof typeof colors> = {
    pending: 'yellow',
    ready: 'cyan',
    running: 'blue',
    completed: 'green',
    failed: 'red',
    skipped: 'gray',
    cancelled: 'gray',
  };

  return colorize(status.toUpperCase(), statusColors[status]);
}

/**
 * Format an ISO timestamp for display.
 */
export function formatDate(iso: string): string {
  return new Date(iso).toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(iso: string, now: number = Date.now()): string {
  const diff = now - new Date(iso).getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Pad a string to a specific width.
 */
export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

function formatToolset(toolset: Record<string, boolean>): string {
  const enabled = Object.entries(toolset)
    .filter(([, on]) => on)
    .map(([name]) => name);
  return enabled.length > 0 ? enabled.join(', ') : 'none';
}

/**
 * Format a plan for detailed display.
 */
export function formatPlanDetail(plan: Plan): string {
  const lines: string[] = [];

  lines.push(bold('Plan Details'));
  lines.push('');
  lines.push(`${bold('ID:')}           ${plan.planId}`);
  lines.push(`${bold('Category:')}     ${plan.category}`);
  lines.push(`${bold('Scene:')}        ${plan.scene}`);
  lines.push(`${bold('Workflow:')}     ${plan.workflowChain.name} (${plan.workflowMode})`);
  lines.push(`${bold('Created:')}      ${formatDate(plan.createdAt)}`);

  lines.push('');
  lines.push(bold('Question:'));
  lines.push(`  ${plan.question}`);

  lines.push('');
  lines.push(bold('Tasks:'));
  for (const task of plan.tasks) {
    const deps = task.dependsOn.length > 0 ? dim(` after ${task.dependsOn.join(', ')}`) : '';
    lines.push(`  ${cyan(task.taskId)}  ${task.title}${deps}`);
    lines.push(`    ${dim('Agent:')} ${task.assignedAgent}  ${dim('Tools:')} ${formatToolset(task.toolset)}`);
  }

  lines.push('');
  lines.push(bold('Rationale:'));
  for (const line of plan.rationale) {
    lines.push(`  ${dim('-')} ${line}`);
  }

  return lines.join('\n');
}

/**
 * Format an execution for detailed display.
 */
export function formatExecutionDetail(execution: Execution): string {
  const lines: string[] = [];

  lines.push(bold('Execution Details'));
  lines.push('');
  lines.push(`${bold('ID:')}           ${execution.executionId}`);
  lines.push(`${bold('Plan:')}         ${execution.planId}`);
  lines.push(`${bold('State:')}        ${formatStatus(execution.state)}`);
  lines.push(`${bold('Progress:')}     ${getProgressDescription(execution)}`);
  lines.push(`${bold('Created:')}      ${formatDate(execution.createdAt)}`);

  if (execution.finishedAt) {
    lines.push(`${bold('Finished:')}     ${formatDate(execution.finishedAt)}`);
  }

  lines.push('');
  lines.push(bold('Question:'));
  lines.push(`  ${execution.question}`);

  lines.push('');
  lines.push(bold('Tasks:'));
  for (const task of execution.tasks) {
    lines.push(`  ${cyan(task.taskId)}  ${formatStatus(task.status)}  ${task.title}`);
    if (task.outputSummary) {
      lines.push(`    ${dim(task.outputSummary)}`);
    }
    if (task.error) {
      lines.push(`    ${red(task.error)}`);
    }
  }

  if (execution.resultSummary) {
    lines.push('');
    lines.push(`${bold('Result:')}       ${execution.resultSummary}`);
  }

  return lines.join('\n');
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  // Header row
  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  // Separator
  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  // Data rows
  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format plan history as a table.
 */
export function formatPlanList(plans: Plan[]): string {
  if (plans.length === 0) {
    return dim('No plans found.');
  }

  const columns: TableColumn<Plan>[] = [
    { header: 'ID', width: 21, value: p => p.planId },
    { header: 'CATEGORY', width: 9, value: p => p.category },
    { header: 'TASKS', width: 5, align: 'right', value: p => String(p.tasks.length) },
    { header: 'CREATED', width: 16, value: p => formatRelativeTime(p.createdAt) },
    { header: 'QUESTION', width: 40, value: p => p.question },
  ];

  return formatTable(plans, columns);
}

/**
 * Format a list of executions as a table.
 */
export function formatExecutionList(executions: Execution[]): string {
  if (executions.length === 0) {
    return dim('No executions found.');
  }

  const columns: TableColumn<Execution>[] = [
    { header: 'ID', width: 21, value: e => e.executionId },
    { header: 'STATE', width: 10, value: e => e.state },
    {
      header: 'DONE',
      width: 5,
      align: 'right',
      value: e => `${e.tasks.filter(t => t.status === 'completed').length}/${e.tasks.length}`,
    },
    { header: 'CREATED', width: 16, value: e => formatRelativeTime(e.createdAt) },
    { header: 'QUESTION', width: 40, value: e => e.question },
  ];

  return formatTable(executions, columns);
}

/**
 * Format execution log items, one per line.
 */
export function formatLogList(items: ExecutionLogItem[]): string {
  if (items.length === 0) {
    return dim('No log entries found.');
  }

  return items
    .map(item => {
      const time = dim(item.timestamp);
      if (isLogEntry(item)) {
        return `${time}  ${cyan(item.step)}  ${item.executionId}  ${item.detail}`;
      }
      const note = item.note ? `  ${item.note}` : '';
      return `${time}  ${magenta('record')}  ${item.planId}  ${item.status}${note}`;
    })
    .join('\n');
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
