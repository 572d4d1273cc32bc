/**
 * State machine for plan executions.
 *
 * Task statuses move pending -> ready -> running -> completed | failed | skipped,
 * with failed -> pending on retry. `ready` is never set by an action; it is
 * derived by normalizeExecution() whenever a pending task's dependencies are
 * all completed. The execution state is recomputed from task statuses after
 * every mutation until it reaches a terminal state.
 */

import {
  ExecutionState,
  TaskAction,
  TaskStatus,
  TASK_ACTIONS,
  type Execution,
  type ExecutionTask,
} from '../types/index.js';
import { PreconditionFailedError } from '../errors.js';

const TERMINAL_STATES: ReadonlySet<ExecutionState> = new Set([
  ExecutionState.COMPLETED,
  ExecutionState.FAILED,
  ExecutionState.CANCELLED,
]);

const SETTLED_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.COMPLETED,
  TaskStatus.SKIPPED,
]);

const ACTIVE_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.RUNNING,
  TaskStatus.READY,
]);

/**
 * Statuses each action may be applied from. `start` is gated on
 * dependencies instead, and `skip` on not being settled.
 */
const ALLOWED_FROM: Record<TaskAction, ReadonlySet<TaskStatus> | null> = {
  [TaskAction.START]: null,
  [TaskAction.COMPLETE]: new Set([TaskStatus.RUNNING, TaskStatus.READY, TaskStatus.PENDING]),
  [TaskAction.FAIL]: new Set([TaskStatus.RUNNING, TaskStatus.READY, TaskStatus.PENDING]),
  [TaskAction.RETRY]: new Set([TaskStatus.FAILED]),
  [TaskAction.SKIP]: new Set([
    TaskStatus.PENDING,
    TaskStatus.READY,
    TaskStatus.RUNNING,
    TaskStatus.FAILED,
  ]),
};

/**
 * Check if an execution state is terminal (never recomputed again).
 */
export function isTerminalState(state: ExecutionState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isTaskAction(value: string): value is TaskAction {
  return (TASK_ACTIONS as readonly string[]).includes(value);
}

export function indexTasks(tasks: readonly ExecutionTask[]): Map<string, ExecutionTask> {
  return new Map(tasks.map((task) => [task.taskId, task]));
}

/**
 * True when every dependency exists and is completed. A skipped
 * dependency does not count.
 */
export function dependenciesCompleted(
  task: ExecutionTask,
  tasksById: ReadonlyMap<string, ExecutionTask>
): boolean {
  return task.dependsOn.every((dep) => tasksById.get(dep)?.status === TaskStatus.COMPLETED);
}

/**
 * Derive the execution state from task statuses.
 */
export function deriveExecutionState(
  tasks: readonly ExecutionTask[],
  current: ExecutionState
): ExecutionState {
  if (tasks.every((task) => SETTLED_STATUSES.has(task.status))) {
    return ExecutionState.COMPLETED;
  }
  if (tasks.some((task) => task.status === TaskStatus.FAILED)) {
    return ExecutionState.FAILED;
  }
  if (tasks.some((task) => ACTIVE_STATUSES.has(task.status))) {
    return ExecutionState.RUNNING;
  }
  return current;
}

/**
 * Promote ready tasks and recompute the execution state in place.
 * Terminal executions are returned untouched.
 */
export function normalizeExecution(execution: Execution, now: string): Execution {
  if (isTerminalState(execution.state)) {
    return execution;
  }

  const tasksById = indexTasks(execution.tasks);
  for (const task of execution.tasks) {
    if (task.status === TaskStatus.PENDING && dependenciesCompleted(task, tasksById)) {
      task.status = TaskStatus.READY;
    }
  }

  execution.state = deriveExecutionState(execution.tasks, execution.state);
  if (execution.state === ExecutionState.COMPLETED) {
    execution.finishedAt = execution.finishedAt ?? now;
  }
  execution.updatedAt = now;
  return execution;
}

/**
 * Mark a task running. Used by both manual start and automatic promotion.
 */
export function startTask(task: ExecutionTask, now: string): void {
  task.status = TaskStatus.RUNNING;
  task.attempts += 1;
  task.startedAt = task.startedAt ?? now;
  task.error = null;
}

export function completeTask(task: ExecutionTask, outputSummary: string, now: string): void {
  task.status = TaskStatus.COMPLETED;
  task.finishedAt = now;
  task.outputSummary = outputSummary;
  task.error = null;
}

function assertAllowed(action: TaskAction, task: ExecutionTask): void {
  const allowed = ALLOWED_FROM[action];
  if (allowed && !allowed.has(task.status)) {
    throw new PreconditionFailedError(
      `Cannot ${action} task ${task.taskId} from status '${task.status}'`,
      { taskId: task.taskId, status: task.status, action }
    );
  }
}

/**
 * Apply a manual action to one task of an execution, in place.
 * Throws PreconditionFailedError when the transition is not legal.
 * Does not normalize; the caller does that afterwards.
 */
export function applyTaskAction(
  execution: Execution,
  task: ExecutionTask,
  action: TaskAction,
  note: string | null,
  now: string
): void {
  assertAllowed(action, task);

  switch (action) {
    case TaskAction.START: {
      if (!dependenciesCompleted(task, indexTasks(execution.tasks))) {
        throw new PreconditionFailedError(
          `Dependencies of task ${task.taskId} are not completed`,
          { taskId: task.taskId, dependsOn: task.dependsOn }
        );
      }
      startTask(task, now);
      execution.state = ExecutionState.RUNNING;
      execution.startedAt = execution.startedAt ?? now;
      return;
    }
    case TaskAction.COMPLETE:
      completeTask(task, note || `${task.title} completed`, now);
      return;
    case TaskAction.FAIL:
      task.status = TaskStatus.FAILED;
      task.finishedAt = now;
      task.error = note || 'Task failed';
      execution.state = ExecutionState.FAILED;
      return;
    case TaskAction.RETRY:
      task.status = TaskStatus.PENDING;
      task.finishedAt = null;
      task.error = null;
      execution.state = ExecutionState.RUNNING;
      return;
    case TaskAction.SKIP:
      task.status = TaskStatus.SKIPPED;
      task.finishedAt = now;
      task.outputSummary = note || 'Task skipped';
      return;
  }
}

/**
 * Human-readable progress line for an execution.
 */
export function getProgressDescription(execution: Execution): string {
  const total = execution.tasks.length;
  const settled = execution.tasks.filter((task) => SETTLED_STATUSES.has(task.status)).length;

  switch (execution.state) {
    case ExecutionState.PENDING:
      return `Waiting to start (${total} tasks)`;
    case ExecutionState.RUNNING:
      return `Running (${settled}/${total} tasks settled)`;
    case ExecutionState.COMPLETED:
      return 'Completed successfully';
    case ExecutionState.FAILED: {
      const failed = execution.tasks.find((task) => task.status === TaskStatus.FAILED);
      return `Failed: ${failed?.error ?? 'Unknown error'}`;
    }
    case ExecutionState.CANCELLED:
      return 'Cancelled by operator';
  }
}
