/**
 * Execution Engine
 *
 * Instantiates executions from plans and advances them, either one manual
 * task action at a time or automatically through tick() and run(). Each
 * operation is a single load -> modify -> save cycle on the document store.
 */

import { nanoid } from 'nanoid';
import {
  ExecutionState,
  TaskStatus,
  type Execution,
  type ExecutionTask,
  type Plan,
  type PlanningDocument,
  type StartExecutionInput,
} from '../types/index.js';
import type { DocumentStore } from '../store/document-store.js';
import { appendCapped, newestFirst } from '../store/capped.js';
import { buildPlan, findPlan } from '../planning/plan-builder.js';
import { InvalidArgumentError, NotFoundError, PreconditionFailedError } from '../errors.js';
import {
  applyTaskAction,
  completeTask,
  isTaskAction,
  isTerminalState,
  normalizeExecution,
  startTask,
} from './state-machine.js';
import type { ExecutionLog } from './execution-log.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('execution-engine');

export const MIN_RUN_STEPS = 1;
export const MAX_RUN_STEPS = 200;
export const MAX_EXECUTION_PAGE = 500;

export const COMPLETED_RESULT_SUMMARY = 'Workflow completed: every task has finished.';

export interface ExecutionEngineOptions {
  planHistoryLimit: number;
  executionLimit: number;
  /** Tick budget for run() when the caller gives none */
  defaultMaxSteps: number;
}

interface TickOutcome {
  execution: Execution;
  /** Task retired by this tick, if any */
  completedTaskId: string | null;
}

function now(): string {
  return new Date().toISOString();
}

function requireId(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidArgumentError(`${field} is required`, { field });
  }
  return trimmed;
}

function findExecution(document: PlanningDocument, executionId: string): Execution {
  const execution = document.executions.find((item) => item.executionId === executionId);
  if (!execution) {
    throw new NotFoundError('Execution', executionId);
  }
  return execution;
}

function toExecutionTask(task: Plan['tasks'][number]): ExecutionTask {
  return {
    taskId: task.taskId,
    title: task.title,
    assignedAgent: task.assignedAgent,
    dependsOn: [...task.dependsOn],
    toolset: { ...task.toolset },
    status: TaskStatus.PENDING,
    attempts: 0,
    startedAt: null,
    finishedAt: null,
    outputSummary: null,
    error: null,
  };
}

export class ExecutionEngine {
  constructor(
    private readonly store: DocumentStore,
    private readonly executionLog: ExecutionLog,
    private readonly options: ExecutionEngineOptions
  ) {}

  /**
   * Create an execution from an existing plan, or from a plan built on the
   * spot for `question`.
   */
  async startExecution(input: StartExecutionInput): Promise<Execution> {
    const autoStart = input.autoStart ?? true;

    return this.store.update((document) => {
      let plan: Plan;
      if (input.planId !== undefined && input.planId.trim()) {
        const planId = requireId('planId', input.planId);
        const found = findPlan(document, planId);
        if (!found) {
          throw new NotFoundError('Plan', planId);
        }
        plan = found;
      } else if (input.question !== undefined && input.question.trim()) {
        plan = buildPlan(
          document,
          { question: input.question, scene: input.scene, category: input.category },
          { planHistoryLimit: this.options.planHistoryLimit }
        );
      } else {
        throw new InvalidArgumentError('Either planId or question is required');
      }

      const timestamp = now();
      const execution: Execution = {
        executionId: nanoid(),
        planId: plan.planId,
        question: plan.question,
        scene: plan.scene,
        category: plan.category,
        workflowMode: plan.workflowMode,
        state: ExecutionState.PENDING,
        autoStart,
        createdAt: timestamp,
        updatedAt: timestamp,
        startedAt: null,
        finishedAt: null,
        tasks: plan.tasks.map(toExecutionTask),
        resultSummary: null,
      };

      normalizeExecution(execution, timestamp);
      // Forced even before any task is ready; a plan with no tasks is
      // already completed and stays that way.
      if (autoStart) {
        if (!isTerminalState(execution.state)) {
          execution.state = ExecutionState.RUNNING;
        }
        execution.startedAt = timestamp;
      }

      appendCapped(document.executions, execution, this.options.executionLimit);
      this.executionLog.append(document, {
        executionId: execution.executionId,
        step: 'execution_start',
        detail: 'Execution created',
        metadata: { planId: plan.planId, taskCount: execution.tasks.length },
      });

      log.info(
        {
          executionId: execution.executionId,
          planId: plan.planId,
          taskCount: execution.tasks.length,
          state: execution.state,
        },
        'Execution started'
      );
      return execution;
    });
  }

  /**
   * Normalizes before returning; the derived state is persisted.
   */
  async getExecution(executionId: string): Promise<Execution> {
    const id = requireId('executionId', executionId);
    return this.store.update((document) => normalizeExecution(findExecution(document, id), now()));
  }

  /**
   * Most recent executions first, each normalized.
   */
  async listExecutions(limit = 100): Promise<Execution[]> {
    const document = await this.store.load();
    const bounded = Math.max(1, Math.min(limit, MAX_EXECUTION_PAGE));
    const timestamp = now();
    return newestFirst(document.executions, bounded).map((execution) =>
      normalizeExecution(structuredClone(execution), timestamp)
    );
  }

  /**
   * Apply a manual transition to one task.
   */
  async taskAction(
    executionId: string,
    taskId: string,
    action: string,
    note?: string | null
  ): Promise<Execution> {
    const id = requireId('executionId', executionId);
    const tid = requireId('taskId', taskId);
    if (!isTaskAction(action)) {
      throw new InvalidArgumentError(`Unsupported action: ${action}`, { action });
    }
    const presentNote = note?.trim() ? note : null;

    return this.store.update((document) => {
      const execution = findExecution(document, id);
      if (execution.state === ExecutionState.CANCELLED) {
        throw new PreconditionFailedError(`Execution ${id} is cancelled`, {
          executionId: id,
          state: execution.state,
        });
      }
      const task = execution.tasks.find((item) => item.taskId === tid);
      if (!task) {
        throw new NotFoundError('Task', tid);
      }

      const timestamp = now();
      const from = task.status;
      applyTaskAction(execution, task, action, presentNote, timestamp);
      normalizeExecution(execution, timestamp);

      this.executionLog.append(document, {
        executionId: id,
        step: `task_${action}`,
        detail: `${tid} -> ${action}`,
        metadata: { note: presentNote },
      });

      log.info(
        { executionId: id, taskId: tid, action, from, to: task.status, state: execution.state },
        'Task action applied'
      );
      return execution;
    });
  }

  /**
   * One automatic step: complete the running task, or promote the first
   * ready task and complete it in the same call. A terminal execution is
   * returned unchanged and nothing is logged.
   */
  async tick(executionId: string): Promise<Execution> {
    const outcome = await this.tickOnce(requireId('executionId', executionId));
    return outcome.execution;
  }

  /**
   * Tick until the execution is terminal, nothing is left to advance, or
   * `maxSteps` (clamped to [1, 200]) ticks have been spent.
   */
  async run(executionId: string, maxSteps?: number): Promise<Execution> {
    const id = requireId('executionId', executionId);
    const requested = maxSteps ?? this.options.defaultMaxSteps;
    const steps = Math.max(MIN_RUN_STEPS, Math.min(Math.trunc(requested), MAX_RUN_STEPS));

    let execution = await this.getExecution(id);
    let ticks = 0;
    while (ticks < steps && !isTerminalState(execution.state)) {
      const outcome = await this.tickOnce(id);
      ticks += 1;
      execution = outcome.execution;
      if (outcome.completedTaskId === null) {
        break;
      }
    }

    log.info({ executionId: id, ticks, maxSteps: steps, state: execution.state }, 'Run finished');
    return execution;
  }

  /**
   * Move a non-terminal execution to `cancelled`.
   */
  async cancelExecution(executionId: string, reason?: string): Promise<Execution> {
    const id = requireId('executionId', executionId);

    return this.store.update((document) => {
      const execution = findExecution(document, id);
      const timestamp = now();
      normalizeExecution(execution, timestamp);
      if (isTerminalState(execution.state)) {
        throw new PreconditionFailedError(
          `Execution ${id} is already ${execution.state}`,
          { executionId: id, state: execution.state }
        );
      }

      execution.state = ExecutionState.CANCELLED;
      execution.finishedAt = timestamp;
      execution.updatedAt = timestamp;
      execution.resultSummary = reason ?? 'Cancelled by operator';

      this.executionLog.append(document, {
        executionId: id,
        step: 'execution_cancel',
        detail: execution.resultSummary,
        metadata: { reason: reason ?? null },
      });
      log.info({ executionId: id }, 'Execution cancelled');
      return execution;
    });
  }

  private async tickOnce(executionId: string): Promise<TickOutcome> {
    return this.store.update((document): TickOutcome => {
      const execution = findExecution(document, executionId);
      const timestamp = now();
      normalizeExecution(execution, timestamp);

      if (isTerminalState(execution.state)) {
        return { execution, completedTaskId: null };
      }

      let running = execution.tasks.find((task) => task.status === TaskStatus.RUNNING);
      if (!running) {
        const ready = execution.tasks.find((task) => task.status === TaskStatus.READY);
        if (ready) {
          startTask(ready, timestamp);
          running = ready;
        }
      }

      if (running) {
        completeTask(running, `${running.title} completed automatically`, timestamp);
      }

      normalizeExecution(execution, timestamp);
      if (execution.state === ExecutionState.COMPLETED) {
        execution.resultSummary = COMPLETED_RESULT_SUMMARY;
      }

      this.executionLog.append(document, {
        executionId,
        step: 'tick',
        detail: running
          ? `${running.taskId} completed by automatic driver`
          : 'No running or ready task to advance',
        metadata: { state: execution.state, taskId: running?.taskId ?? null },
      });

      return { execution, completedTaskId: running?.taskId ?? null };
    });
  }
}
