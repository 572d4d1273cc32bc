import { z } from 'zod';
import { planCategorySchema, toolsetSchema } from './planning.js';

// Task lifecycle states
export const TaskStatus = {
  PENDING: 'pending',
  READY: 'ready',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

// Execution-level states; completed, failed and cancelled are terminal
export const ExecutionState = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type ExecutionState = (typeof ExecutionState)[keyof typeof ExecutionState];

// Manual task actions
export const TaskAction = {
  START: 'start',
  COMPLETE: 'complete',
  FAIL: 'fail',
  RETRY: 'retry',
  SKIP: 'skip',
} as const;

export type TaskAction = (typeof TaskAction)[keyof typeof TaskAction];

export const TASK_ACTIONS: readonly TaskAction[] = Object.values(TaskAction);

export const taskStatusSchema = z.enum([
  TaskStatus.PENDING,
  TaskStatus.READY,
  TaskStatus.RUNNING,
  TaskStatus.COMPLETED,
  TaskStatus.FAILED,
  TaskStatus.SKIPPED,
]);

export const executionStateSchema = z.enum([
  ExecutionState.PENDING,
  ExecutionState.RUNNING,
  ExecutionState.COMPLETED,
  ExecutionState.FAILED,
  ExecutionState.CANCELLED,
]);

export const executionTaskSchema = z.object({
  taskId: z.string().min(1),
  title: z.string(),
  assignedAgent: z.string(),
  dependsOn: z.array(z.string()),
  toolset: toolsetSchema,
  status: taskStatusSchema,
  attempts: z.number().int().min(0),
  startedAt: z.string().nullable(),
  finishedAt: z.string().nullable(),
  outputSummary: z.string().nullable(),
  error: z.string().nullable(),
});

export type ExecutionTask = z.infer<typeof executionTaskSchema>;

export const executionSchema = z.object({
  executionId: z.string().min(1),
  planId: z.string(),
  question: z.string(),
  scene: z.string(),
  category: planCategorySchema,
  workflowMode: z.string(),
  state: executionStateSchema,
  autoStart: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().nullable(),
  finishedAt: z.string().nullable(),
  tasks: z.array(executionTaskSchema),
  resultSummary: z.string().nullable(),
});

export type Execution = z.infer<typeof executionSchema>;

/**
 * Audit entry written for every engine action.
 */
export const logEntrySchema = z.object({
  executionId: z.string(),
  step: z.string(),
  status: z.string(),
  detail: z.string(),
  metadata: z.record(z.unknown()),
  timestamp: z.string(),
});

export type LogEntry = z.infer<typeof logEntrySchema>;

/**
 * Free-form record appended by an operator against a plan.
 */
export const executionRecordSchema = z.object({
  planId: z.string(),
  status: z.string(),
  note: z.string().nullable(),
  metadata: z.record(z.unknown()),
  timestamp: z.string(),
});

export type ExecutionRecord = z.infer<typeof executionRecordSchema>;

export interface StartExecutionInput {
  planId?: string | undefined;
  question?: string | undefined;
  scene?: string | undefined;
  category?: z.infer<typeof planCategorySchema> | undefined;
  autoStart?: boolean | undefined;
}
