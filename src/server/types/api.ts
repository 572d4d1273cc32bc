import { z } from 'zod';
import { planCategorySchema } from '../../types/index.js';

/**
 * Page size query parameter; services clamp it to their own bounds
 */
export const limitQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
});

export type LimitQuery = z.infer<typeof limitQuerySchema>;

/**
 * Execution ID parameter
 */
export const executionIdParamsSchema = z.object({
  id: z.string().min(1),
});

export type ExecutionIdParams = z.infer<typeof executionIdParamsSchema>;

/**
 * Build plan request body
 */
export const buildPlanBodySchema = z.object({
  question: z.string().min(1, 'Question is required'),
  scene: z.string().optional(),
  category: planCategorySchema.optional(),
});

export type BuildPlanBody = z.infer<typeof buildPlanBodySchema>;

/**
 * Start execution request body; either planId or question must be set
 */
export const startExecutionBodySchema = z.object({
  planId: z.string().optional(),
  question: z.string().optional(),
  scene: z.string().optional(),
  category: planCategorySchema.optional(),
  autoStart: z.boolean().optional(),
});

export type StartExecutionBody = z.infer<typeof startExecutionBodySchema>;

/**
 * Manual task action request body. The action name is checked by the
 * engine so that unknown actions report INVALID_ARGUMENT.
 */
export const taskActionBodySchema = z.object({
  taskId: z.string().min(1),
  action: z.string().min(1),
  note: z.string().nullable().optional(),
});

export type TaskActionBody = z.infer<typeof taskActionBodySchema>;

export const runBodySchema = z.object({
  maxSteps: z.number().int().optional(),
});

export type RunBody = z.infer<typeof runBodySchema>;

export const cancelBodySchema = z.object({
  reason: z.string().optional(),
});

export type CancelBody = z.infer<typeof cancelBodySchema>;

/**
 * Free-form execution record request body
 */
export const executionRecordBodySchema = z.object({
  planId: z.string().min(1),
  status: z.string().optional(),
  note: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type ExecutionRecordBody = z.infer<typeof executionRecordBodySchema>;

/**
 * Execution log query parameters
 */
export const executionLogQuerySchema = limitQuerySchema.extend({
  executionId: z.string().min(1).optional(),
});

export type ExecutionLogQuery = z.infer<typeof executionLogQuerySchema>;
