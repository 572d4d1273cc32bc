import { z } from 'zod';
import { chainSchema, planSchema, ruleSchema } from './planning.js';
import { executionRecordSchema, executionSchema, logEntrySchema } from './execution.js';

/**
 * The single document the orchestrator loads, mutates and saves whole.
 */
export const planningDocumentSchema = z.object({
  rules: z.array(ruleSchema).default([]),
  chains: z.array(chainSchema).default([]),
  planHistory: z.array(planSchema).default([]),
  executions: z.array(executionSchema).default([]),
  executionLogs: z.array(z.union([logEntrySchema, executionRecordSchema])).default([]),
  updatedAt: z.string().nullable().default(null),
});

export type PlanningDocument = z.infer<typeof planningDocumentSchema>;

export type ExecutionLogItem = PlanningDocument['executionLogs'][number];
