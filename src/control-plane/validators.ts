import { z, type ZodError } from 'zod';
import { planCategorySchema } from '../types/index.js';

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Convert Zod errors to our ValidationError format.
 */
export function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

const jsonFlag = z.boolean().default(false);

/**
 * Schema for plan command options.
 */
export const planCommandOptionsSchema = z.object({
  scene: z.string().optional(),
  category: planCategorySchema.optional(),
  json: jsonFlag,
});

export type PlanCommandOptions = z.infer<typeof planCommandOptionsSchema>;

/**
 * Schema for list-style command options (plans, list).
 */
export const listCommandOptionsSchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(20),
  json: jsonFlag,
});

export type ListCommandOptions = z.infer<typeof listCommandOptionsSchema>;

/**
 * Schema for start command options. Commander maps --no-auto-start
 * onto autoStart: false.
 */
export const startCommandOptionsSchema = z
  .object({
    plan: z.string().min(1).optional(),
    question: z.string().min(1).optional(),
    scene: z.string().optional(),
    category: planCategorySchema.optional(),
    autoStart: z.boolean().default(true),
    json: jsonFlag,
  })
  .refine(o => o.plan !== undefined || o.question !== undefined, {
    message: 'Either --plan or --question is required',
    path: ['plan'],
  });

export type StartCommandOptions = z.infer<typeof startCommandOptionsSchema>;

export const jsonOptionsSchema = z.object({
  json: jsonFlag,
});

export type JsonOptions = z.infer<typeof jsonOptionsSchema>;

export const actionCommandOptionsSchema = z.object({
  note: z.string().optional(),
  json: jsonFlag,
});

export type ActionCommandOptions = z.infer<typeof actionCommandOptionsSchema>;

/**
 * Schema for run command options.
 */
export const runCommandOptionsSchema = z.object({
  maxSteps: z.coerce.number().int().optional(),
  json: jsonFlag,
});

export type RunCommandOptions = z.infer<typeof runCommandOptionsSchema>;

export const cancelCommandOptionsSchema = z.object({
  reason: z.string().optional(),
  json: jsonFlag,
});

export type CancelCommandOptions = z.infer<typeof cancelCommandOptionsSchema>;

/**
 * Schema for logs command options.
 */
export const logsCommandOptionsSchema = z.object({
  execution: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(50),
  json: jsonFlag,
});

export type LogsCommandOptions = z.infer<typeof logsCommandOptionsSchema>;

/**
 * Schema for serve command options
 */
export const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().optional(),
  corsOrigin: z.string().optional(),
});

export type ServeOptions = z.infer<typeof serveOptionsSchema>;
