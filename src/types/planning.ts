import { z } from 'zod';

/**
 * Capability switches handed to the agent that runs a task
 * (e.g. `{ sql: true, rag: false }`).
 */
export const toolsetSchema = z.record(z.boolean());

export type Toolset = z.infer<typeof toolsetSchema>;

/**
 * Keyword-triggered decomposition rule.
 */
export const ruleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  /** Matched case-insensitively as substrings of the question */
  matchKeywords: z.array(z.string()).default([]),
  /** Ordered step titles; one task is generated per entry */
  splitTemplate: z.array(z.string().min(1)).default([]),
  /** Agent for step i is preferredAgents[min(i, length - 1)] */
  preferredAgents: z.array(z.string().min(1)).default([]),
  toolset: toolsetSchema.default({ sql: true, rag: true, ruleValidation: true }),
});

export type Rule = z.infer<typeof ruleSchema>;

export const chainStepSchema = z.object({
  name: z.string().min(1),
  role: z.string(),
  handoffTo: z.string().nullable().default(null),
});

export type ChainStep = z.infer<typeof chainStepSchema>;

/**
 * Collaboration template describing which roles hand work to which.
 */
export const chainSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  mode: z.string().min(1).default('agent_dispatch'),
  steps: z.array(chainStepSchema).default([]),
});

export type Chain = z.infer<typeof chainSchema>;

// Closed set of segments a request can be classified into
export const PlanCategory = {
  BUSINESS: 'business',
  CONSUMER: 'consumer',
  MIXED: 'mixed',
} as const;

export type PlanCategory = (typeof PlanCategory)[keyof typeof PlanCategory];

export const planCategorySchema = z.enum([
  PlanCategory.BUSINESS,
  PlanCategory.CONSUMER,
  PlanCategory.MIXED,
]);

export const planTaskSchema = z.object({
  taskId: z.string().min(1),
  title: z.string(),
  objective: z.string(),
  assignedAgent: z.string(),
  dependsOn: z.array(z.string()),
  toolset: toolsetSchema,
});

export type PlanTask = z.infer<typeof planTaskSchema>;

export const planSchema = z.object({
  planId: z.string().min(1),
  scene: z.string(),
  question: z.string(),
  category: planCategorySchema,
  workflowMode: z.string(),
  workflowChain: z.object({
    name: z.string(),
    mode: z.string(),
    steps: z.array(chainStepSchema),
  }),
  strategyFocus: z.string(),
  tasks: z.array(planTaskSchema),
  rationale: z.array(z.string()),
  createdAt: z.string(),
});

export type Plan = z.infer<typeof planSchema>;

export interface BuildPlanInput {
  question: string;
  scene?: string | undefined;
  category?: PlanCategory | undefined;
}
