/**
 * Plan Builder
 *
 * Turns a question into an immutable Plan: a linear chain of tasks derived
 * from the first matching decomposition rule, each bound to an agent and a
 * toolset.
 */

import { nanoid } from 'nanoid';
import {
  type BuildPlanInput,
  type Chain,
  type Plan,
  type PlanningDocument,
  type PlanTask,
  type Rule,
  type Toolset,
} from '../types/index.js';
import { InvalidArgumentError } from '../errors.js';
import { appendCapped } from '../store/capped.js';
import { inferCategory } from './category.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('plan-builder');

export const DEFAULT_SCENE = 'data_discuss';
export const DEFAULT_AGENT = 'Business Analysis Agent';
export const DEFAULT_WORKFLOW_MODE = 'agent_dispatch';
export const DEFAULT_SPLIT_TEMPLATE: readonly string[] = [
  'Metric breakdown',
  'Risk assessment',
  'Strategy recommendation',
];

const DEFAULT_TOOLSET: Readonly<Toolset> = { sql: true, rag: true, ruleValidation: true };

const DEFAULT_CHAIN: Plan['workflowChain'] = {
  name: 'Default Dispatch Chain',
  mode: DEFAULT_WORKFLOW_MODE,
  steps: [],
};

const STRATEGY_FOCUS =
  'Segment understanding + funnel conversion + risk/return balance + collaborative execution';

const RATIONALE: readonly string[] = [
  'Diagnose before deciding, so strategy is not built on a misread of the data.',
  'Consumer lending tracks conversion efficiency and overdue elasticity; business lending tracks credit line efficiency and migration stability.',
  'Strategy actions require approval before they enter the execution queue.',
];

export interface PlanBuilderOptions {
  /** Most recent plans retained in history */
  planHistoryLimit: number;
}

/**
 * Pick the rule that drives decomposition: the first enabled rule with a
 * keyword hit, else the first enabled rule, else null.
 */
export function matchRule(rules: readonly Rule[], question: string): Rule | null {
  const enabled = rules.filter((rule) => rule.enabled);
  const q = question.toLowerCase();

  const matched = enabled.find((rule) =>
    rule.matchKeywords
      .map((keyword) => keyword.trim().toLowerCase())
      .some((keyword) => keyword.length > 0 && q.includes(keyword))
  );

  return matched ?? enabled[0] ?? null;
}

/**
 * First enabled chain, or the built-in default with no steps.
 */
export function selectChain(chains: readonly Chain[]): Plan['workflowChain'] {
  const chain = chains.find((c) => c.enabled);
  if (!chain) {
    return { ...DEFAULT_CHAIN, steps: [] };
  }
  return { name: chain.name, mode: chain.mode, steps: chain.steps.map((step) => ({ ...step })) };
}

/**
 * Expand a split template into a strictly linear task chain.
 */
export function decompose(
  splitTemplate: readonly string[],
  preferredAgents: readonly string[],
  toolset: Toolset,
  category: string
): PlanTask[] {
  const tasks: PlanTask[] = [];
  let previousId: string | null = null;

  splitTemplate.forEach((title, index) => {
    const taskId = `task_${index + 1}`;
    const assignedAgent =
      preferredAgents[Math.min(index, preferredAgents.length - 1)] ?? DEFAULT_AGENT;

    tasks.push({
      taskId,
      title,
      objective: `Complete [${title}] for the ${category} segment and deliver an actionable conclusion`,
      assignedAgent,
      dependsOn: previousId ? [previousId] : [],
      toolset: { ...toolset },
    });
    previousId = taskId;
  });

  return tasks;
}

/**
 * Build a plan against the given document and append it to plan history.
 * The document is mutated; persisting it is the caller's job.
 */
export function buildPlan(
  document: PlanningDocument,
  input: BuildPlanInput,
  options: PlanBuilderOptions
): Plan {
  const question = input.question.trim();
  if (!question) {
    throw new InvalidArgumentError('question is required', { field: 'question' });
  }

  const category = input.category ?? inferCategory(question);
  const chain = selectChain(document.chains);
  const rule = matchRule(document.rules, question);

  const splitTemplate = rule ? rule.splitTemplate : DEFAULT_SPLIT_TEMPLATE;
  const preferredAgents = rule ? rule.preferredAgents : [DEFAULT_AGENT];
  const toolset = rule ? rule.toolset : DEFAULT_TOOLSET;

  const plan: Plan = {
    planId: nanoid(),
    scene: input.scene ?? DEFAULT_SCENE,
    question,
    category,
    workflowMode: chain.mode,
    workflowChain: chain,
    strategyFocus: STRATEGY_FOCUS,
    tasks: decompose(splitTemplate, preferredAgents, { ...toolset }, category),
    rationale: [...RATIONALE],
    createdAt: new Date().toISOString(),
  };

  appendCapped(document.planHistory, plan, options.planHistoryLimit);

  log.info(
    {
      planId: plan.planId,
      category,
      rule: rule?.name ?? null,
      taskCount: plan.tasks.length,
    },
    'Plan built'
  );

  return plan;
}

export function findPlan(document: PlanningDocument, planId: string): Plan | undefined {
  return document.planHistory.find((plan) => plan.planId === planId);
}
