import { nanoid } from 'nanoid';
import type { Chain, PlanningDocument, Rule } from '../types/index.js';

/**
 * Seed rules and chains written the first time a store is created.
 */
export function createDefaultRules(): Rule[] {
  return [
    {
      id: nanoid(),
      name: 'Consumer loan diagnosis',
      enabled: true,
      matchKeywords: ['consumer', 'conversion', 'overdue', 'segment'],
      splitTemplate: [
        'Funnel diagnosis',
        'Customer segmentation',
        'Risk and return linkage',
        'Strategy recommendation',
      ],
      preferredAgents: ['Consumer Risk Agent', 'Business Analysis Agent'],
      toolset: { sql: true, rag: true, ruleValidation: true },
    },
    {
      id: nanoid(),
      name: 'Business loan deep dive',
      enabled: true,
      matchKeywords: ['business loan', 'credit line', 'migration', 'raroc'],
      splitTemplate: [
        'Credit line utilization',
        'Drawdown and retention',
        'Migration and overdue quality',
        'Strategy scheduling',
      ],
      preferredAgents: ['Business Analysis Agent'],
      toolset: { sql: true, rag: true, ruleValidation: true },
    },
  ];
}

export function createDefaultChains(): Chain[] {
  return [
    {
      id: nanoid(),
      name: 'Standard agent collaboration chain',
      enabled: true,
      mode: 'agent_dispatch',
      steps: [
        { name: 'Planner', role: 'Task split and prioritization', handoffTo: 'Data Analyst Agent' },
        { name: 'Data Analyst Agent', role: 'SQL and metric computation', handoffTo: 'Risk Agent' },
        { name: 'Risk Agent', role: 'Risk and return validation', handoffTo: 'Strategy Agent' },
        { name: 'Strategy Agent', role: 'Strategy and channel action draft', handoffTo: 'Approval Agent' },
        { name: 'Approval Agent', role: 'Approval request and confirmation', handoffTo: 'Executor Agent' },
      ],
    },
  ];
}

export function createEmptyDocument(): PlanningDocument {
  return {
    rules: [],
    chains: [],
    planHistory: [],
    executions: [],
    executionLogs: [],
    updatedAt: null,
  };
}

export function createDefaultDocument(): PlanningDocument {
  return {
    ...createEmptyDocument(),
    rules: createDefaultRules(),
    chains: createDefaultChains(),
    updatedAt: new Date().toISOString(),
  };
}
