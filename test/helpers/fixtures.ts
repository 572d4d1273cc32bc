import type { Chain, Rule } from '../../src/types/index.js';
import { MemoryDocumentStore } from '../../src/store/index.js';
import { createServices, type PlancraftServices, type ServiceLimits } from '../../src/services.js';

export const TEST_LIMITS: ServiceLimits = {
  planHistoryLimit: 300,
  executionLimit: 500,
  executionLogLimit: 2000,
  defaultMaxSteps: 20,
};

export function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    id: 'rule-1',
    name: 'Test rule',
    enabled: true,
    matchKeywords: [],
    splitTemplate: ['Step one', 'Step two'],
    preferredAgents: ['Agent A'],
    toolset: { sql: true },
    ...overrides,
  };
}

export function makeChain(overrides: Partial<Chain> = {}): Chain {
  return {
    id: 'chain-1',
    name: 'Test chain',
    enabled: true,
    mode: 'agent_dispatch',
    steps: [],
    ...overrides,
  };
}

/**
 * Services over an empty in-memory document: no rules, so every plan uses
 * the three-step generic template.
 */
export function createMemoryServices(limits: Partial<ServiceLimits> = {}): PlancraftServices {
  return createServices(new MemoryDocumentStore(), { ...TEST_LIMITS, ...limits });
}
