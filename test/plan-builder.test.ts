/**
 * Plan Builder Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildPlan,
  decompose,
  matchRule,
  selectChain,
  DEFAULT_AGENT,
  DEFAULT_SPLIT_TEMPLATE,
} from '../src/planning/plan-builder.js';
import { inferCategory } from '../src/planning/category.js';
import { createDefaultDocument, createEmptyDocument } from '../src/store/index.js';
import { InvalidArgumentError } from '../src/errors.js';
import { PlanCategory } from '../src/types/index.js';
import { makeChain, makeRule } from './helpers/fixtures.js';

const OPTIONS = { planHistoryLimit: 300 };

describe('inferCategory', () => {
  it('should classify business questions', () => {
    expect(inferCategory('How is the Business Loan book trending?')).toBe(PlanCategory.BUSINESS);
    expect(inferCategory('merchant drawdown by region')).toBe(PlanCategory.BUSINESS);
  });

  it('should classify consumer questions', () => {
    expect(inferCategory('Why did consumer conversion drop?')).toBe(PlanCategory.CONSUMER);
    expect(inferCategory('personal loan approvals this week')).toBe(PlanCategory.CONSUMER);
  });

  it('should prefer business when both segments are mentioned', () => {
    expect(inferCategory('Compare consumer and business overdue rates')).toBe(PlanCategory.BUSINESS);
  });

  it('should default to mixed', () => {
    expect(inferCategory('What changed in revenue?')).toBe(PlanCategory.MIXED);
  });
});

describe('matchRule', () => {
  it('should return the first enabled rule with a keyword hit', () => {
    const rules = [
      makeRule({ id: 'a', matchKeywords: ['funnel'] }),
      makeRule({ id: 'b', matchKeywords: ['Overdue'] }),
      makeRule({ id: 'c', matchKeywords: ['overdue'] }),
    ];
    expect(matchRule(rules, 'overdue rate by vintage')?.id).toBe('b');
  });

  it('should skip disabled rules', () => {
    const rules = [
      makeRule({ id: 'a', enabled: false, matchKeywords: ['overdue'] }),
      makeRule({ id: 'b', matchKeywords: ['overdue'] }),
    ];
    expect(matchRule(rules, 'overdue')?.id).toBe('b');
  });

  it('should ignore blank keywords', () => {
    const rules = [
      makeRule({ id: 'a', matchKeywords: ['  ', ''] }),
      makeRule({ id: 'b', matchKeywords: ['revenue'] }),
    ];
    expect(matchRule(rules, 'revenue drop')?.id).toBe('b');
  });

  it('should fall back to the first enabled rule', () => {
    const rules = [
      makeRule({ id: 'a', enabled: false }),
      makeRule({ id: 'b', matchKeywords: ['nothing'] }),
    ];
    expect(matchRule(rules, 'unrelated question')?.id).toBe('b');
  });

  it('should return null when no rule is enabled', () => {
    expect(matchRule([makeRule({ enabled: false })], 'anything')).toBeNull();
    expect(matchRule([], 'anything')).toBeNull();
  });
});

describe('selectChain', () => {
  it('should use the first enabled chain', () => {
    const chain = selectChain([
      makeChain({ name: 'Off', enabled: false }),
      makeChain({ name: 'On', mode: 'review', steps: [{ name: 'Planner', role: 'split', handoffTo: null }] }),
    ]);
    expect(chain).toEqual({
      name: 'On',
      mode: 'review',
      steps: [{ name: 'Planner', role: 'split', handoffTo: null }],
    });
  });

  it('should fall back to the default dispatch chain', () => {
    expect(selectChain([])).toEqual({ name: 'Default Dispatch Chain', mode: 'agent_dispatch', steps: [] });
  });
});

describe('decompose', () => {
  it('should build a linear chain of tasks', () => {
    const tasks = decompose(['A', 'B', 'C'], ['Agent 1', 'Agent 2'], { sql: true }, 'mixed');

    expect(tasks.map((t) => t.taskId)).toEqual(['task_1', 'task_2', 'task_3']);
    expect(tasks.map((t) => t.dependsOn)).toEqual([[], ['task_1'], ['task_2']]);
    expect(tasks.map((t) => t.assignedAgent)).toEqual(['Agent 1', 'Agent 2', 'Agent 2']);
    expect(tasks[1]?.objective).toBe(
      'Complete [B] for the mixed segment and deliver an actionable conclusion'
    );
  });

  it('should use the default agent when no agents are preferred', () => {
    const tasks = decompose(['Only'], [], {}, 'consumer');
    expect(tasks[0]?.assignedAgent).toBe(DEFAULT_AGENT);
  });

  it('should copy the toolset into each task', () => {
    const toolset = { sql: true, rag: false };
    const tasks = decompose(['A', 'B'], [], toolset, 'mixed');
    toolset.sql = false;
    expect(tasks[0]?.toolset).toEqual({ sql: true, rag: false });
    expect(tasks[0]?.toolset).not.toBe(tasks[1]?.toolset);
  });
});

describe('buildPlan', () => {
  it('should decompose with the matching seeded rule', () => {
    const document = createDefaultDocument();
    const plan = buildPlan(document, { question: 'Why did consumer conversion drop last month?' }, OPTIONS);

    expect(plan.category).toBe(PlanCategory.CONSUMER);
    expect(plan.scene).toBe('data_discuss');
    expect(plan.workflowMode).toBe('agent_dispatch');
    expect(plan.workflowChain.name).toBe('Standard agent collaboration chain');
    expect(plan.workflowChain.steps).toHaveLength(5);
    expect(plan.tasks.map((t) => t.title)).toEqual([
      'Funnel diagnosis',
      'Customer segmentation',
      'Risk and return linkage',
      'Strategy recommendation',
    ]);
    expect(plan.tasks.map((t) => t.assignedAgent)).toEqual([
      'Consumer Risk Agent',
      'Business Analysis Agent',
      'Business Analysis Agent',
      'Business Analysis Agent',
    ]);
    expect(plan.tasks[0]?.objective).toBe(
      'Complete [Funnel diagnosis] for the consumer segment and deliver an actionable conclusion'
    );
    expect(plan.rationale).toHaveLength(3);
    expect(document.planHistory).toEqual([plan]);
  });

  it('should pick the business rule for business questions', () => {
    const plan = buildPlan(
      createDefaultDocument(),
      { question: 'How is business loan credit line utilization trending?' },
      OPTIONS
    );

    expect(plan.category).toBe(PlanCategory.BUSINESS);
    expect(plan.tasks[0]?.title).toBe('Credit line utilization');
    expect(plan.tasks).toHaveLength(4);
  });

  it('should use the generic template when no rules exist', () => {
    const plan = buildPlan(createEmptyDocument(), { question: 'What changed in revenue?' }, OPTIONS);

    expect(plan.category).toBe(PlanCategory.MIXED);
    expect(plan.tasks.map((t) => t.title)).toEqual([...DEFAULT_SPLIT_TEMPLATE]);
    expect(plan.tasks.every((t) => t.assignedAgent === DEFAULT_AGENT)).toBe(true);
    expect(plan.tasks[0]?.toolset).toEqual({ sql: true, rag: true, ruleValidation: true });
    expect(plan.workflowChain).toEqual({ name: 'Default Dispatch Chain', mode: 'agent_dispatch', steps: [] });
  });

  it('should honor the scene and category hints', () => {
    const plan = buildPlan(
      createEmptyDocument(),
      { question: 'consumer overdue trend', scene: 'weekly_review', category: PlanCategory.BUSINESS },
      OPTIONS
    );

    expect(plan.scene).toBe('weekly_review');
    expect(plan.category).toBe(PlanCategory.BUSINESS);
  });

  it('should trim the question', () => {
    const plan = buildPlan(createEmptyDocument(), { question: '  revenue  ' }, OPTIONS);
    expect(plan.question).toBe('revenue');
  });

  it('should reject a blank question', () => {
    const document = createEmptyDocument();
    expect(() => buildPlan(document, { question: '   ' }, OPTIONS)).toThrow(InvalidArgumentError);
    expect(document.planHistory).toHaveLength(0);
  });

  it('should evict the oldest plans past the history limit', () => {
    const document = createEmptyDocument();
    const first = buildPlan(document, { question: 'first' }, { planHistoryLimit: 2 });
    const second = buildPlan(document, { question: 'second' }, { planHistoryLimit: 2 });
    const third = buildPlan(document, { question: 'third' }, { planHistoryLimit: 2 });

    expect(document.planHistory.map((p) => p.planId)).toEqual([second.planId, third.planId]);
    expect(document.planHistory).not.toContainEqual(first);
  });

  it('should produce an empty plan for a rule with no steps', () => {
    const document = createEmptyDocument();
    document.rules = [makeRule({ splitTemplate: [] })];
    const plan = buildPlan(document, { question: 'anything' }, OPTIONS);
    expect(plan.tasks).toEqual([]);
  });
});
