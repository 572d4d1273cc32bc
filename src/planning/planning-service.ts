import type { BuildPlanInput, Chain, Plan, Rule } from '../types/index.js';
import type { DocumentStore } from '../store/document-store.js';
import { newestFirst } from '../store/capped.js';
import { NotFoundError } from '../errors.js';
import { buildPlan, findPlan, type PlanBuilderOptions } from './plan-builder.js';
import { parseChains, parseRules } from './catalog.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('planning-service');

export const MAX_HISTORY_PAGE = 500;

/**
 * Catalog maintenance and plan building over a document store.
 */
export class PlanningService {
  constructor(
    private readonly store: DocumentStore,
    private readonly options: PlanBuilderOptions
  ) {}

  async listRules(): Promise<Rule[]> {
    const document = await this.store.load();
    return document.rules;
  }

  async replaceRules(input: unknown): Promise<Rule[]> {
    const rules = parseRules(input);
    await this.store.update((document) => {
      document.rules = rules;
    });
    log.info({ count: rules.length }, 'Rules replaced');
    return rules;
  }

  async listChains(): Promise<Chain[]> {
    const document = await this.store.load();
    return document.chains;
  }

  async replaceChains(input: unknown): Promise<Chain[]> {
    const chains = parseChains(input);
    await this.store.update((document) => {
      document.chains = chains;
    });
    log.info({ count: chains.length }, 'Chains replaced');
    return chains;
  }

  async buildPlan(input: BuildPlanInput): Promise<Plan> {
    return this.store.update((document) => buildPlan(document, input, this.options));
  }

  /**
   * Most recent plans first.
   */
  async listPlanHistory(limit = 100): Promise<Plan[]> {
    const document = await this.store.load();
    const bounded = Math.max(1, Math.min(limit, MAX_HISTORY_PAGE));
    return newestFirst(document.planHistory, bounded);
  }

  async getPlan(planId: string): Promise<Plan> {
    const document = await this.store.load();
    const plan = findPlan(document, planId);
    if (!plan) {
      throw new NotFoundError('Plan', planId);
    }
    return plan;
  }
}
