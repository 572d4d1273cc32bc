import { PlanCategory } from '../types/index.js';

/**
 * Substring probes checked in order; the first category with a hit wins.
 */
const CATEGORY_PROBES: ReadonlyArray<{ category: PlanCategory; probes: readonly string[] }> = [
  { category: PlanCategory.BUSINESS, probes: ['business loan', 'business', 'merchant', 'enterprise'] },
  { category: PlanCategory.CONSUMER, probes: ['consumer loan', 'consumer', 'personal loan'] },
];

/**
 * Classify a question into a plan category. Falls back to `mixed`.
 */
export function inferCategory(question: string): PlanCategory {
  const q = question.toLowerCase();
  for (const { category, probes } of CATEGORY_PROBES) {
    if (probes.some((probe) => q.includes(probe))) {
      return category;
    }
  }
  return PlanCategory.MIXED;
}
