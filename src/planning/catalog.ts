import { z } from 'zod';
import { chainSchema, ruleSchema, type Chain, type Rule } from '../types/index.js';
import { InvalidArgumentError } from '../errors.js';

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

function assertUniqueIds(kind: string, items: ReadonlyArray<{ id: string }>): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new InvalidArgumentError(`Duplicate ${kind} id '${item.id}'`, { id: item.id });
    }
    seen.add(item.id);
  }
}

/**
 * Validate a full replacement rule list. Order is preserved: it is the
 * match order used by the plan builder.
 */
export function parseRules(input: unknown): Rule[] {
  const result = z.array(ruleSchema).safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError('Invalid rule list', { errors: formatIssues(result.error) });
  }
  assertUniqueIds('rule', result.data);
  return result.data;
}

/**
 * Validate a full replacement chain list.
 */
export function parseChains(input: unknown): Chain[] {
  const result = z.array(chainSchema).safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError('Invalid chain list', { errors: formatIssues(result.error) });
  }
  assertUniqueIds('chain', result.data);
  return result.data;
}
