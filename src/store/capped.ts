/**
 * Append to a bounded list, evicting the oldest entries past `limit`.
 * Mutates `list` in place; returns how many entries were evicted.
 */
export function appendCapped<T>(list: T[], item: T, limit: number): number {
  list.push(item);
  const overflow = list.length - Math.max(1, limit);
  if (overflow > 0) {
    list.splice(0, overflow);
    return overflow;
  }
  return 0;
}

/**
 * Newest-first view of the last `limit` entries.
 */
export function newestFirst<T>(list: readonly T[], limit: number): T[] {
  if (limit <= 0) {
    return [];
  }
  return list.slice(-limit).reverse();
}
