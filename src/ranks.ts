import type { Page } from './graph.js';

export const SUM_TOLERANCE = 1e-9;

export function rankSum(ranks: ReadonlyMap<Page, number>): number {
  let sum = 0;
  for (const value of ranks.values()) sum += value;
  return sum;
}

/** Throws RangeError when the ranks do not sum to 1 within `tolerance`. */
export function assertSumsToOne(ranks: ReadonlyMap<Page, number>, tolerance: number = SUM_TOLERANCE): void {
  const sum = rankSum(ranks);
  if (Math.abs(sum - 1) > tolerance) {
    throw new RangeError(`Ranks sum to ${sum}, expected 1 ± ${tolerance}`);
  }
}

/** counts / total for every page; total must be positive. */
export function normalizeCounts(counts: ReadonlyMap<Page, number>, total: number): Map<Page, number> {
  if (!(total > 0)) {
    throw new RangeError(`Cannot normalize by ${total}`);
  }
  const ranks = new Map<Page, number>();
  for (const [page, count] of counts) {
    ranks.set(page, count / total);
  }
  return ranks;
}

/** Largest absolute difference between two results over the pages of `a`. */
export function maxAbsDifference(a: ReadonlyMap<Page, number>, b: ReadonlyMap<Page, number>): number {
  let max = 0;
  for (const [page, value] of a) {
    const diff = Math.abs(value - (b.get(page) ?? 0));
    if (diff > max) max = diff;
  }
  return max;
}

/** Plain object with pages in name order, for JSON output. */
export function ranksToObject(ranks: ReadonlyMap<Page, number>): Record<Page, number> {
  const out: Record<Page, number> = {};
  for (const page of [...ranks.keys()].sort()) {
    out[page] = ranks.get(page) ?? 0;
  }
  return out;
}

/** One `  page: 0.1234` line per page, sorted by name. */
export function formatRanks(ranks: ReadonlyMap<Page, number>, digits: number = 4): string[] {
  return [...ranks.keys()].sort().map(page => `  ${page}: ${(ranks.get(page) ?? 0).toFixed(digits)}`);
}
