/**
 * PageRank by fixed-point iteration.
 *
 *   rank'(p) = (1-d)/N + d * ( Σ_{i→p} rank(i)/|L(i)|  +  Σ_{i dangling} rank(i)/N )
 *
 * Dangling pages spread their rank evenly over the whole corpus, the same
 * fallback the transition model uses, so the ranks keep summing to 1.
 *
 * Every sweep reads only the previous snapshot: two Float64Array buffers are
 * swapped after each sweep. Stops once the largest per-page change is at
 * most `tolerance`.
 */

import { assertDamping, ConvergenceError, PreconditionError } from './errors.js';
import { type LinkGraph, type Page, assertNonEmpty } from './graph.js';

export const DEFAULT_TOLERANCE = 0.001;
export const DEFAULT_MAX_ITERATIONS = 1000;

/**
 * Sweeps after which a graph must have converged.
 *
 * Each sweep shrinks the L1 distance to the fixed point by a factor of
 * `damping`, and that distance starts at most 2, so the max per-page change
 * of sweep k is at most 4 * damping^(k-1). Never below DEFAULT_MAX_ITERATIONS.
 */
export function maxIterationsFor(damping: number, tolerance: number): number {
  const bound = Math.ceil(Math.log(tolerance / 4) / Math.log(damping)) + 1;
  return Math.max(DEFAULT_MAX_ITERATIONS, bound);
}

export interface IterateOptions {
  /** Largest per-page change accepted as converged. Default 0.001. */
  tolerance?: number;
  /** Sweeps allowed before giving up with ConvergenceError. Default maxIterationsFor(damping, tolerance). */
  maxIterations?: number;
}

export interface IterateRun {
  ranks: Map<Page, number>;
  iterations: number;
  /** Max absolute change in the final sweep. */
  delta: number;
  state: 'converged';
}

export function iterateRanks(graph: LinkGraph, damping: number, options: IterateOptions = {}): IterateRun {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;

  assertNonEmpty(graph);
  assertDamping(damping);
  if (!(tolerance > 0)) {
    throw new PreconditionError(`Tolerance must be positive, got ${tolerance}`);
  }
  const maxIterations = options.maxIterations ?? maxIterationsFor(damping, tolerance);
  if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
    throw new PreconditionError(`Iteration cap must be a positive integer, got ${maxIterations}`);
  }

  const pages = [...graph.keys()];
  const n = pages.length;

  const indexMap = new Map<Page, number>();
  for (let i = 0; i < n; i++) {
    indexMap.set(pages[i], i);
  }

  // Sparse adjacency: forward neighbor indices per page
  const adj: number[][] = new Array(n);
  const dangling: number[] = [];
  for (let i = 0; i < n; i++) {
    const neighbors: number[] = [];
    for (const target of graph.get(pages[i]) ?? []) {
      const j = indexMap.get(target);
      if (j !== undefined) neighbors.push(j);
    }
    adj[i] = neighbors;
    if (neighbors.length === 0) dangling.push(i);
  }

  let rank = new Float64Array(n).fill(1 / n);
  let next = new Float64Array(n);

  const teleport = (1 - damping) / n;

  let delta = Infinity;
  let iter = 0;
  while (iter < maxIterations) {
    iter++;

    let danglingMass = 0;
    for (const i of dangling) danglingMass += rank[i];

    next.fill(teleport + (damping * danglingMass) / n);

    // Scatter each page's share to the pages it links to
    for (let i = 0; i < n; i++) {
      const neighbors = adj[i];
      if (neighbors.length === 0) continue;
      const share = (damping * rank[i]) / neighbors.length;
      for (const j of neighbors) {
        next[j] += share;
      }
    }

    delta = 0;
    for (let i = 0; i < n; i++) {
      const d = Math.abs(next[i] - rank[i]);
      if (d > delta) delta = d;
    }

    // Swap buffers
    const tmp = rank;
    rank = next;
    next = tmp;

    if (delta <= tolerance) {
      const ranks = new Map<Page, number>();
      for (let i = 0; i < n; i++) ranks.set(pages[i], rank[i]);
      return { ranks, iterations: iter, delta, state: 'converged' };
    }
  }

  throw new ConvergenceError(iter, delta, tolerance);
}

/**
 * Compute PageRank by iterating until every page's rank changes by at most
 * `options.tolerance` between sweeps. Deterministic.
 */
export function iteratePagerank(graph: LinkGraph, damping: number, options: IterateOptions = {}): Map<Page, number> {
  return iterateRanks(graph, damping, options).ranks;
}
