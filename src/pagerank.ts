/**
 * PageRank sampling — rank as the long-run visit frequency of a random surfer.
 *
 * One walk of `n` steps. The first page is drawn uniformly; every step draws
 * the next page from the transition model of the current one and records a
 * visit to it. The start page itself is not counted, so the counts total
 * exactly `n` and the ranks sum to exactly 1.
 *
 * Non-deterministic unless a seeded RandomSource is passed. The estimate
 * approaches the stationary distribution as `n` grows.
 */

import { assertDamping, PreconditionError } from './errors.js';
import { type LinkGraph, type Page, assertNonEmpty } from './graph.js';
import { type RandomSource, weightedChoice } from './random.js';
import { normalizeCounts } from './ranks.js';
import { transitionModel } from './transition.js';

export const DEFAULT_SAMPLES = 10000;

export interface SampleRun {
  visits: Map<Page, number>;
  samples: number;
  state: 'exhausted';
}

/**
 * Walk `n` steps and return the raw visit counts.
 *
 * @param random Source of uniform floats. Default Math.random.
 */
export function sampleVisits(
  graph: LinkGraph,
  damping: number,
  n: number = DEFAULT_SAMPLES,
  random: RandomSource = Math.random,
): SampleRun {
  assertNonEmpty(graph);
  assertDamping(damping);
  if (!Number.isInteger(n) || n <= 0) {
    throw new PreconditionError(`Sample count must be a positive integer, got ${n}`);
  }

  const pages = [...graph.keys()];
  const visits = new Map<Page, number>();
  for (const page of pages) visits.set(page, 0);

  let current = weightedChoice(pages, pages.map(() => 1), random);

  for (let i = 0; i < n; i++) {
    const distribution = transitionModel(graph, current, damping);
    current = weightedChoice([...distribution.keys()], [...distribution.values()], random);
    visits.set(current, (visits.get(current) ?? 0) + 1);
  }

  return { visits, samples: n, state: 'exhausted' };
}

/**
 * Estimate PageRank by sampling `n` steps of the surfer's walk.
 * Every page of the graph is a key of the result.
 */
export function samplePagerank(
  graph: LinkGraph,
  damping: number,
  n: number = DEFAULT_SAMPLES,
  random: RandomSource = Math.random,
): Map<Page, number> {
  const run = sampleVisits(graph, damping, n, random);
  return normalizeCounts(run.visits, run.samples);
}
