/**
 * Transition model — one step of the random surfer.
 *
 * With probability `damping` the surfer follows one of the current page's
 * links, chosen uniformly; otherwise it jumps to any page of the corpus.
 * A dangling page (no links) jumps uniformly, so no rank mass is lost.
 */

import { assertDamping, PreconditionError } from './errors.js';
import { type LinkGraph, type Page, assertNonEmpty } from './graph.js';

/**
 * Probability of moving from `page` to each page of the graph.
 * Every page of the graph is a key; the values sum to 1.
 */
export function transitionModel(graph: LinkGraph, page: Page, damping: number): Map<Page, number> {
  assertNonEmpty(graph);
  assertDamping(damping);

  const links = graph.get(page);
  if (links === undefined) {
    throw new PreconditionError(`Page "${page}" is not in the graph`);
  }

  const n = graph.size;
  const distribution = new Map<Page, number>();

  // Dangling page: uniform over the whole corpus
  if (links.size === 0) {
    for (const target of graph.keys()) {
      distribution.set(target, 1 / n);
    }
    return distribution;
  }

  const teleport = (1 - damping) / n;
  const follow = damping / links.size;
  for (const target of graph.keys()) {
    distribution.set(target, links.has(target) ? follow + teleport : teleport);
  }
  return distribution;
}
