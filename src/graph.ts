/**
 * Link graph — page → set of pages it links to, restricted to the corpus.
 *
 * Built once per run and only read afterwards. Both estimators share the
 * same instance.
 */

import { PreconditionError } from './errors.js';

export type Page = string;

export type LinkGraph = ReadonlyMap<Page, ReadonlySet<Page>>;

/** Plain-object form used on the wire and in fixtures. */
export type LinkRecord = Record<Page, readonly Page[]>;

/**
 * Build a LinkGraph from a plain object and check its invariants.
 */
export function linkGraph(record: LinkRecord): LinkGraph {
  const graph = new Map<Page, ReadonlySet<Page>>();
  for (const [page, links] of Object.entries(record)) {
    graph.set(page, new Set(links));
  }
  assertLinkGraph(graph);
  return graph;
}

/**
 * Throws PreconditionError if a page links to itself or to a page that is
 * not a key of the graph.
 */
export function assertLinkGraph(graph: LinkGraph): void {
  for (const [page, links] of graph) {
    for (const target of links) {
      if (target === page) {
        throw new PreconditionError(`Page "${page}" links to itself`);
      }
      if (!graph.has(target)) {
        throw new PreconditionError(`Page "${page}" links to "${target}", which is not in the graph`);
      }
    }
  }
}

export function assertNonEmpty(graph: LinkGraph): void {
  if (graph.size === 0) {
    throw new PreconditionError('Link graph is empty');
  }
}

/** Inverse of linkGraph; pages and links sorted by name. */
export function toLinkRecord(graph: LinkGraph): Record<Page, Page[]> {
  const record: Record<Page, Page[]> = {};
  for (const page of [...graph.keys()].sort()) {
    record[page] = [...(graph.get(page) ?? [])].sort();
  }
  return record;
}
