/**
 * Corpus crawler — turns a directory of HTML pages into a LinkGraph.
 *
 * Only files ending in `.html` directly inside the directory are pages.
 * Links are the double-quoted `href` values of `<a>` tags; a page's link to
 * itself and links to files outside the corpus are dropped.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { CorpusError } from './errors.js';
import type { LinkGraph, Page } from './graph.js';

const LINK_PATTERN = /<a\s+(?:[^>]*?)href="([^"]*)"/g;

export function extractLinks(html: string): Set<string> {
  const links = new Set<string>();
  for (const match of html.matchAll(LINK_PATTERN)) {
    links.add(match[1]);
  }
  return links;
}

export async function crawl(directory: string): Promise<LinkGraph> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    throw new CorpusError(directory, error);
  }

  const raw = new Map<Page, Set<string>>();
  for (const filename of entries.sort()) {
    if (!filename.endsWith('.html')) continue;
    const filePath = path.join(directory, filename);
    let html: string;
    try {
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) continue;
      html = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new CorpusError(directory, error, filePath);
    }

    const links = extractLinks(html);
    links.delete(filename);
    raw.set(filename, links);
  }

  // Keep only links to other pages of the corpus
  const graph = new Map<Page, ReadonlySet<Page>>();
  for (const [page, links] of raw) {
    graph.set(page, new Set([...links].filter(link => raw.has(link))));
  }
  return graph;
}
