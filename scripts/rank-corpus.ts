#!/usr/bin/env node
/**
 * rank-corpus.ts — crawl a directory of HTML pages and print both rankings.
 *
 * Usage:
 *   npx tsx scripts/rank-corpus.ts <corpus> [--samples N] [--damping D] [--seed S]
 *
 * Flags override PAGERANK_SAMPLES / PAGERANK_DAMPING. Without --seed the walk
 * uses Math.random and varies between runs.
 */

import { loadConfig, SeedSchema } from '../src/config.js';
import { crawl } from '../src/crawl.js';
import { PagerankError } from '../src/errors.js';
import { iterateRanks } from '../src/iterate.js';
import { samplePagerank } from '../src/pagerank.js';
import { seededRandom } from '../src/random.js';
import { assertSumsToOne, formatRanks } from '../src/ranks.js';

const USAGE = 'Usage: npx tsx scripts/rank-corpus.ts <corpus> [--samples N] [--damping D] [--seed S]';

interface CliArgs {
  corpus: string;
  samples?: number;
  damping?: number;
  seed?: number;
}

export function parseArgs(argv: string[]): CliArgs | null {
  const positional: string[] = [];
  const flags: Record<string, number> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const value = Number(argv[++i]);
    if (!['samples', 'damping', 'seed'].includes(name) || Number.isNaN(value)) return null;
    flags[name] = value;
  }

  if (positional.length !== 1) return null;
  if (flags.seed !== undefined && !SeedSchema.safeParse(flags.seed).success) return null;
  return { corpus: positional[0], samples: flags.samples, damping: flags.damping, seed: flags.seed };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exit(1);
  }

  const config = loadConfig();
  const damping = args.damping ?? config.damping;
  const samples = args.samples ?? config.samples;
  const random = args.seed === undefined ? Math.random : seededRandom(args.seed);

  const corpus = await crawl(args.corpus);

  const sampled = samplePagerank(corpus, damping, samples, random);
  assertSumsToOne(sampled);
  console.log(`PageRank Results from Sampling (n = ${samples})`);
  for (const line of formatRanks(sampled)) console.log(line);

  const iterated = iterateRanks(corpus, damping, { tolerance: config.tolerance, maxIterations: config.maxIterations });
  assertSumsToOne(iterated.ranks);
  console.log('PageRank Results from Iteration');
  for (const line of formatRanks(iterated.ranks)) console.log(line);
}

if (require.main === module) {
  main().catch((error) => {
    if (error instanceof PagerankError) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      console.error('Fatal error in main():', error);
    }
    process.exit(1);
  });
}
