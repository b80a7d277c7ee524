/**
 * PageRank tests — sampling estimator.
 */

import { samplePagerank, sampleVisits } from '../src/pagerank.js';
import { iteratePagerank } from '../src/iterate.js';
import { linkGraph } from '../src/graph.js';
import { PreconditionError } from '../src/errors.js';
import { type RandomSource, seededRandom } from '../src/random.js';
import { maxAbsDifference, rankSum } from '../src/ranks.js';

/** Replays `values` in order, then fails the test if asked for more. */
function scripted(values: number[]): RandomSource {
  let i = 0;
  return () => {
    if (i >= values.length) throw new Error('scripted random source exhausted');
    return values[i++];
  };
}

describe('PageRank sampling', () => {

  describe('visit sequence with a scripted random source', () => {
    const graph = linkGraph({ a: ['b'], b: ['a'] });

    test('each step draws from the current page distribution', () => {
      // start: uniform over [a, b], 0.0 -> a
      // from a (d=0.5): a=0.25, b=0.75; 0.1 -> a, 0.9 -> b
      // from b: a=0.75, b=0.25; 0.5 -> a
      const run = sampleVisits(graph, 0.5, 3, scripted([0.0, 0.1, 0.9, 0.5]));
      expect(run.visits.get('a')).toBe(2);
      expect(run.visits.get('b')).toBe(1);
      expect(run.state).toBe('exhausted');
    });

    test('ranks are visit counts over n', () => {
      const ranks = samplePagerank(graph, 0.5, 3, scripted([0.0, 0.1, 0.9, 0.5]));
      expect(ranks.get('a')).toBeCloseTo(2 / 3, 12);
      expect(ranks.get('b')).toBeCloseTo(1 / 3, 12);
    });
  });

  describe('on known graphs', () => {
    test('two pages linking to each other split rank evenly', () => {
      const graph = linkGraph({ '1.html': ['2.html'], '2.html': ['1.html'] });
      const ranks = samplePagerank(graph, 0.85, 10000, seededRandom(7));
      expect(Math.abs((ranks.get('1.html') ?? 0) - 0.5)).toBeLessThan(0.05);
      expect(Math.abs((ranks.get('2.html') ?? 0) - 0.5)).toBeLessThan(0.05);
    });

    test('single page gets rank 1', () => {
      const ranks = samplePagerank(linkGraph({ '1.html': [] }), 0.85, 100);
      expect([...ranks.entries()]).toEqual([['1.html', 1]]);
    });

    test('unvisited pages are still keys', () => {
      // Start is a, every draw lands on the first positive-weight page
      const graph = linkGraph({ a: [], b: [] });
      const ranks = samplePagerank(graph, 0.85, 4, () => 0);
      expect(ranks.get('a')).toBe(1);
      expect(ranks.get('b')).toBe(0);
    });
  });

  describe('agreement with iteration', () => {
    const graph = linkGraph({
      'home.html': ['about.html', 'blog.html'],
      'about.html': ['home.html'],
      'blog.html': ['home.html', 'post.html'],
      'post.html': [],
    });
    const exact = iteratePagerank(graph, 0.85, { tolerance: 1e-10 });

    test('visit counts total exactly n', () => {
      const run = sampleVisits(graph, 0.85, 5000, seededRandom(1));
      let total = 0;
      for (const count of run.visits.values()) total += count;
      expect(total).toBe(5000);
    });

    test('ranks sum to 1', () => {
      const ranks = samplePagerank(graph, 0.85, 10000, seededRandom(2));
      expect(rankSum(ranks)).toBeCloseTo(1, 12);
    });

    test('independent seeds agree with each other and with iteration', () => {
      const first = samplePagerank(graph, 0.85, 20000, seededRandom(11));
      const second = samplePagerank(graph, 0.85, 20000, seededRandom(12));
      expect(maxAbsDifference(first, second)).toBeLessThan(0.05);
      expect(maxAbsDifference(first, exact)).toBeLessThan(0.05);
      expect(maxAbsDifference(second, exact)).toBeLessThan(0.05);
    });

    test('same seed reproduces the same ranks', () => {
      const a = samplePagerank(graph, 0.85, 2000, seededRandom(99));
      const b = samplePagerank(graph, 0.85, 2000, seededRandom(99));
      expect(a).toEqual(b);
    });
  });

  describe('preconditions', () => {
    const graph = linkGraph({ '1.html': ['2.html'], '2.html': [] });

    test('empty graph', () => {
      expect(() => samplePagerank(new Map(), 0.85, 10)).toThrow(PreconditionError);
    });

    test('non-positive or fractional sample count', () => {
      expect(() => samplePagerank(graph, 0.85, 0)).toThrow('Sample count must be a positive integer, got 0');
      expect(() => samplePagerank(graph, 0.85, -3)).toThrow(PreconditionError);
      expect(() => samplePagerank(graph, 0.85, 2.5)).toThrow(PreconditionError);
    });

    test('damping outside (0, 1)', () => {
      expect(() => samplePagerank(graph, 1.2, 10)).toThrow(PreconditionError);
    });
  });
});
