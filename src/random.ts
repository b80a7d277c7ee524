/**
 * Random sources for the sampling estimator.
 *
 * Each run takes its own source so concurrent runs never share a stream.
 */

/** Returns a float in [0, 1). Math.random satisfies this. */
export type RandomSource = () => number;

/**
 * mulberry32 — small 32-bit generator, good enough for walk sampling and
 * reproducible across platforms.
 *
 * @param seed Unsigned 32-bit integer. Anything else throws RangeError, since
 *             wider seeds would wrap onto the same stream.
 */
export function seededRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    throw new RangeError(`Seed must be an integer in [0, 4294967295], got ${seed}`);
  }
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw one item with probability proportional to its weight.
 *
 * Walks the cumulative sum. If rounding leaves the target past the total,
 * the last item with positive weight is returned.
 */
export function weightedChoice<T>(items: readonly T[], weights: readonly number[], random: RandomSource): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new RangeError(`weightedChoice needs matching non-empty arrays (${items.length} items, ${weights.length} weights)`);
  }

  let total = 0;
  for (const w of weights) total += w;

  const target = random() * total;
  let cumulative = 0;
  let last = -1;
  for (let i = 0; i < items.length; i++) {
    if (weights[i] <= 0) continue;
    cumulative += weights[i];
    last = i;
    if (target < cumulative) return items[i];
  }

  if (last < 0) {
    throw new RangeError('weightedChoice needs at least one positive weight');
  }
  return items[last];
}
