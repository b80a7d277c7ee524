import { parseArgs } from '../scripts/rank-corpus.js';

describe('rank-corpus arguments', () => {
  test('corpus only', () => {
    expect(parseArgs(['corpus0'])).toEqual({ corpus: 'corpus0' });
  });

  test('flags in any position', () => {
    expect(parseArgs(['--samples', '500', 'corpus1', '--seed', '3', '--damping', '0.9'])).toEqual({
      corpus: 'corpus1',
      samples: 500,
      damping: 0.9,
      seed: 3,
    });
  });

  test('missing or extra corpus', () => {
    expect(parseArgs([])).toBeNull();
    expect(parseArgs(['a', 'b'])).toBeNull();
  });

  test('unknown flag or non-numeric value', () => {
    expect(parseArgs(['corpus0', '--verbose', '1'])).toBeNull();
    expect(parseArgs(['corpus0', '--samples', 'many'])).toBeNull();
    expect(parseArgs(['corpus0', '--samples'])).toBeNull();
  });

  test('seed must fit in 32 bits', () => {
    expect(parseArgs(['corpus0', '--seed', '-1'])).toBeNull();
    expect(parseArgs(['corpus0', '--seed', '4294967296'])).toBeNull();
    expect(parseArgs(['corpus0', '--seed', '4294967295'])).toEqual({ corpus: 'corpus0', seed: 4294967295 });
  });
});
