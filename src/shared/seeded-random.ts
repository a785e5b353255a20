const RANDOM_UINT32_INCREMENT = 0x6d2b79f5;
const UINT32_MAX_PLUS_ONE = 4_294_967_296;
const SEED_MIX_MULTIPLIER = 0x9e3779b1;
const ZERO = 0;
const ONE = 1;

/**
 * Source of uniform randomness consumed by the generation loop.
 * Tests inject fixed implementations to pin candidate choices.
 */
export interface RandomSource {
  next: () => number;
  nextInt: (minInclusive: number, maxInclusive: number) => number;
}

export class RandomRangeError extends Error {
  readonly code = 'random.invalid-range';
  readonly context: Readonly<Record<string, unknown>>;

  constructor(message: string, context: Readonly<Record<string, unknown>>) {
    super(`[seeded-random] ${message}`);
    this.name = 'RandomRangeError';
    this.context = context;
  }
}

export function normalizeSeed(seed: number): number {
  if (!Number.isFinite(seed)) {
    throw new RandomRangeError('Seed must be a finite number.', { seed });
  }

  return Math.trunc(seed) >>> ZERO;
}

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let state = normalizeSeed(seed);

  const next = (): number => {
    state = (state + RANDOM_UINT32_INCREMENT) >>> ZERO;
    let mixed = state;
    mixed = Math.imul(mixed ^ (mixed >>> 15), mixed | ONE);
    mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
    return ((mixed ^ (mixed >>> 14)) >>> ZERO) / UINT32_MAX_PLUS_ONE;
  };

  return {
    next,
    nextInt: (minInclusive, maxInclusive) => {
      if (!Number.isInteger(minInclusive) || !Number.isInteger(maxInclusive)) {
        throw new RandomRangeError('Random integer bounds must be integers.', {
          minInclusive,
          maxInclusive,
        });
      }

      if (maxInclusive < minInclusive) {
        throw new RandomRangeError('Random integer bounds are invalid: max must be >= min.', {
          minInclusive,
          maxInclusive,
        });
      }

      const span = maxInclusive - minInclusive + ONE;
      return minInclusive + Math.floor(next() * span);
    },
  };
}

/**
 * Derives an independent uint32 seed for a sub-stream (a unit or a trial) so
 * sibling streams do not start from neighbouring states.
 */
export function deriveSeed(baseSeed: number, streamIndex: number): number {
  let mixed = (normalizeSeed(baseSeed) ^ Math.imul(streamIndex + ONE, SEED_MIX_MULTIPLIER)) >>> ZERO;
  mixed = Math.imul(mixed ^ (mixed >>> 16), 0x85ebca6b);
  mixed = Math.imul(mixed ^ (mixed >>> 13), 0xc2b2ae35);
  return (mixed ^ (mixed >>> 16)) >>> ZERO;
}
