import {
  DEFAULT_INITIAL_PLACEMENT,
  type InitialPlacement,
} from '../../config/engine-defaults';
import type { RandomSource } from '../../shared/seeded-random';
import { CrosswordGrid, type GridConfiguration, type WordDirection } from '../Grid';
import { placeWord } from '../Placer';

const ZERO = 0;
const ONE = 1;
const TWO = 2;

export interface GenerationStats {
  readonly iterations: number;
  readonly deferrals: number;
  readonly requeues: number;
}

export interface GenerationOutcome {
  readonly grid: CrosswordGrid;
  readonly stats: GenerationStats;
}

export interface SeededGrid {
  readonly grid: CrosswordGrid;
  readonly seedWord: string | null;
  readonly pending: readonly string[];
}

export interface TrialResult {
  readonly grid: CrosswordGrid;
  readonly density: number;
  readonly seedDirection: WordDirection;
  readonly seedWord: string | null;
  /** Seed of the random stream that produced the run, when known. */
  readonly seed: number | null;
  readonly stats: GenerationStats;
}

export interface TrialOptions {
  readonly initialPlacement?: InitialPlacement;
  readonly seed?: number;
}

export function fitsAlongAxis(
  config: GridConfiguration,
  word: string,
  direction: WordDirection,
): boolean {
  if (word.length === ZERO) {
    return false;
  }

  if (direction === 'vertical') {
    return word.length <= config.height;
  }

  return config.wrap ? word.length < config.width : word.length <= config.width;
}

function resolveSeedOrigin(
  config: GridConfiguration,
  length: number,
  direction: WordDirection,
  placement: InitialPlacement,
  random: RandomSource,
): { x: number; y: number } {
  if (placement === 'random') {
    if (direction === 'vertical') {
      return {
        x: random.nextInt(ZERO, config.width - ONE),
        y: random.nextInt(ZERO, config.height - length),
      };
    }

    return {
      x: random.nextInt(ZERO, config.wrap ? config.width - ONE : config.width - length),
      y: random.nextInt(ZERO, config.height - ONE),
    };
  }

  if (direction === 'vertical') {
    return {
      x: Math.floor(config.width / TWO),
      y: Math.floor((config.height - length) / TWO),
    };
  }

  return {
    x: Math.floor((config.width - length) / TWO),
    y: Math.floor(config.height / TWO),
  };
}

/**
 * Places the first ranked word that fits along `direction` without any
 * crossing requirement. Words skipped for being too long stay pending ahead of
 * the rest, since they may still cross in on the other axis.
 */
export function seedGrid(
  config: GridConfiguration,
  rankedWords: readonly string[],
  direction: WordDirection,
  random: RandomSource,
  placement: InitialPlacement = DEFAULT_INITIAL_PLACEMENT,
): SeededGrid {
  const empty = CrosswordGrid.empty(config);
  const seedIndex = rankedWords.findIndex((word) => fitsAlongAxis(config, word, direction));
  const seedWord = rankedWords[seedIndex];

  if (seedIndex < ZERO || seedWord === undefined) {
    return { grid: empty, seedWord: null, pending: [...rankedWords] };
  }

  const origin = resolveSeedOrigin(config, seedWord.length, direction, placement, random);
  const pending = rankedWords.filter((_, index) => index !== seedIndex);

  return {
    grid: empty.withWordPlaced(origin.x, origin.y, direction === 'vertical', seedWord),
    seedWord,
    pending,
  };
}

/**
 * Places pending words head-first. A word with no legal crossing is deferred;
 * every successful placement puts deferred words back in front of the queue.
 */
export function runGenerationLoop(
  initialGrid: CrosswordGrid,
  words: readonly string[],
  random: RandomSource,
): GenerationOutcome {
  let grid = initialGrid;
  let pending: readonly string[] = words;
  let cursor = ZERO;
  let deferred: string[] = [];
  let iterations = ZERO;
  let deferrals = ZERO;
  let requeues = ZERO;

  while (cursor < pending.length) {
    iterations += ONE;
    const head = pending[cursor];
    cursor += ONE;

    if (head === undefined || grid.hasPlaced(head)) {
      continue;
    }

    const candidates = placeWord(grid, head);
    if (candidates.length === ZERO) {
      deferred.push(head);
      deferrals += ONE;
      continue;
    }

    const chosen = candidates[random.nextInt(ZERO, candidates.length - ONE)];
    if (!chosen) {
      deferred.push(head);
      deferrals += ONE;
      continue;
    }

    grid = chosen;
    if (deferred.length > ZERO) {
      requeues += ONE;
    }

    pending = [...deferred, ...pending.slice(cursor)];
    cursor = ZERO;
    deferred = [];
  }

  return {
    grid,
    stats: { iterations, deferrals, requeues },
  };
}

function runSeededGeneration(
  config: GridConfiguration,
  rankedWords: readonly string[],
  direction: WordDirection,
  random: RandomSource,
  placement: InitialPlacement,
  seed: number | null,
): TrialResult {
  const seeded = seedGrid(config, rankedWords, direction, random, placement);
  const outcome = runGenerationLoop(seeded.grid, seeded.pending, random);

  return {
    grid: outcome.grid,
    density: outcome.grid.density(),
    seedDirection: direction,
    seedWord: seeded.seedWord,
    seed,
    stats: outcome.stats,
  };
}

/**
 * One trial: two independent runs from the top-ranked word, seeded across then
 * down. Both are candidate outputs.
 */
export function runTrial(
  rankedWords: readonly string[],
  config: GridConfiguration,
  random: RandomSource,
  options: TrialOptions = {},
): readonly [TrialResult, TrialResult] {
  const placement = options.initialPlacement ?? DEFAULT_INITIAL_PLACEMENT;
  const seed = options.seed ?? null;

  return [
    runSeededGeneration(config, rankedWords, 'horizontal', random, placement, seed),
    runSeededGeneration(config, rankedWords, 'vertical', random, placement, seed),
  ];
}
