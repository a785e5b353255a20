import {
  DEFAULT_INITIAL_PLACEMENT,
  DEFAULT_SEED,
  DEFAULT_TRIALS_PER_UNIT,
  DEFAULT_UNIT_COUNT,
  EMPTY_CELL,
  INITIAL_PLACEMENTS,
  type InitialPlacement,
} from '../config/engine-defaults';
import { parsePositiveSafeInteger } from '../shared/runtime-guards';
import { normalizeSeed } from '../shared/seeded-random';
import { engineError } from './engine-errors';

export interface ExecutionSettings {
  readonly trialsPerUnit: number;
  readonly unitCount: number;
  readonly seed: number;
  readonly initialPlacement: InitialPlacement;
}

export interface ExecutionSettingsInput {
  readonly trialsPerUnit?: unknown;
  readonly unitCount?: unknown;
  readonly seed?: unknown;
  readonly initialPlacement?: unknown;
}

function isInitialPlacement(value: unknown): value is InitialPlacement {
  return value === INITIAL_PLACEMENTS.center || value === INITIAL_PLACEMENTS.random;
}

function resolvePositiveSetting(name: string, value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = parsePositiveSafeInteger(value);
  if (parsed === null) {
    throw engineError('engine.invalid-execution', `${name} must be a positive integer.`, {
      [name]: value,
    });
  }

  return parsed;
}

export function createExecutionSettings(input: ExecutionSettingsInput = {}): ExecutionSettings {
  const trialsPerUnit = resolvePositiveSetting(
    'trialsPerUnit',
    input.trialsPerUnit,
    DEFAULT_TRIALS_PER_UNIT,
  );
  const unitCount = resolvePositiveSetting('unitCount', input.unitCount, DEFAULT_UNIT_COUNT);
  const { seed, initialPlacement } = input;

  if (seed !== undefined && (typeof seed !== 'number' || !Number.isFinite(seed))) {
    throw engineError('engine.invalid-execution', 'seed must be a finite number.', { seed });
  }

  if (initialPlacement !== undefined && !isInitialPlacement(initialPlacement)) {
    throw engineError(
      'engine.invalid-execution',
      'initialPlacement must be either "center" or "random".',
      { initialPlacement },
    );
  }

  return {
    trialsPerUnit,
    unitCount,
    seed: normalizeSeed(seed ?? DEFAULT_SEED),
    initialPlacement: initialPlacement ?? DEFAULT_INITIAL_PLACEMENT,
  };
}

/**
 * Words arrive already sanitized; only values the grid cannot hold are
 * rejected. Duplicates pass through and are skipped during generation.
 */
export function validateWordList(words: readonly unknown[]): readonly string[] {
  const accepted: string[] = [];

  for (const [index, word] of words.entries()) {
    if (typeof word !== 'string' || word.length === 0 || word.includes(EMPTY_CELL)) {
      throw engineError(
        'engine.invalid-words',
        'Words must be non-empty strings without the empty-cell marker.',
        { index, word },
      );
    }

    accepted.push(word);
  }

  return accepted;
}
