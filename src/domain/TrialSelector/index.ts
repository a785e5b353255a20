import {
  DEFAULT_INITIAL_PLACEMENT,
  DEFAULT_TRIALS_PER_UNIT,
  DEFAULT_UNIT_COUNT,
  type InitialPlacement,
} from '../../config/engine-defaults';
import { createSeededRandom, deriveSeed } from '../../shared/seeded-random';
import type { GridConfiguration } from '../Grid';
import { runTrial, type TrialResult } from '../GenerationLoop';

const ZERO = 0;
const ONE = 1;

export interface TrialBatchRequest {
  readonly words: readonly string[];
  readonly config: GridConfiguration;
  readonly trialCount: number;
  readonly seed: number;
  readonly initialPlacement?: InitialPlacement;
}

export interface TrialBatchResult {
  readonly best: TrialResult | null;
  readonly trialsRun: number;
}

export interface TrialUnitsRequest {
  readonly words: readonly string[];
  readonly config: GridConfiguration;
  readonly seed: number;
  readonly trialsPerUnit?: number;
  readonly unitCount?: number;
  readonly initialPlacement?: InitialPlacement;
  readonly signal?: AbortSignal;
  readonly onUnitCompleted?: (report: TrialUnitReport) => void;
}

export interface TrialUnitReport {
  readonly unitIndex: number;
  readonly unitSeed: number;
  readonly trialsRun: number;
  readonly bestDensity: number | null;
  readonly cancelled: boolean;
}

export interface TrialUnitsResult {
  readonly best: TrialResult | null;
  readonly trialsRun: number;
  readonly cancelled: boolean;
  readonly units: readonly TrialUnitReport[];
}

/** Max by density; the first of equal results wins. */
export function selectBestTrial(results: Iterable<TrialResult | null>): TrialResult | null {
  let best: TrialResult | null = null;

  for (const result of results) {
    if (!result) {
      continue;
    }

    if (!best || result.density > best.density) {
      best = result;
    }
  }

  return best;
}

function runSingleTrial(request: TrialBatchRequest, trialIndex: number): TrialResult | null {
  const trialSeed = deriveSeed(request.seed, trialIndex);
  return selectBestTrial(
    runTrial(request.words, request.config, createSeededRandom(trialSeed), {
      initialPlacement: request.initialPlacement ?? DEFAULT_INITIAL_PLACEMENT,
      seed: trialSeed,
    }),
  );
}

export function runTrialBatch(request: TrialBatchRequest): TrialBatchResult {
  let best: TrialResult | null = null;

  for (let trialIndex = ZERO; trialIndex < request.trialCount; trialIndex += ONE) {
    best = selectBestTrial([best, runSingleTrial(request, trialIndex)]);
  }

  return { best, trialsRun: Math.max(request.trialCount, ZERO) };
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(() => {
      resolve();
    });
  });
}

async function runTrialUnit(
  request: TrialBatchRequest,
  signal: AbortSignal | undefined,
): Promise<TrialBatchResult & { readonly cancelled: boolean }> {
  let best: TrialResult | null = null;
  let trialsRun = ZERO;

  for (let trialIndex = ZERO; trialIndex < request.trialCount; trialIndex += ONE) {
    // Units interleave on one event loop; each trial boundary is a cancellation point.
    await yieldToEventLoop();

    if (signal?.aborted) {
      return { best, trialsRun, cancelled: true };
    }

    best = selectBestTrial([best, runSingleTrial(request, trialIndex)]);
    trialsRun += ONE;
  }

  return { best, trialsRun, cancelled: false };
}

/**
 * Runs independent trial batches as concurrent task units and folds their
 * local bests in unit order, so completion order never affects the result.
 */
export async function runTrialUnits(request: TrialUnitsRequest): Promise<TrialUnitsResult> {
  const unitCount = request.unitCount ?? DEFAULT_UNIT_COUNT;
  const trialsPerUnit = request.trialsPerUnit ?? DEFAULT_TRIALS_PER_UNIT;

  const unitRuns = Array.from({ length: unitCount }, async (_, unitIndex) => {
    const unitSeed = deriveSeed(request.seed, unitIndex);
    const outcome = await runTrialUnit(
      {
        words: request.words,
        config: request.config,
        trialCount: trialsPerUnit,
        seed: unitSeed,
        initialPlacement: request.initialPlacement,
      },
      request.signal,
    );
    const report: TrialUnitReport = {
      unitIndex,
      unitSeed,
      trialsRun: outcome.trialsRun,
      bestDensity: outcome.best?.density ?? null,
      cancelled: outcome.cancelled,
    };

    request.onUnitCompleted?.(report);
    return { outcome, report };
  });

  const settled = await Promise.all(unitRuns);

  return {
    best: selectBestTrial(settled.map(({ outcome }) => outcome.best)),
    trialsRun: settled.reduce((total, { outcome }) => total + outcome.trialsRun, ZERO),
    cancelled: settled.some(({ outcome }) => outcome.cancelled),
    units: settled.map(({ report }) => report),
  };
}
