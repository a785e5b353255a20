export { createApplicationLayer } from './application';
export type {
  ApplicationCommand,
  ApplicationEvent,
  ApplicationLayer,
  ApplicationResult,
  GeneratedCrossword,
} from './application';
export { createTelemetryModule, formatEventLine } from './adapters/Telemetry';
export { CrosswordEngineDomainError } from './domain/engine-errors';
export { CrosswordGrid, createGridConfiguration, createEmptyGrid } from './domain/Grid';
export type { GridConfiguration, PlacedWord, WordDirection } from './domain/Grid';
export { rankWords, scoreWords } from './domain/WordRanker';
export { buildIntersectionIndex } from './domain/IntersectionIndex';
export type { IntersectionPoint } from './domain/IntersectionIndex';
export { fitsWord, placeWord } from './domain/Placer';
export { runGenerationLoop, runTrial, seedGrid } from './domain/GenerationLoop';
export type { TrialResult } from './domain/GenerationLoop';
export { runTrialBatch, runTrialUnits, selectBestTrial } from './domain/TrialSelector';
export { describeLayout, renderGridText, wordStartsAt } from './domain/Layout';
export type { CrosswordLayout, LayoutEntry } from './domain/Layout';
export { createSeededRandom, deriveSeed } from './shared/seeded-random';
export type { RandomSource } from './shared/seeded-random';
