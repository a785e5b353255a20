export const EMPTY_CELL = ' ';
export const TEXT_EMPTY_CELL = '.';
export const DEFAULT_TRIALS_PER_UNIT = 1_000;
export const DEFAULT_UNIT_COUNT = 4;
export const DEFAULT_SEED = 20_240_101;
export const DEFAULT_GRID_WIDTH = 15;
export const DEFAULT_GRID_HEIGHT = 15;
export const TELEMETRY_BUFFER_LIMIT = 500;

export const INITIAL_PLACEMENTS = Object.freeze({
  center: 'center',
  random: 'random',
});

export type InitialPlacement = (typeof INITIAL_PLACEMENTS)[keyof typeof INITIAL_PLACEMENTS];

export const DEFAULT_INITIAL_PLACEMENT: InitialPlacement = INITIAL_PLACEMENTS.center;
