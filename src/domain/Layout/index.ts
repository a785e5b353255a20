import { TEXT_EMPTY_CELL } from '../../config/engine-defaults';
import type { CrosswordGrid } from '../Grid';

const ZERO = 0;
const ONE = 1;
const MIN_ENTRY_LENGTH = 2;

export type EntryDirection = 'across' | 'down';

export interface LayoutEntry {
  readonly number: number;
  readonly direction: EntryDirection;
  readonly x: number;
  readonly y: number;
  readonly answer: string;
  readonly length: number;
}

export interface CrosswordLayout {
  readonly across: readonly LayoutEntry[];
  readonly down: readonly LayoutEntry[];
  /** Row-major, one row per grid line. */
  readonly numbers: readonly (readonly (number | null)[])[];
}

function step(direction: EntryDirection): { dx: number; dy: number } {
  return direction === 'across' ? { dx: ONE, dy: ZERO } : { dx: ZERO, dy: ONE };
}

/** True when a run of two or more letters begins at the cell. */
export function wordStartsAt(
  grid: CrosswordGrid,
  x: number,
  y: number,
  direction: EntryDirection,
): boolean {
  const { dx, dy } = step(direction);

  return (
    grid.hasLetterAt(x, y) &&
    !grid.hasLetterAt(x - dx, y - dy) &&
    grid.hasLetterAt(x + dx, y + dy)
  );
}

export function readRun(
  grid: CrosswordGrid,
  x: number,
  y: number,
  direction: EntryDirection,
): string {
  const { dx, dy } = step(direction);
  const limit = direction === 'across' ? grid.width : grid.height;
  let answer = '';

  for (let offset = ZERO; offset < limit; offset += ONE) {
    const cellX = x + dx * offset;
    const cellY = y + dy * offset;

    if (!grid.hasLetterAt(cellX, cellY)) {
      break;
    }

    answer += grid.charAt(cellX, cellY) ?? '';
  }

  return answer;
}

export function describeLayout(grid: CrosswordGrid): CrosswordLayout {
  const across: LayoutEntry[] = [];
  const down: LayoutEntry[] = [];
  const numbers: (number | null)[][] = [];
  let nextNumber = ONE;

  for (let y = ZERO; y < grid.height; y += ONE) {
    const numberRow: (number | null)[] = [];

    for (let x = ZERO; x < grid.width; x += ONE) {
      const startedEntries: Array<{ direction: EntryDirection; answer: string }> = [];

      for (const direction of ['across', 'down'] as const) {
        if (!wordStartsAt(grid, x, y, direction)) {
          continue;
        }

        const answer = readRun(grid, x, y, direction);
        if (answer.length >= MIN_ENTRY_LENGTH) {
          startedEntries.push({ direction, answer });
        }
      }

      if (startedEntries.length === ZERO) {
        numberRow.push(null);
        continue;
      }

      for (const { direction, answer } of startedEntries) {
        const entry: LayoutEntry = {
          number: nextNumber,
          direction,
          x,
          y,
          answer,
          length: answer.length,
        };
        (direction === 'across' ? across : down).push(entry);
      }

      numberRow.push(nextNumber);
      nextNumber += ONE;
    }

    numbers.push(numberRow);
  }

  return { across, down, numbers };
}

export function renderGridText(
  grid: CrosswordGrid,
  emptyMarker: string = TEXT_EMPTY_CELL,
): readonly string[] {
  return grid.rows(emptyMarker);
}
