import type { CrosswordGrid, WordDirection } from '../Grid';

const ZERO = 0;
const ONE = 1;

export interface IntersectionPoint {
  readonly char: string;
  readonly x: number;
  readonly y: number;
  readonly allowedDirection: WordDirection;
}

export type IntersectionIndex = ReadonlyMap<string, readonly IntersectionPoint[]>;

const indexCache = new WeakMap<CrosswordGrid, IntersectionIndex>();

function isSideOpen(
  grid: CrosswordGrid,
  sideX: number,
  sideY: number,
  horizontal: boolean,
): boolean {
  if (horizontal) {
    return !grid.hasLetterAt(sideX, sideY - ONE) && !grid.hasLetterAt(sideX, sideY + ONE);
  }

  return !grid.hasLetterAt(sideX - ONE, sideY) && !grid.hasLetterAt(sideX + ONE, sideY);
}

export function isHorizontallyEligible(grid: CrosswordGrid, x: number, y: number): boolean {
  if (grid.hasLetterAt(x - ONE, y) || grid.hasLetterAt(x + ONE, y)) {
    return false;
  }

  return isSideOpen(grid, x - ONE, y, true) || isSideOpen(grid, x + ONE, y, true);
}

export function isVerticallyEligible(grid: CrosswordGrid, x: number, y: number): boolean {
  if (grid.hasLetterAt(x, y - ONE) || grid.hasLetterAt(x, y + ONE)) {
    return false;
  }

  return isSideOpen(grid, x, y - ONE, false) || isSideOpen(grid, x, y + ONE, false);
}

/**
 * Resolves the single crossing orientation a filled cell offers. A cell open
 * both ways only offers horizontal.
 */
export function resolveAllowedDirection(
  grid: CrosswordGrid,
  x: number,
  y: number,
): WordDirection | null {
  if (isHorizontallyEligible(grid, x, y)) {
    return 'horizontal';
  }

  if (isVerticallyEligible(grid, x, y)) {
    return 'vertical';
  }

  return null;
}

export function buildIntersectionIndex(grid: CrosswordGrid): IntersectionIndex {
  const cached = indexCache.get(grid);
  if (cached) {
    return cached;
  }

  const index = new Map<string, IntersectionPoint[]>();

  for (let y = ZERO; y < grid.height; y += ONE) {
    for (let x = ZERO; x < grid.width; x += ONE) {
      const char = grid.charAt(x, y);
      if (char === null || !grid.hasLetterAt(x, y)) {
        continue;
      }

      const allowedDirection = resolveAllowedDirection(grid, x, y);
      if (!allowedDirection) {
        continue;
      }

      const points = index.get(char) ?? [];
      points.push({ char, x, y, allowedDirection });
      index.set(char, points);
    }
  }

  indexCache.set(grid, index);
  return index;
}

export function pointsForChar(grid: CrosswordGrid, char: string): readonly IntersectionPoint[] {
  return buildIntersectionIndex(grid).get(char) ?? [];
}
