import type { CrosswordGrid } from '../Grid';
import { pointsForChar } from '../IntersectionIndex';

const ZERO = 0;
const ONE = 1;

export interface PlacementSpan {
  readonly x: number;
  readonly y: number;
  readonly vertical: boolean;
}

function cellAlong(span: PlacementSpan, offset: number): { x: number; y: number } {
  return span.vertical
    ? { x: span.x, y: span.y + offset }
    : { x: span.x + offset, y: span.y };
}

/**
 * Compatibility rule for every non-initial word: no overwrite of a different
 * letter, no new letter flanked by an unrelated word, clear cells at both ends
 * and at least one true crossing.
 */
export function fitsWord(
  grid: CrosswordGrid,
  word: string,
  vertical: boolean,
  x: number,
  y: number,
): boolean {
  const span: PlacementSpan = { x, y, vertical };
  let crossings = ZERO;

  if (!vertical && grid.wrap && word.length >= grid.width) {
    return false;
  }

  for (let offset = ZERO; offset < word.length; offset += ONE) {
    const cell = cellAlong(span, offset);
    const existing = grid.charAt(cell.x, cell.y);

    if (existing === null) {
      return false;
    }

    if (grid.hasLetterAt(cell.x, cell.y)) {
      if (existing !== word[offset]) {
        return false;
      }

      crossings += ONE;
      continue;
    }

    const hasPerpendicularNeighbour = vertical
      ? grid.hasLetterAt(cell.x - ONE, cell.y) || grid.hasLetterAt(cell.x + ONE, cell.y)
      : grid.hasLetterAt(cell.x, cell.y - ONE) || grid.hasLetterAt(cell.x, cell.y + ONE);

    if (hasPerpendicularNeighbour) {
      return false;
    }
  }

  const before = cellAlong(span, -ONE);
  const after = cellAlong(span, word.length);

  if (grid.hasLetterAt(before.x, before.y) || grid.hasLetterAt(after.x, after.y)) {
    return false;
  }

  return crossings > ZERO;
}

/** Whether the span stays on the grid; only horizontal spans may wrap. */
export function isSpanInBounds(grid: CrosswordGrid, length: number, span: PlacementSpan): boolean {
  if (length === ZERO) {
    return false;
  }

  if (span.vertical) {
    return (
      span.x >= ZERO &&
      span.x < grid.width &&
      span.y >= ZERO &&
      span.y + length - ONE < grid.height
    );
  }

  if (span.y < ZERO || span.y >= grid.height) {
    return false;
  }

  if (grid.wrap) {
    // A span as wide as the row would touch its own start.
    return length < grid.width;
  }

  return span.x >= ZERO && span.x + length - ONE < grid.width;
}

// UTF-16 units, matching how the grid stores one unit per cell.
function distinctLetters(word: string): readonly string[] {
  return [...new Set(word.split(''))];
}

/**
 * Every grid reachable by crossing `word` through an indexed point. Identical
 * outcomes from different anchors are kept as separate candidates.
 */
export function placeWord(grid: CrosswordGrid, word: string): readonly CrosswordGrid[] {
  if (word.length === ZERO || grid.hasPlaced(word)) {
    return [];
  }

  const candidates: CrosswordGrid[] = [];

  for (const letter of distinctLetters(word)) {
    for (const point of pointsForChar(grid, letter)) {
      const vertical = point.allowedDirection === 'vertical';

      for (let offset = ZERO; offset < word.length; offset += ONE) {
        if (word[offset] !== letter) {
          continue;
        }

        const span: PlacementSpan = vertical
          ? { x: point.x, y: point.y - offset, vertical }
          : { x: point.x - offset, y: point.y, vertical };

        if (!isSpanInBounds(grid, word.length, span)) {
          continue;
        }

        if (!fitsWord(grid, word, vertical, span.x, span.y)) {
          continue;
        }

        candidates.push(grid.withWordPlaced(span.x, span.y, vertical, word));
      }
    }
  }

  return candidates;
}
