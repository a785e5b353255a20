import { describe, expect, it } from 'vitest';

import { CrosswordGrid, createGridConfiguration } from '../src/domain/Grid';
import {
  buildIntersectionIndex,
  isHorizontallyEligible,
  isVerticallyEligible,
  pointsForChar,
  resolveAllowedDirection,
} from '../src/domain/IntersectionIndex';

const FIVE_BY_FIVE = createGridConfiguration({ width: 5, height: 5 });

function tarAcross(): CrosswordGrid {
  return CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(1, 2, false, 'TAR');
}

describe('IntersectionIndex', () => {
  it('offers the perpendicular direction on the letters of a lone word', () => {
    const index = buildIntersectionIndex(tarAcross());

    expect([...index.keys()]).toEqual(['T', 'A', 'R']);
    expect(index.get('T')).toEqual([{ char: 'T', x: 1, y: 2, allowedDirection: 'vertical' }]);
    expect(index.get('A')).toEqual([{ char: 'A', x: 2, y: 2, allowedDirection: 'vertical' }]);
    expect(index.get('R')).toEqual([{ char: 'R', x: 3, y: 2, allowedDirection: 'vertical' }]);
  });

  it('records only horizontal for a cell open in both directions', () => {
    const grid = CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(2, 2, false, 'Q');

    expect(isHorizontallyEligible(grid, 2, 2)).toBe(true);
    expect(isVerticallyEligible(grid, 2, 2)).toBe(true);
    expect(resolveAllowedDirection(grid, 2, 2)).toBe('horizontal');
    expect(pointsForChar(grid, 'Q')).toEqual([
      { char: 'Q', x: 2, y: 2, allowedDirection: 'horizontal' },
    ]);
  });

  it('omits crossing cells and cells hemmed in on both sides', () => {
    const grid = tarAcross().withWordPlaced(2, 2, true, 'ART');
    const index = buildIntersectionIndex(grid);

    expect(index.has('A')).toBe(false);
    expect(index.get('T')).toEqual([
      { char: 'T', x: 1, y: 2, allowedDirection: 'vertical' },
      { char: 'T', x: 2, y: 4, allowedDirection: 'horizontal' },
    ]);
    expect(index.get('R')).toEqual([{ char: 'R', x: 3, y: 2, allowedDirection: 'vertical' }]);
    expect(resolveAllowedDirection(grid, 2, 3)).toBeNull();
  });

  it('reads past-the-edge corners as free space', () => {
    const grid = CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(0, 1, true, 'CAT');

    expect(buildIntersectionIndex(grid).get('A')).toEqual([
      { char: 'A', x: 0, y: 2, allowedDirection: 'horizontal' },
    ]);
  });

  it('looks across the left/right edge only when wrap is enabled', () => {
    const build = (wrap: boolean): CrosswordGrid =>
      CrosswordGrid.empty(createGridConfiguration({ width: 6, height: 5, wrap }))
        .withWordPlaced(0, 1, true, 'CAT')
        .withWordPlaced(5, 0, true, 'NO')
        .withWordPlaced(1, 3, false, 'E');

    const wrapped = build(true);
    const flat = build(false);

    expect(wrapped.hasLetterAt(-1, 1)).toBe(true);
    expect(flat.hasLetterAt(-1, 1)).toBe(false);
    expect(resolveAllowedDirection(wrapped, 0, 2)).toBeNull();
    expect(resolveAllowedDirection(flat, 0, 2)).toBe('horizontal');
  });

  it('caches the index per grid value', () => {
    const grid = tarAcross();
    const next = grid.withWordPlaced(2, 2, true, 'ART');

    expect(buildIntersectionIndex(grid)).toBe(buildIntersectionIndex(grid));
    expect(grid.intersections()).toBe(buildIntersectionIndex(grid));
    expect(buildIntersectionIndex(next)).not.toBe(buildIntersectionIndex(grid));
  });
});
