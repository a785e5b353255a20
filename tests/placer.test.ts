import { describe, expect, it } from 'vitest';

import { CrosswordGrid, createGridConfiguration } from '../src/domain/Grid';
import { fitsWord, isSpanInBounds, placeWord } from '../src/domain/Placer';

const FIVE_BY_FIVE = createGridConfiguration({ width: 5, height: 5 });

function tarAcross(): CrosswordGrid {
  return CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(1, 2, false, 'TAR');
}

function catDown(wrap: boolean): CrosswordGrid {
  return CrosswordGrid.empty(createGridConfiguration({ width: 6, height: 5, wrap })).withWordPlaced(
    0,
    1,
    true,
    'CAT',
  );
}

describe('fitsWord', () => {
  it('accepts a crossing through a matching letter', () => {
    expect(fitsWord(tarAcross(), 'ART', true, 2, 2)).toBe(true);
    expect(fitsWord(tarAcross(), 'CAT', true, 1, 0)).toBe(true);
  });

  it('never overwrites a different letter', () => {
    expect(fitsWord(tarAcross(), 'CAB', true, 1, 0)).toBe(false);
  });

  it('rejects placements without any crossing', () => {
    expect(fitsWord(tarAcross(), 'DOG', false, 0, 0)).toBe(false);
  });

  it('rejects a new letter beside an unrelated word', () => {
    const grid = tarAcross().withWordPlaced(3, 3, false, 'E');

    expect(fitsWord(grid, 'ART', true, 2, 2)).toBe(false);
  });

  it('requires clear cells right before and after the word', () => {
    expect(fitsWord(tarAcross(), 'AT', true, 2, 2)).toBe(true);
    expect(fitsWord(tarAcross().withWordPlaced(2, 4, false, 'Z'), 'AT', true, 2, 2)).toBe(false);

    expect(fitsWord(tarAcross(), 'RA', true, 2, 1)).toBe(true);
    expect(fitsWord(tarAcross().withWordPlaced(2, 0, false, 'Z'), 'RA', true, 2, 1)).toBe(false);
  });

  it('rejects spans that leave the grid', () => {
    expect(fitsWord(tarAcross(), 'TARTS', true, 1, 2)).toBe(false);
    expect(fitsWord(catDown(false), 'BOA', false, -2, 2)).toBe(false);
  });

  it('accepts a horizontal span split across the wrapped edge', () => {
    expect(fitsWord(catDown(true), 'BOA', false, -2, 2)).toBe(true);
    expect(fitsWord(catDown(true), 'BOA', false, 4, 2)).toBe(true);
  });

  it('rejects wrapped horizontal words as wide as the grid', () => {
    expect(fitsWord(catDown(true), 'ABCDEF', false, 1, 2)).toBe(false);
  });
});

describe('isSpanInBounds', () => {
  it('keeps vertical spans inside the rows even with wrap', () => {
    const grid = catDown(true);

    expect(isSpanInBounds(grid, 3, { x: 2, y: 2, vertical: true })).toBe(true);
    expect(isSpanInBounds(grid, 3, { x: 2, y: 3, vertical: true })).toBe(false);
    expect(isSpanInBounds(grid, 3, { x: 2, y: -1, vertical: true })).toBe(false);
  });

  it('allows any horizontal start under wrap when the word is narrower than the grid', () => {
    expect(isSpanInBounds(catDown(true), 3, { x: -2, y: 2, vertical: false })).toBe(true);
    expect(isSpanInBounds(catDown(true), 6, { x: 0, y: 2, vertical: false })).toBe(false);
    expect(isSpanInBounds(catDown(false), 3, { x: -2, y: 2, vertical: false })).toBe(false);
    expect(isSpanInBounds(catDown(false), 6, { x: 0, y: 2, vertical: false })).toBe(true);
  });
});

describe('placeWord', () => {
  it('returns one candidate per compatible crossing', () => {
    const candidates = placeWord(tarAcross(), 'ART');

    expect(candidates.map((candidate) => candidate.placements.at(-1))).toEqual([
      { word: 'ART', x: 2, y: 2, vertical: true },
      { word: 'ART', x: 3, y: 1, vertical: true },
      { word: 'ART', x: 1, y: 0, vertical: true },
    ]);
    expect(candidates[0]?.rows('.')).toEqual(['.....', '.....', '.TAR.', '..R..', '..T..']);
  });

  it('tries every index of a repeated letter against the same point', () => {
    const candidates = placeWord(tarAcross(), 'TOT');

    expect(candidates.map((candidate) => candidate.placements.at(-1))).toEqual([
      { word: 'TOT', x: 1, y: 2, vertical: true },
      { word: 'TOT', x: 1, y: 0, vertical: true },
    ]);
  });

  it('leaves the parent grid untouched', () => {
    const grid = tarAcross();
    placeWord(grid, 'ART');

    expect(grid.placements).toHaveLength(1);
    expect(grid.rows('.')).toEqual(['.....', '.....', '.TAR.', '.....', '.....']);
  });

  it('returns nothing for placed words, unrelated letters or over-long words', () => {
    expect(placeWord(tarAcross(), 'TAR')).toEqual([]);
    expect(placeWord(tarAcross(), 'DOG')).toEqual([]);
    expect(placeWord(tarAcross(), 'TARTARE')).toEqual([]);
    expect(placeWord(tarAcross(), '')).toEqual([]);
  });

  it('crosses on the same UTF-16 units the grid stores', () => {
    const grid = CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(0, 2, false, '\u{1D538}Z');
    const candidates = placeWord(grid, 'B\u{1D538}');

    expect(candidates.map((candidate) => candidate.placements.at(-1))).toEqual([
      { word: 'B\u{1D538}', x: 0, y: 1, vertical: true },
      { word: 'B\u{1D538}', x: 1, y: 0, vertical: true },
    ]);
    expect(candidates[0]?.charAt(0, 3)).toBe('\uDD38');
  });

  it('places across the wrapped edge when the start column is negative', () => {
    const candidates = placeWord(catDown(true), 'BOA');

    expect(candidates).toHaveLength(1);
    expect(candidates[0]?.placements.at(-1)).toEqual({ word: 'BOA', x: 4, y: 2, vertical: false });
    expect(candidates[0]?.rows('.')[2]).toEqual('A...BO');
    expect(placeWord(catDown(false), 'BOA')).toEqual([]);
  });
});
