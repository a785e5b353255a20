import { describe, expect, it } from 'vitest';

import { CrosswordGrid, createGridConfiguration } from '../src/domain/Grid';
import { describeLayout, readRun, renderGridText, wordStartsAt } from '../src/domain/Layout';

const FIVE_BY_FIVE = createGridConfiguration({ width: 5, height: 5 });

describe('crossword layout numbering', () => {
  it('numbers entry starts in row-major order', () => {
    const grid = CrosswordGrid.empty(FIVE_BY_FIVE)
      .withWordPlaced(1, 2, false, 'TAR')
      .withWordPlaced(2, 2, true, 'ART')
      .withWordPlaced(1, 0, true, 'CAT');

    const layout = describeLayout(grid);

    expect(layout.across).toEqual([
      { number: 2, direction: 'across', x: 1, y: 2, answer: 'TAR', length: 3 },
    ]);
    expect(layout.down).toEqual([
      { number: 1, direction: 'down', x: 1, y: 0, answer: 'CAT', length: 3 },
      { number: 3, direction: 'down', x: 2, y: 2, answer: 'ART', length: 3 },
    ]);
    expect(layout.numbers).toEqual([
      [null, 1, null, null, null],
      [null, null, null, null, null],
      [null, 2, 3, null, null],
      [null, null, null, null, null],
      [null, null, null, null, null],
    ]);
  });

  it('shares one number between an across and a down entry', () => {
    const grid = CrosswordGrid.empty(FIVE_BY_FIVE)
      .withWordPlaced(0, 0, false, 'AB')
      .withWordPlaced(0, 0, true, 'AC');

    const layout = describeLayout(grid);

    expect(layout.across).toEqual([
      { number: 1, direction: 'across', x: 0, y: 0, answer: 'AB', length: 2 },
    ]);
    expect(layout.down).toEqual([
      { number: 1, direction: 'down', x: 0, y: 0, answer: 'AC', length: 2 },
    ]);
  });

  it('does not number single letters', () => {
    const layout = describeLayout(CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(2, 2, false, 'Q'));

    expect(layout.across).toEqual([]);
    expect(layout.down).toEqual([]);
    expect(layout.numbers.flat().every((number) => number === null)).toBe(true);
  });

  it('reads an across entry through the wrapped edge', () => {
    const grid = CrosswordGrid.empty(createGridConfiguration({ width: 6, height: 1, wrap: true }))
      .withWordPlaced(4, 0, false, 'BOA');

    expect(wordStartsAt(grid, 0, 0, 'across')).toBe(false);
    expect(wordStartsAt(grid, 4, 0, 'across')).toBe(true);
    expect(readRun(grid, 4, 0, 'across')).toBe('BOA');
    expect(describeLayout(grid).numbers).toEqual([[null, null, null, null, 1, null]]);
  });

  it('renders blanks with the text marker', () => {
    const grid = CrosswordGrid.empty(FIVE_BY_FIVE).withWordPlaced(1, 2, false, 'TAR');

    expect(renderGridText(grid)).toEqual(['.....', '.....', '.TAR.', '.....', '.....']);
    expect(renderGridText(grid, '#')[2]).toBe('#TAR#');
  });
});
