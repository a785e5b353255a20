import { EMPTY_CELL } from '../../config/engine-defaults';
import { parsePositiveSafeInteger } from '../../shared/runtime-guards';
import { engineError } from '../engine-errors';
import { buildIntersectionIndex, type IntersectionIndex } from '../IntersectionIndex';

const ZERO = 0;
const ONE = 1;

export type WordDirection = 'horizontal' | 'vertical';

export interface GridConfiguration {
  readonly width: number;
  readonly height: number;
  readonly wrap: boolean;
}

export interface GridConfigurationInput {
  readonly width: unknown;
  readonly height: unknown;
  readonly wrap?: unknown;
}

export interface PlacedWord {
  readonly word: string;
  /** Always normalized into `[0, width)`. */
  readonly x: number;
  readonly y: number;
  readonly vertical: boolean;
}

export interface GridCoordinate {
  readonly x: number;
  readonly y: number;
}

export function createGridConfiguration(input: GridConfigurationInput): GridConfiguration {
  const width = parsePositiveSafeInteger(input.width);
  const height = parsePositiveSafeInteger(input.height);

  if (width === null || height === null) {
    throw engineError(
      'engine.invalid-configuration',
      'Grid width and height must be positive integers.',
      { width: input.width, height: input.height },
    );
  }

  if (input.wrap !== undefined && typeof input.wrap !== 'boolean') {
    throw engineError('engine.invalid-configuration', 'Grid wrap flag must be a boolean.', {
      wrap: input.wrap,
    });
  }

  return {
    width,
    height,
    wrap: input.wrap ?? false,
  };
}

/**
 * Immutable crossword grid. Every placement yields a new value, so sibling
 * candidates produced from the same parent never observe each other's writes.
 */
export class CrosswordGrid {
  readonly config: GridConfiguration;
  readonly cells: readonly string[];
  readonly placements: readonly PlacedWord[];

  private placedWordSet: ReadonlySet<string> | null = null;

  private constructor(
    config: GridConfiguration,
    cells: readonly string[],
    placements: readonly PlacedWord[],
  ) {
    this.config = config;
    this.cells = cells;
    this.placements = placements;
  }

  static empty(config: GridConfiguration): CrosswordGrid {
    return new CrosswordGrid(
      config,
      Array.from({ length: config.width * config.height }, () => EMPTY_CELL),
      [],
    );
  }

  get width(): number {
    return this.config.width;
  }

  get height(): number {
    return this.config.height;
  }

  get wrap(): boolean {
    return this.config.wrap;
  }

  normalizeX(x: number): number {
    if (!this.config.wrap) {
      return x;
    }

    const { width } = this.config;
    return ((x % width) + width) % width;
  }

  isInside(x: number, y: number): boolean {
    if (y < ZERO || y >= this.config.height) {
      return false;
    }

    const normalizedX = this.normalizeX(x);
    return normalizedX >= ZERO && normalizedX < this.config.width;
  }

  toCellIndex(x: number, y: number): number | null {
    if (!this.isInside(x, y)) {
      return null;
    }

    return y * this.config.width + this.normalizeX(x);
  }

  fromCellIndex(index: number): GridCoordinate | null {
    if (!Number.isInteger(index) || index < ZERO || index >= this.cells.length) {
      return null;
    }

    return {
      x: index % this.config.width,
      y: Math.floor(index / this.config.width),
    };
  }

  /** `null` when the coordinate lies outside the grid. */
  charAt(x: number, y: number): string | null {
    const index = this.toCellIndex(x, y);
    if (index === null) {
      return null;
    }

    return this.cells[index] ?? null;
  }

  /** Out-of-range cells are blocked, never empty. */
  isEmptyAt(x: number, y: number): boolean {
    return this.charAt(x, y) === EMPTY_CELL;
  }

  /** Out-of-range cells hold no letter; the grid edge reads as open space. */
  hasLetterAt(x: number, y: number): boolean {
    const value = this.charAt(x, y);
    return value !== null && value !== EMPTY_CELL;
  }

  hasPlaced(word: string): boolean {
    return this.placedWords().has(word);
  }

  placedWords(): ReadonlySet<string> {
    if (!this.placedWordSet) {
      this.placedWordSet = new Set(this.placements.map((placement) => placement.word));
    }

    return this.placedWordSet;
  }

  /** Crossing anchors of this grid value, computed once. */
  intersections(): IntersectionIndex {
    return buildIntersectionIndex(this);
  }

  findPlacement(word: string): PlacedWord | null {
    return this.placements.find((placement) => placement.word === word) ?? null;
  }

  withWordPlaced(x: number, y: number, vertical: boolean, word: string): CrosswordGrid {
    const cells = [...this.cells];
    const placement: PlacedWord = { word, x: this.normalizeX(x), y, vertical };

    writePlacement(this, cells, placement);

    return new CrosswordGrid(this.config, cells, [...this.placements, placement]);
  }

  withWordRemoved(word: string): CrosswordGrid {
    const remaining = this.placements.filter((placement) => placement.word !== word);
    if (remaining.length === this.placements.length) {
      return this;
    }

    const cells = Array.from({ length: this.cells.length }, () => EMPTY_CELL);
    for (const placement of remaining) {
      writePlacement(this, cells, placement);
    }

    return new CrosswordGrid(this.config, cells, remaining);
  }

  density(): number {
    let letterCount = ZERO;

    for (const placement of this.placements) {
      letterCount += placement.word.length;
    }

    return letterCount / (this.config.width * this.config.height);
  }

  rows(emptyMarker: string = EMPTY_CELL): readonly string[] {
    const rows: string[] = [];

    for (let y = ZERO; y < this.config.height; y += ONE) {
      const start = y * this.config.width;
      rows.push(
        this.cells
          .slice(start, start + this.config.width)
          .map((cell) => (cell === EMPTY_CELL ? emptyMarker : cell))
          .join(''),
      );
    }

    return rows;
  }
}

export function placementCells(
  grid: CrosswordGrid,
  placement: PlacedWord,
): readonly GridCoordinate[] {
  const coordinates: GridCoordinate[] = [];

  for (let offset = ZERO; offset < placement.word.length; offset += ONE) {
    coordinates.push(
      placement.vertical
        ? { x: placement.x, y: placement.y + offset }
        : { x: grid.normalizeX(placement.x + offset), y: placement.y },
    );
  }

  return coordinates;
}

function writePlacement(grid: CrosswordGrid, cells: string[], placement: PlacedWord): void {
  const coordinates = placementCells(grid, placement);

  for (const [offset, coordinate] of coordinates.entries()) {
    const index = grid.toCellIndex(coordinate.x, coordinate.y);
    const letter = placement.word[offset];

    if (index === null || letter === undefined) {
      continue;
    }

    cells[index] = letter;
  }
}

export function createEmptyGrid(config: GridConfiguration): CrosswordGrid {
  return CrosswordGrid.empty(config);
}
