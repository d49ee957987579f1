import type { FruitColor } from "../config";
import { GridBoundsError } from "../errors";
import { isInBounds, type GridBounds, type GridPos } from "../utils/grid";

export enum Cell {
  Vacant = "vacant",
  OccupiedSnake = "occupied-snake",
  OccupiedFruit = "occupied-fruit",
}

/** One entry of a row-major walk over the grid, for drawing. */
export interface GridCellView {
  pos: GridPos;
  cell: Cell;
  /** Palette colour for fruit cells; `null` for every other cell. */
  fruitColor: FruitColor | null;
}

/** The read-only surface handed to the presentation layer. */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  readonly size: number;
  get(pos: GridPos): Cell;
  fruitColorAt(pos: GridPos): FruitColor | null;
  isInBounds(pos: GridPos): boolean;
  positionAt(index: number): GridPos;
  countOf(cell: Cell): number;
  positionsOf(cell: Cell): GridPos[];
  cells(): IterableIterator<GridCellView>;
}

/**
 * Fixed-size occupancy board.
 *
 * A passive store: it answers and records cell states but applies no policy
 * about what may occupy what. Any out-of-range position is a caller bug and
 * throws `GridBoundsError`.
 */
export class Grid implements ReadonlyGrid {
  readonly width: number;

  readonly height: number;

  /** Row-major cell states, index = col + row * width. */
  private readonly states: Cell[];

  /** Fruit colours, parallel to `states`. */
  private readonly fruitColors: (FruitColor | null)[];

  private readonly bounds: GridBounds;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new GridBoundsError(
        `Grid dimensions must be positive integers, got ${width}x${height}`,
      );
    }
    this.width = width;
    this.height = height;
    this.bounds = Object.freeze({ cols: width, rows: height });
    this.states = new Array<Cell>(width * height).fill(Cell.Vacant);
    this.fruitColors = new Array<FruitColor | null>(width * height).fill(null);
  }

  get size(): number {
    return this.states.length;
  }

  isInBounds(pos: GridPos): boolean {
    return isInBounds(pos, this.bounds);
  }

  indexOf(pos: GridPos): number {
    this.assertInBounds(pos);
    return pos.col + pos.row * this.width;
  }

  positionAt(index: number): GridPos {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new GridBoundsError(
        `Cell index ${index} is outside a grid of ${this.size} cells`,
      );
    }
    return { col: index % this.width, row: Math.floor(index / this.width) };
  }

  get(pos: GridPos): Cell {
    return this.states[this.indexOf(pos)];
  }

  /**
   * Record a cell state. `fruitColor` is kept only for `OccupiedFruit`;
   * any other state clears the colour.
   */
  set(pos: GridPos, cell: Cell, fruitColor: FruitColor | null = null): void {
    const index = this.indexOf(pos);
    this.states[index] = cell;
    this.fruitColors[index] = cell === Cell.OccupiedFruit ? fruitColor : null;
  }

  fruitColorAt(pos: GridPos): FruitColor | null {
    return this.fruitColors[this.indexOf(pos)];
  }

  countOf(cell: Cell): number {
    let count = 0;
    for (const state of this.states) {
      if (state === cell) count++;
    }
    return count;
  }

  positionsOf(cell: Cell): GridPos[] {
    const positions: GridPos[] = [];
    this.states.forEach((state, index) => {
      if (state === cell) {
        positions.push(this.positionAt(index));
      }
    });
    return positions;
  }

  *cells(): IterableIterator<GridCellView> {
    for (let index = 0; index < this.states.length; index++) {
      yield {
        pos: this.positionAt(index),
        cell: this.states[index],
        fruitColor: this.fruitColors[index],
      };
    }
  }

  private assertInBounds(pos: GridPos): void {
    if (!this.isInBounds(pos)) {
      throw new GridBoundsError(
        `Position (${pos.col}, ${pos.row}) is outside the ${this.width}x${this.height} grid`,
      );
    }
  }
}
