import {
  DEFAULT_FRUIT_PALETTE,
  SPAWN_ATTEMPTS_PER_CELL,
  type FruitColor,
} from "../config";
import type { GridPos } from "../utils/grid";
import { pickRandom, randomIndex, type Rng } from "../utils/rng";
import { Cell, type Grid } from "./Grid";

export interface FruitPlacement {
  position: GridPos;
  color: FruitColor;
}

export interface FruitSpawnerOptions {
  /** Colours a fruit can take. Must not be empty. */
  palette?: readonly FruitColor[];
  /**
   * Random draws allowed before switching to a scan of the vacant cells.
   * Defaults to `SPAWN_ATTEMPTS_PER_CELL` draws per grid cell.
   */
  maxAttempts?: number;
}

/**
 * Places fruit on a uniformly random vacant cell.
 *
 * Strategy: rejection sampling over the whole board. Once the draw budget
 * runs out the spawner collects every vacant cell and picks one of those
 * instead. A board with no vacant cell gets no fruit.
 */
export class FruitSpawner {
  private readonly palette: readonly FruitColor[];

  private readonly maxAttempts: number | null;

  constructor(options: FruitSpawnerOptions = {}) {
    const palette = options.palette ?? DEFAULT_FRUIT_PALETTE;
    if (palette.length === 0) {
      throw new RangeError("Fruit palette must contain at least one colour");
    }
    this.palette = [...palette];
    this.maxAttempts =
      options.maxAttempts === undefined
        ? null
        : Math.max(0, Math.floor(options.maxAttempts));
  }

  /**
   * Mark a vacant cell as fruit.
   *
   * @returns the placement, or `null` when the board has no vacant cell.
   */
  spawn(grid: Grid, rng: Rng): FruitPlacement | null {
    const position = this.findVacantCell(grid, rng);
    if (position === null) {
      return null;
    }

    const color = pickRandom(rng, this.palette) ?? this.palette[0];
    grid.set(position, Cell.OccupiedFruit, color);
    return { position, color };
  }

  private findVacantCell(grid: Grid, rng: Rng): GridPos | null {
    const attempts = this.maxAttempts ?? grid.size * SPAWN_ATTEMPTS_PER_CELL;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const position = grid.positionAt(randomIndex(rng, grid.size));
      if (grid.get(position) === Cell.Vacant) {
        return position;
      }
    }

    const vacant = grid.positionsOf(Cell.Vacant);
    return pickRandom(rng, vacant) ?? null;
  }
}
