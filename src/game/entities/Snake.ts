import {
  SnakeContractError,
  type DirectionOutcome,
  type GrowthOutcome,
  type StepOutcome,
} from "../errors";
import {
  type Direction,
  type GridPos,
  gridEquals,
  isOppositeDirection,
  oppositeDirection,
  stepInDirection,
} from "../utils/grid";
import { randomIndex, type Rng } from "../utils/rng";
import { Cell, type Grid } from "./Grid";

// ── Snake entity ─────────────────────────────────────────────────

/**
 * The snake: a head cell, an ordered body trailing behind it, and a heading.
 *
 * The snake never keeps a reference to the grid. Every mutating call takes
 * the grid from its owner and updates the affected cells in place, so the
 * cells marked `OccupiedSnake` always equal the head plus the body.
 */
export class Snake {
  /** Current head cell. */
  private head: GridPos;

  /** Body segments, nearest-to-head first; the last entry is the tail. */
  private body: GridPos[] = [];

  /** Direction of travel. `null` until the first accepted direction change. */
  private heading: Direction | null = null;

  /** Cell released by the most recent step (old tail, or old head for a bare head). */
  private lastVacated: GridPos | null = null;

  constructor(grid: Grid, head: GridPos) {
    grid.set(head, Cell.OccupiedSnake);
    this.head = { ...head };
  }

  /** Place a new snake on a uniformly random cell of an empty grid. */
  static spawn(grid: Grid, rng: Rng): Snake {
    return new Snake(grid, grid.positionAt(randomIndex(rng, grid.size)));
  }

  // ── Direction ──────────────────────────────────────────────────

  get direction(): Direction | null {
    return this.heading;
  }

  /**
   * Change the heading. A 180° reversal of a set heading is refused and the
   * heading stays as it was; every other request is applied. No movement.
   */
  setDirection(requested: Direction): DirectionOutcome {
    if (this.heading !== null && isOppositeDirection(this.heading, requested)) {
      return { ok: false, fault: "oppositeDirection", direction: requested };
    }

    this.heading = requested;
    return { ok: true, direction: requested };
  }

  // ── Movement ───────────────────────────────────────────────────

  /**
   * Move one cell along the heading.
   *
   * Leaving the board reports `outOfBounds`; entering a snake cell reports
   * `selfCollision`. Neither changes the grid. Entering a fruit cell consumes
   * the fruit and grows the tail in the same step.
   */
  step(grid: Grid): StepOutcome {
    const heading = this.requireHeading("step");
    const target = stepInDirection(this.head, heading);

    if (!grid.isInBounds(target)) {
      return { ok: false, fault: "outOfBounds", target };
    }

    const targetCell = grid.get(target);
    if (targetCell === Cell.OccupiedSnake) {
      return { ok: false, fault: "selfCollision", target };
    }

    const ateFruit = targetCell === Cell.OccupiedFruit;
    if (ateFruit) {
      grid.set(target, Cell.Vacant);
    }

    // Each segment slides into the slot its predecessor held before the step.
    let vacated = this.head;
    this.moveSegment(grid, this.head, target);
    this.head = target;

    for (let i = 0; i < this.body.length; i++) {
      const previous = this.body[i];
      this.moveSegment(grid, previous, vacated);
      this.body[i] = vacated;
      vacated = previous;
    }

    this.lastVacated = vacated;

    const growth = ateFruit ? this.addBody(grid) : null;
    return { ok: true, head: { ...target }, ateFruit, growth };
  }

  // ── Growth ─────────────────────────────────────────────────────

  /**
   * Append one segment directly behind the tail, opposite the heading.
   *
   * After a turn the cell behind the tail along the new heading can be off
   * the board or already taken; the cell released by the last step is used
   * in that case. If neither is free the snake does not grow.
   */
  addBody(grid: Grid): GrowthOutcome {
    const heading = this.requireHeading("addBody");
    const tail = this.getTailPosition();
    const behind = stepInDirection(tail, oppositeDirection(heading));

    const candidates = [behind];
    if (this.lastVacated !== null && !gridEquals(this.lastVacated, behind)) {
      candidates.push(this.lastVacated);
    }

    for (const candidate of candidates) {
      if (grid.isInBounds(candidate) && grid.get(candidate) === Cell.Vacant) {
        grid.set(candidate, Cell.OccupiedSnake);
        this.body.push(candidate);
        // The vacated cell is only adjacent to the tail it was released by.
        this.lastVacated = null;
        return { grown: true, tail: { ...candidate } };
      }
    }

    return { grown: false };
  }

  // ── State queries ──────────────────────────────────────────────

  getHeadPosition(): GridPos {
    return { ...this.head };
  }

  getTailPosition(): GridPos {
    const tail = this.body.length > 0 ? this.body[this.body.length - 1] : this.head;
    return { ...tail };
  }

  /** Body segments, nearest-to-head first. */
  getBody(): GridPos[] {
    return this.body.map((segment) => ({ ...segment }));
  }

  /** Head followed by the body. */
  getSegments(): GridPos[] {
    return [this.getHeadPosition(), ...this.getBody()];
  }

  get length(): number {
    return this.body.length + 1;
  }

  isOnSnake(pos: GridPos): boolean {
    return (
      gridEquals(this.head, pos) ||
      this.body.some((segment) => gridEquals(segment, pos))
    );
  }

  // ── Internals ──────────────────────────────────────────────────

  private moveSegment(grid: Grid, from: GridPos, to: GridPos): void {
    grid.set(from, Cell.Vacant);
    grid.set(to, Cell.OccupiedSnake);
  }

  private requireHeading(operation: string): Direction {
    if (this.heading === null) {
      throw new SnakeContractError(
        `Snake.${operation}() requires a heading; call setDirection() first`,
      );
    }
    return this.heading;
  }
}
