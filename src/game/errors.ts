import type { Direction, GridPos } from "./utils/grid";

// ── Run faults (returned as values, never thrown) ────────────────

/** A movement failure that ends the run. */
export type TerminalFault = "outOfBounds" | "selfCollision";

/** A direction request that was refused without affecting the run. */
export type DirectionFault = "oppositeDirection" | "runEnded";

export type Fault = TerminalFault | DirectionFault;

const FAULT_MESSAGES: Readonly<Record<Fault, string>> = Object.freeze({
  oppositeDirection: "cannot turn the opposite direction",
  outOfBounds: "cannot go outside the board",
  selfCollision: "collided with the snake's own body",
  runEnded: "the run is over",
});

/** Human-readable text for a fault, suitable for a title bar or HUD hint. */
export function describeFault(fault: Fault): string {
  return FAULT_MESSAGES[fault];
}

export function isTerminalFault(fault: Fault): fault is TerminalFault {
  return fault === "outOfBounds" || fault === "selfCollision";
}

// ── Outcomes ─────────────────────────────────────────────────────

export type DirectionOutcome =
  | { ok: true; direction: Direction }
  | { ok: false; fault: DirectionFault; direction: Direction };

export type GrowthOutcome =
  | { grown: true; tail: GridPos }
  | { grown: false };

export type StepOutcome =
  | { ok: true; head: GridPos; ateFruit: boolean; growth: GrowthOutcome | null }
  | { ok: false; fault: TerminalFault; target: GridPos };

// ── Contract violations (thrown) ─────────────────────────────────

/** A grid was asked about a position it does not contain, or built with bad dimensions. */
export class GridBoundsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridBoundsError";
  }
}

/** The snake was driven in a way its API forbids (e.g. stepping with no heading). */
export class SnakeContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SnakeContractError";
  }
}

/** Game options failed validation. */
export class GameConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid game options: ${issues.join("; ")}`);
    this.name = "GameConfigError";
    this.issues = issues;
  }
}
