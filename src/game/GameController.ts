import { GameBridge, type GamePhase } from "./bridge";
import { resolveGameOptions, type GameControllerOptions } from "./config";
import { FruitSpawner, type FruitPlacement } from "./entities/FruitSpawner";
import { Grid, type ReadonlyGrid } from "./entities/Grid";
import { Snake } from "./entities/Snake";
import {
  describeFault,
  type DirectionOutcome,
  type StepOutcome,
  type TerminalFault,
} from "./errors";
import type { Direction, GridPos } from "./utils/grid";
import { createSeededRng, type Rng } from "./utils/rng";
import { IntervalTicker } from "./utils/ticker";

/**
 * Drives one run of the simulation.
 *
 * Manages the phases (start → inProgress → end), owns the grid, the snake
 * and both tick accumulators, and turns the two kinds of external events,
 * direction requests and elapsed-time advances, into snake moves and fruit
 * spawns. It never draws; renderers read `grid` and subscribe to the bridge.
 *
 * Randomness comes from an injectable rng (or a seed) so runs can be
 * replayed exactly.
 */
export class GameController {
  private readonly board: Grid;

  private readonly snake: Snake;

  private readonly spawner = new FruitSpawner();

  private readonly rng: Rng;

  private readonly bridge: GameBridge;

  private readonly moveTicker: IntervalTicker;

  private readonly spawnTicker: IntervalTicker;

  private phase: GamePhase = "start";

  private cause: TerminalFault | null = null;

  private elapsedInProgress = 0;

  constructor(width: number, height: number, options: GameControllerOptions = {}) {
    const { rng, bridge, ...settings } = options;
    const resolved = resolveGameOptions({ ...settings, width, height });

    this.rng =
      rng ?? (resolved.seed === undefined ? Math.random : createSeededRng(resolved.seed));
    this.bridge = bridge ?? new GameBridge();
    this.moveTicker = new IntervalTicker(resolved.moveIntervalSeconds);
    this.spawnTicker = new IntervalTicker(resolved.spawnIntervalSeconds);

    this.board = new Grid(resolved.width, resolved.height);
    this.snake = Snake.spawn(this.board, this.rng);

    this.bridge.resetRun();
  }

  // ── External events ─────────────────────────────────────────

  /**
   * Ask the snake to turn. A refused reversal is reported to the caller and
   * published as a UI hint; it never affects the run. The first accepted
   * request starts the run.
   */
  requestDirection(direction: Direction): DirectionOutcome {
    if (this.phase === "end") {
      return { ok: false, fault: "runEnded", direction };
    }

    const outcome = this.snake.setDirection(direction);
    if (!outcome.ok) {
      this.bridge.emitDirectionRejected({
        direction,
        message: describeFault(outcome.fault),
      });
      return outcome;
    }

    this.bridge.setHeading(direction);
    if (this.phase === "start") {
      this.enterPhase("inProgress");
    }
    return outcome;
  }

  /**
   * Feed elapsed wall time. Before the first direction the tickers only
   * accumulate, so the wait carries into the first in-progress advance.
   * The spawn check runs before the movement check.
   */
  advance(deltaSeconds: number): void {
    if (this.phase === "end") {
      return;
    }

    const delta = Number.isFinite(deltaSeconds) ? Math.max(0, deltaSeconds) : 0;
    if (this.phase === "start") {
      this.spawnTicker.accumulate(delta);
      this.moveTicker.accumulate(delta);
      return;
    }

    this.elapsedInProgress += delta;
    this.bridge.setElapsedTime(this.elapsedInProgress);

    if (this.spawnTicker.advance(delta)) {
      this.spawnFruit();
    }

    if (this.moveTicker.advance(delta)) {
      this.moveSnake();
    }
  }

  /**
   * Process one frame from the driver: every pending input in arrival
   * order, then the time advance, so a turn pressed during the frame is
   * applied before that frame's move.
   */
  frame(deltaSeconds: number, inputs: Iterable<Direction> = []): DirectionOutcome[] {
    const outcomes: DirectionOutcome[] = [];
    for (const direction of inputs) {
      outcomes.push(this.requestDirection(direction));
    }
    this.advance(deltaSeconds);
    return outcomes;
  }

  // ── State queries ───────────────────────────────────────────

  get state(): GamePhase {
    return this.phase;
  }

  getPhase(): GamePhase {
    return this.phase;
  }

  get grid(): ReadonlyGrid {
    return this.board;
  }

  snakeHead(): GridPos {
    return this.snake.getHeadPosition();
  }

  snakeBody(): GridPos[] {
    return this.snake.getBody();
  }

  snakeLength(): number {
    return this.snake.length;
  }

  heading(): Direction | null {
    return this.snake.direction;
  }

  /** Why the run ended; `null` until the `end` phase. */
  terminationCause(): TerminalFault | null {
    return this.cause;
  }

  getBridge(): GameBridge {
    return this.bridge;
  }

  // ── Ticks ───────────────────────────────────────────────────

  private spawnFruit(): FruitPlacement | null {
    const placement = this.spawner.spawn(this.board, this.rng);
    if (placement) {
      this.bridge.emitFruitSpawned(placement);
    }
    return placement;
  }

  private moveSnake(): StepOutcome {
    const outcome = this.snake.step(this.board);

    if (!outcome.ok) {
      this.endRun(outcome.fault);
      return outcome;
    }

    if (outcome.ateFruit) {
      this.bridge.emitFruitEaten(outcome.head);
      this.bridge.setLength(this.snake.length);
    }
    return outcome;
  }

  // ── Phase management ────────────────────────────────────────

  private enterPhase(next: GamePhase): void {
    this.phase = next;
    this.bridge.setPhase(next);
  }

  private endRun(cause: TerminalFault): void {
    this.cause = cause;
    this.phase = "end";
    this.bridge.endRun(cause);
  }
}
