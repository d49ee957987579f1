import { describe, it, expect } from "vitest";
import { GameController } from "@/game/GameController";
import { Cell, type ReadonlyGrid } from "@/game/entities/Grid";
import { CARDINAL_DIRECTIONS, gridPosKey, type Direction } from "@/game/utils/grid";
import { createSeededRng } from "@/game/utils/rng";

// ── Helpers ──────────────────────────────────────────────────────

function expectOccupancyInvariant(game: GameController): void {
  const grid: ReadonlyGrid = game.grid;
  const segments = [game.snakeHead(), ...game.snakeBody()];
  const segmentKeys = segments.map(gridPosKey);

  // No two segments share a cell.
  expect(new Set(segmentKeys).size).toBe(segments.length);

  // Snake cells on the grid are exactly head + body.
  const snakeKeys = grid.positionsOf(Cell.OccupiedSnake).map(gridPosKey);
  expect([...snakeKeys].sort()).toEqual([...segmentKeys].sort());
  expect(snakeKeys).toHaveLength(game.snakeLength());

  // Fruit never overlaps the snake.
  for (const fruit of grid.positionsOf(Cell.OccupiedFruit)) {
    expect(segmentKeys).not.toContain(gridPosKey(fruit));
  }
}

/** Play a run with random inputs until it ends or the frame budget runs out. */
function playRandomRun(seed: number, frames: number): GameController {
  const inputRng = createSeededRng(seed * 31 + 7);
  const game = new GameController(8, 8, { seed, spawnIntervalSeconds: 0.5 });

  for (let frame = 0; frame < frames && game.state !== "end"; frame++) {
    const inputs: Direction[] = [];
    if (game.state === "start" || inputRng() < 0.3) {
      inputs.push(CARDINAL_DIRECTIONS[Math.floor(inputRng() * CARDINAL_DIRECTIONS.length)]);
    }
    game.frame(0.125, inputs);
    expectOccupancyInvariant(game);
  }

  return game;
}

// ── Invariants over random play ──────────────────────────────────

describe("Occupancy invariants over random play", () => {
  it.each([1, 2, 3, 4, 5, 6, 7, 8])("holds for every frame of seed %i", (seed) => {
    const game = playRandomRun(seed, 400);
    expect(["inProgress", "end"]).toContain(game.state);
  });

  it("records a terminal cause exactly when the run has ended", () => {
    for (let seed = 10; seed < 20; seed++) {
      const game = playRandomRun(seed, 400);
      if (game.state === "end") {
        expect(["outOfBounds", "selfCollision"]).toContain(game.terminationCause());
      } else {
        expect(game.terminationCause()).toBeNull();
      }
    }
  });

  it("never shrinks the snake", () => {
    const game = new GameController(8, 8, { seed: 42, spawnIntervalSeconds: 0.25 });
    const inputRng = createSeededRng(4242);
    let previous = game.snakeLength();

    for (let frame = 0; frame < 300 && game.state !== "end"; frame++) {
      const direction = CARDINAL_DIRECTIONS[Math.floor(inputRng() * 4)];
      game.frame(0.25, [direction]);
      expect(game.snakeLength()).toBeGreaterThanOrEqual(previous);
      previous = game.snakeLength();
    }
  });
});

// ── Deterministic replay ─────────────────────────────────────────

describe("Deterministic replay", () => {
  it("reproduces the same run for the same seed and inputs", () => {
    const first = playRandomRun(99, 300);
    const second = playRandomRun(99, 300);

    expect(second.state).toBe(first.state);
    expect(second.snakeHead()).toEqual(first.snakeHead());
    expect(second.snakeBody()).toEqual(first.snakeBody());
    expect(second.terminationCause()).toBe(first.terminationCause());
    expect(second.grid.positionsOf(Cell.OccupiedFruit)).toEqual(
      first.grid.positionsOf(Cell.OccupiedFruit),
    );
  });
});

// ── Straight-line run ────────────────────────────────────────────

describe("Straight-line run", () => {
  it("crosses the board and ends at the far wall", () => {
    // 0.1 * 8 = 0.8 → index 0 → head at (0, 0).
    const game = new GameController(8, 1, { rng: () => 0.1 });
    expect(game.snakeHead()).toEqual({ col: 0, row: 0 });
    game.requestDirection("right");

    for (let i = 0; i < 7; i++) {
      game.advance(0.25);
      expect(game.snakeHead()).toEqual({ col: i + 1, row: 0 });
      expect(game.state).toBe("inProgress");
    }

    game.advance(0.25);
    expect(game.state).toBe("end");
    expect(game.terminationCause()).toBe("outOfBounds");
  });
});
