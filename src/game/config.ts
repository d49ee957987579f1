import { z } from "zod";
import { GameConfigError } from "./errors";
import type { Rng } from "./utils/rng";
import type { GameBridge } from "./bridge";

// ── Board Dimensions ─────────────────────────────────────────────
export const DEFAULT_GRID_COLS = 19;
export const DEFAULT_GRID_ROWS = 15;

// ── Tick Cadence (seconds of accumulated real time) ──────────────
export const MOVE_INTERVAL_SECONDS = 0.25;
export const FRUIT_SPAWN_INTERVAL_SECONDS = 5;

// ── Fruit Spawning ───────────────────────────────────────────────
/** Rejection-sampling draws allowed per grid cell before falling back to a scan. */
export const SPAWN_ATTEMPTS_PER_CELL = 4;

// ── Fruit Palette ────────────────────────────────────────────────
export const FRUIT_COLORS = {
  RED: 0xff0000,
  BLUE: 0x0000ff,
  ORANGE: 0xffa500,
} as const;

export type FruitColor = (typeof FRUIT_COLORS)[keyof typeof FRUIT_COLORS];

export const DEFAULT_FRUIT_PALETTE: readonly FruitColor[] = Object.freeze([
  FRUIT_COLORS.RED,
  FRUIT_COLORS.BLUE,
  FRUIT_COLORS.ORANGE,
]);

// ── Option Schema ────────────────────────────────────────────────

const positiveSeconds = z
  .number()
  .finite()
  .positive({ message: "must be greater than 0 seconds" });

export const gameOptionsSchema = z.object({
  width: z.number().int().positive().default(DEFAULT_GRID_COLS),
  height: z.number().int().positive().default(DEFAULT_GRID_ROWS),
  moveIntervalSeconds: positiveSeconds.default(MOVE_INTERVAL_SECONDS),
  spawnIntervalSeconds: positiveSeconds.default(FRUIT_SPAWN_INTERVAL_SECONDS),
  seed: z.number().int().optional(),
});

export type GameOptionsInput = z.input<typeof gameOptionsSchema>;
export type GameOptions = z.output<typeof gameOptionsSchema>;

/**
 * Options accepted by the controller: the validated numeric settings plus the
 * collaborators that cannot be described by a schema.
 */
export interface GameControllerOptions
  extends Omit<GameOptionsInput, "width" | "height"> {
  /** Randomness source; takes precedence over `seed`. */
  rng?: Rng;
  /** Bridge that receives run telemetry. A fresh one is created when omitted. */
  bridge?: GameBridge;
}

/**
 * Validate raw options and fill in defaults.
 * Throws `GameConfigError` listing every issue found.
 */
export function resolveGameOptions(input: GameOptionsInput = {}): GameOptions {
  const result = gameOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new GameConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
