/**
 * Simulation → presentation state bridge.
 *
 * A lightweight typed event emitter that the game controller writes to and
 * renderers, HUDs or test harnesses subscribe to. It also keeps the latest
 * snapshot so late subscribers can read current values without waiting for
 * the next event.
 */
import type { FruitPlacement } from "./entities/FruitSpawner";
import type { TerminalFault } from "./errors";
import type { Direction, GridPos } from "./utils/grid";

// ── Game phases ─────────────────────────────────────────────────
export type GamePhase = "start" | "inProgress" | "end";

// ── Bridge state shape ──────────────────────────────────────────
export interface GameState {
  phase: GamePhase;
  /** Head plus body segments. */
  length: number;
  /** Seconds spent in the `inProgress` phase. */
  elapsedTime: number;
  heading: Direction | null;
  terminationCause: TerminalFault | null;
}

export interface DirectionRejection {
  direction: Direction;
  message: string;
}

// ── Event map: event name → payload ─────────────────────────────
export interface GameBridgeEvents {
  phaseChange: GamePhase;
  lengthChange: number;
  elapsedTimeChange: number;
  headingChange: Direction;
  directionRejected: DirectionRejection;
  fruitSpawned: FruitPlacement;
  fruitEaten: GridPos;
  runEnded: TerminalFault;
}

export type GameBridgeEventName = keyof GameBridgeEvents;

type Listener<T> = (value: T) => void;

type ListenerRegistry = {
  [K in GameBridgeEventName]?: Set<Listener<GameBridgeEvents[K]>>;
};

function createInitialState(): GameState {
  return {
    phase: "start",
    length: 1,
    elapsedTime: 0,
    heading: null,
    terminationCause: null,
  };
}

export class GameBridge {
  private state: GameState = createInitialState();

  private listeners: ListenerRegistry = {};

  // ── Getters ─────────────────────────────────────────────────
  getState(): Readonly<GameState> {
    return this.state;
  }

  // ── Mutations (called by the controller) ────────────────────
  setPhase(phase: GamePhase): void {
    if (this.state.phase === phase) {
      return;
    }
    this.state.phase = phase;
    this.emit("phaseChange", phase);
  }

  setLength(length: number): void {
    if (this.state.length === length) {
      return;
    }
    this.state.length = length;
    this.emit("lengthChange", length);
  }

  setElapsedTime(elapsedTime: number): void {
    this.state.elapsedTime = elapsedTime;
    this.emit("elapsedTimeChange", elapsedTime);
  }

  setHeading(heading: Direction): void {
    if (this.state.heading === heading) {
      return;
    }
    this.state.heading = heading;
    this.emit("headingChange", heading);
  }

  emitDirectionRejected(rejection: DirectionRejection): void {
    this.emit("directionRejected", rejection);
  }

  emitFruitSpawned(placement: FruitPlacement): void {
    this.emit("fruitSpawned", placement);
  }

  emitFruitEaten(position: GridPos): void {
    this.emit("fruitEaten", position);
  }

  /** Record the terminal cause and move to the `end` phase. */
  endRun(cause: TerminalFault): void {
    this.state.terminationCause = cause;
    this.emit("runEnded", cause);
    this.setPhase("end");
  }

  /** Reset all per-run state (called when a controller starts a run). */
  resetRun(): void {
    this.state = createInitialState();
    this.emit("phaseChange", this.state.phase);
    this.emit("lengthChange", this.state.length);
    this.emit("elapsedTimeChange", 0);
  }

  // ── Pub / Sub ───────────────────────────────────────────────
  on<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.registry(event).add(listener);
  }

  off<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event]?.delete(listener);
  }

  private emit<K extends GameBridgeEventName>(
    event: K,
    value: GameBridgeEvents[K],
  ): void {
    this.listeners[event]?.forEach((fn) => fn(value));
  }

  private registry<K extends GameBridgeEventName>(
    event: K,
  ): Set<Listener<GameBridgeEvents[K]>> {
    const listeners: { [P in K]?: Set<Listener<GameBridgeEvents[P]>> } =
      this.listeners;
    const existing = listeners[event];
    if (existing) {
      return existing;
    }
    const created = new Set<Listener<GameBridgeEvents[K]>>();
    listeners[event] = created;
    return created;
  }
}
