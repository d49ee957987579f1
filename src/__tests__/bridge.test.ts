import { describe, it, expect, vi, beforeEach } from "vitest";
import { GameBridge } from "@/game/bridge";
import { FRUIT_COLORS } from "@/game/config";

describe("GameBridge", () => {
  let bridge: GameBridge;

  beforeEach(() => {
    bridge = new GameBridge();
  });

  // ── Initial state ──────────────────────────────────────────

  it("starts with phase 'start'", () => {
    expect(bridge.getState().phase).toBe("start");
  });

  it("starts with a length of 1", () => {
    expect(bridge.getState().length).toBe(1);
  });

  it("starts with elapsedTime 0, no heading and no termination cause", () => {
    expect(bridge.getState().elapsedTime).toBe(0);
    expect(bridge.getState().heading).toBeNull();
    expect(bridge.getState().terminationCause).toBeNull();
  });

  // ── setPhase ───────────────────────────────────────────────

  it("setPhase updates state.phase", () => {
    bridge.setPhase("inProgress");
    expect(bridge.getState().phase).toBe("inProgress");
  });

  it("setPhase emits phaseChange event", () => {
    const listener = vi.fn();
    bridge.on("phaseChange", listener);
    bridge.setPhase("end");
    expect(listener).toHaveBeenCalledWith("end");
  });

  it("setPhase does not re-emit an unchanged phase", () => {
    const listener = vi.fn();
    bridge.on("phaseChange", listener);
    bridge.setPhase("start");
    expect(listener).not.toHaveBeenCalled();
  });

  // ── setLength ──────────────────────────────────────────────

  it("setLength updates state and emits lengthChange", () => {
    const listener = vi.fn();
    bridge.on("lengthChange", listener);
    bridge.setLength(4);
    expect(bridge.getState().length).toBe(4);
    expect(listener).toHaveBeenCalledWith(4);
  });

  // ── setElapsedTime ─────────────────────────────────────────

  it("setElapsedTime emits elapsedTimeChange event", () => {
    const listener = vi.fn();
    bridge.on("elapsedTimeChange", listener);
    bridge.setElapsedTime(1.5);
    expect(bridge.getState().elapsedTime).toBe(1.5);
    expect(listener).toHaveBeenCalledWith(1.5);
  });

  // ── setHeading ─────────────────────────────────────────────

  it("setHeading emits headingChange only when the heading changes", () => {
    const listener = vi.fn();
    bridge.on("headingChange", listener);
    bridge.setHeading("up");
    bridge.setHeading("up");
    bridge.setHeading("left");
    expect(listener.mock.calls).toEqual([["up"], ["left"]]);
  });

  // ── one-shot events ────────────────────────────────────────

  it("forwards direction rejections", () => {
    const listener = vi.fn();
    bridge.on("directionRejected", listener);
    bridge.emitDirectionRejected({
      direction: "down",
      message: "cannot turn the opposite direction",
    });
    expect(listener).toHaveBeenCalledWith({
      direction: "down",
      message: "cannot turn the opposite direction",
    });
  });

  it("forwards fruit spawns and meals", () => {
    const spawned = vi.fn();
    const eaten = vi.fn();
    bridge.on("fruitSpawned", spawned);
    bridge.on("fruitEaten", eaten);
    bridge.emitFruitSpawned({ position: { col: 1, row: 2 }, color: FRUIT_COLORS.RED });
    bridge.emitFruitEaten({ col: 1, row: 2 });
    expect(spawned).toHaveBeenCalledWith({
      position: { col: 1, row: 2 },
      color: FRUIT_COLORS.RED,
    });
    expect(eaten).toHaveBeenCalledWith({ col: 1, row: 2 });
  });

  // ── endRun ─────────────────────────────────────────────────

  it("endRun records the cause, then switches to the end phase", () => {
    const order: string[] = [];
    bridge.setPhase("inProgress");
    bridge.on("runEnded", (cause) => order.push(`runEnded:${cause}`));
    bridge.on("phaseChange", (phase) => order.push(`phase:${phase}`));

    bridge.endRun("selfCollision");

    expect(order).toEqual(["runEnded:selfCollision", "phase:end"]);
    expect(bridge.getState().terminationCause).toBe("selfCollision");
    expect(bridge.getState().phase).toBe("end");
  });

  // ── resetRun ───────────────────────────────────────────────

  it("resetRun restores the initial snapshot", () => {
    bridge.setPhase("inProgress");
    bridge.setLength(7);
    bridge.setElapsedTime(12);
    bridge.setHeading("down");
    bridge.endRun("outOfBounds");

    bridge.resetRun();

    expect(bridge.getState()).toEqual({
      phase: "start",
      length: 1,
      elapsedTime: 0,
      heading: null,
      terminationCause: null,
    });
  });

  it("resetRun notifies subscribers of the reset values", () => {
    const phase = vi.fn();
    const length = vi.fn();
    bridge.on("phaseChange", phase);
    bridge.on("lengthChange", length);
    bridge.resetRun();
    expect(phase).toHaveBeenCalledWith("start");
    expect(length).toHaveBeenCalledWith(1);
  });

  // ── on / off ───────────────────────────────────────────────

  it("off removes a listener", () => {
    const listener = vi.fn();
    bridge.on("lengthChange", listener);
    bridge.off("lengthChange", listener);
    bridge.setLength(3);
    expect(listener).not.toHaveBeenCalled();
  });

  it("supports multiple listeners for the same event", () => {
    const a = vi.fn();
    const b = vi.fn();
    bridge.on("runEnded", a);
    bridge.on("runEnded", b);
    bridge.endRun("outOfBounds");
    expect(a).toHaveBeenCalledWith("outOfBounds");
    expect(b).toHaveBeenCalledWith("outOfBounds");
  });
});
