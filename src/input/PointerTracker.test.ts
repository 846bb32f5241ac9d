import { describe, expect, it } from "vitest";
import { PointerTracker } from "./PointerTracker.js";

describe("PointerTracker", () => {
  it("starts empty", () => {
    expect(new PointerTracker().pointers).toEqual([]);
  });

  it("reports a press as down and went-down", () => {
    const tracker = new PointerTracker();
    tracker.press(1, 10, 20);
    expect(tracker.pointers).toEqual([{ id: 1, x: 10, y: 20, isDown: true, wentDown: true, wentUp: false }]);
  });

  it("clears edges at endFrame but keeps held pointers", () => {
    const tracker = new PointerTracker();
    tracker.press(1, 10, 20);
    tracker.endFrame();
    expect(tracker.pointers).toEqual([{ id: 1, x: 10, y: 20, isDown: true, wentDown: false, wentUp: false }]);
  });

  it("moves held pointers and ignores unknown ids", () => {
    const tracker = new PointerTracker();
    tracker.press(1, 10, 20);
    tracker.move(1, 30, 40);
    tracker.move(2, 0, 0);
    expect(tracker.pointers).toHaveLength(1);
    expect(tracker.pointers[0]).toMatchObject({ x: 30, y: 40 });
  });

  it("a repeated press only moves the pointer", () => {
    const tracker = new PointerTracker();
    tracker.press(1, 10, 20);
    tracker.endFrame();
    tracker.press(1, 15, 25);
    expect(tracker.pointers[0]).toMatchObject({ x: 15, y: 25, wentDown: false });
  });

  it("keeps a tap that was pressed and released within one frame", () => {
    const tracker = new PointerTracker();
    tracker.press(1, 10, 20);
    tracker.release(1);
    expect(tracker.pointers).toEqual([{ id: 1, x: 10, y: 20, isDown: false, wentDown: true, wentUp: true }]);
    tracker.endFrame();
    expect(tracker.pointers).toEqual([]);
  });

  it("releaseAll lifts every pointer", () => {
    const tracker = new PointerTracker();
    tracker.press(1, 0, 0);
    tracker.press(2, 5, 5);
    tracker.releaseAll();
    expect(tracker.pointers.map((p) => p.isDown)).toEqual([false, false]);
    expect(tracker.pointers.map((p) => p.wentUp)).toEqual([true, true]);
  });
});
