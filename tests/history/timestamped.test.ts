import { describe, expect, test } from "vitest";
import { TimestampedHistory } from "../../src/history/timestamped.ts";

function manualClock(start = 0): { now: () => number; set: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
  };
}

describe("TimestampedHistory", () => {
  test("behaves like a history stack while entries are fresh", () => {
    const clock = manualClock();
    const history = new TimestampedHistory<string>(1000, { now: clock.now });
    history.save("a");
    history.save("b");
    expect(history.undo()).toBe("a");
    expect(history.redo()).toBe("b");
  });

  test("drops expired entries before undoing", () => {
    const clock = manualClock();
    const history = new TimestampedHistory<string>(1000, { now: clock.now });
    history.save("a");
    clock.set(500);
    history.save("b");
    clock.set(900);
    history.save("c");

    clock.set(1200);
    expect(history.undo()).toBe("b");
    expect(history.undoCount).toBe(1);
    expect(history.redoCount).toBe(1);
  });

  test("expires redo entries too", () => {
    const clock = manualClock();
    const history = new TimestampedHistory<string>(1000, { now: clock.now });
    history.save("a");
    history.save("b");
    history.undo();

    clock.set(1500);
    expect(history.canRedo()).toBe(false);
    expect(history.canUndo()).toBe(false);
  });

  test("prune reports how many entries went", () => {
    const clock = manualClock();
    const history = new TimestampedHistory<number>(100, { now: clock.now });
    history.save(1);
    clock.set(50);
    history.save(2);
    clock.set(120);
    expect(history.prune()).toBe(1);
    expect(history.prune()).toBe(0);
  });

  test("saving prunes", () => {
    const clock = manualClock();
    const history = new TimestampedHistory<string>(1000, { now: clock.now });
    history.save("old");
    clock.set(5000);
    history.save("new");
    expect(history.undoCount).toBe(1);
  });

  test("respects capacity", () => {
    const history = new TimestampedHistory<number>(60_000, { capacity: 2 });
    history.save(1);
    history.save(2);
    history.save(3);
    expect(history.undoCount).toBe(2);
    history.clear();
    expect(history.undoCount).toBe(0);
  });
});
