/**
 * History whose entries expire. Anything older than `maxAgeMs` is pruned,
 * oldest first, before every operation.
 */

import { DEFAULT_HISTORY_CAPACITY } from "../config.ts";
import { HistoryStack } from "./history-stack.ts";

export interface Timestamped<T> {
  readonly value: T;
  /** Milliseconds, from the history's clock. */
  readonly at: number;
}

export interface TimestampedHistoryOptions {
  capacity?: number;
  /** Defaults to Date.now. */
  now?: () => number;
}

export class TimestampedHistory<T> {
  readonly maxAgeMs: number;
  private readonly _stack: HistoryStack<Timestamped<T>>;
  private readonly _now: () => number;

  constructor(maxAgeMs: number, options: TimestampedHistoryOptions = {}) {
    this.maxAgeMs = maxAgeMs;
    this._stack = new HistoryStack(options.capacity ?? DEFAULT_HISTORY_CAPACITY);
    this._now = options.now ?? Date.now;
  }

  get undoCount(): number {
    return this._stack.undoCount;
  }

  get redoCount(): number {
    return this._stack.redoCount;
  }

  save(value: T): void {
    this._stack.saveState({ value, at: this._now() });
    this.prune();
  }

  undo(): T | undefined {
    this.prune();
    return this._stack.undo()?.value;
  }

  redo(): T | undefined {
    this.prune();
    return this._stack.redo()?.value;
  }

  canUndo(): boolean {
    this.prune();
    return this._stack.canUndo();
  }

  canRedo(): boolean {
    this.prune();
    return this._stack.canRedo();
  }

  clear(): void {
    this._stack.clear();
  }

  /** Drop expired entries. Returns how many went. */
  prune(): number {
    const cutoff = this._now() - this.maxAgeMs;
    return this._stack.pruneOldest((entry) => entry.at < cutoff);
  }
}
