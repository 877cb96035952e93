/**
 * Bounded undo/redo history of whole states (typically full document text).
 *
 * Two stacks with the same capacity; each evicts its oldest entry first when
 * it overflows. Saving a new state discards the redo stack.
 *
 * GOTCHA: undo and redo are deliberately asymmetric.
 * - undo() pops the newest state and returns the state *now on top*, i.e.
 *   the one before it. The stack must therefore hold the current state on
 *   top for undo to step back exactly one edit.
 * - redo() returns the state it popped.
 * With save(a), save(b): undo() === a, then redo() === b.
 */

import { DEFAULT_HISTORY_CAPACITY } from "../config.ts";

export class HistoryStack<T> {
  readonly capacity: number;
  private _undo: T[] = [];
  private _redo: T[] = [];

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get undoCount(): number {
    return this._undo.length;
  }

  get redoCount(): number {
    return this._redo.length;
  }

  /** Push a state, evicting the oldest past capacity. Clears redo. */
  saveState(state: T): void {
    this._undo.push(state);
    this._redo = [];
    this._enforceCapacity();
  }

  /**
   * Move the newest state to the redo stack and return the state now on top
   * of the undo stack, or undefined if there is none.
   */
  undo(): T | undefined {
    if (this._undo.length === 0) return undefined;
    const current = this._undo.pop();
    if (current !== undefined) this._redo.push(current);
    this._enforceCapacity();
    return this._undo[this._undo.length - 1];
  }

  /** Move the newest redo state back onto the undo stack and return it. */
  redo(): T | undefined {
    if (this._redo.length === 0) return undefined;
    const state = this._redo.pop();
    if (state !== undefined) this._undo.push(state);
    this._enforceCapacity();
    return state;
  }

  canUndo(): boolean {
    return this._undo.length > 0;
  }

  canRedo(): boolean {
    return this._redo.length > 0;
  }

  /** The state on top of the undo stack, without moving anything. */
  peek(): T | undefined {
    return this._undo[this._undo.length - 1];
  }

  clear(): void {
    this._undo = [];
    this._redo = [];
  }

  /**
   * Drop entries that are stale, oldest first, while `isStale` holds.
   * The oldest undo entries sit at the bottom of the undo stack; the oldest
   * redo entries sit on top of the redo stack. Returns how many were dropped.
   */
  pruneOldest(isStale: (state: T) => boolean): number {
    let dropped = 0;

    let oldestUndo = this._undo[0];
    while (oldestUndo !== undefined && isStale(oldestUndo)) {
      this._undo.shift();
      dropped++;
      oldestUndo = this._undo[0];
    }

    let oldestRedo = this._redo[this._redo.length - 1];
    while (oldestRedo !== undefined && isStale(oldestRedo)) {
      this._redo.pop();
      dropped++;
      oldestRedo = this._redo[this._redo.length - 1];
    }

    return dropped;
  }

  private _enforceCapacity(): void {
    while (this._undo.length > this.capacity) this._undo.shift();
    while (this._redo.length > this.capacity) this._redo.shift();
  }
}
