/**
 * Action log: undo history made of structured edits instead of snapshots.
 *
 * Each entry records what a mutation did (which text went in or out, and
 * where). Undo hands back the inverse edit for the caller to apply; redo
 * hands back the original edit.
 *
 * Groups: `startGroup` / `endGroup` turn a run of recorded actions into one
 * undo unit. In "last" mode (the default) only the final action of the group
 * is kept, so undoing a group reverts just its last edit. In "compound" mode
 * the whole group is stored and undone as one.
 */

import { deleteRange, insertText } from "../buffer/edits.ts";
import type { Offset, TextStorage } from "../buffer/types.ts";
import { DEFAULT_HISTORY_CAPACITY, type EngineConfig } from "../config.ts";
import { HistoryStack } from "./history-stack.ts";

export type EditAction =
  | { readonly type: "insertChar"; readonly offset: Offset; readonly char: string }
  | { readonly type: "deleteChar"; readonly offset: Offset; readonly char: string }
  | { readonly type: "insertText"; readonly offset: Offset; readonly text: string }
  | { readonly type: "deleteText"; readonly offset: Offset; readonly text: string }
  | { readonly type: "group"; readonly actions: readonly EditAction[] };

export type GroupMode = EngineConfig["groupMode"];

export interface ActionLogOptions {
  capacity?: number;
  groupMode?: GroupMode;
}

/**
 * The edit that undoes `action`. Groups invert member by member, in reverse.
 */
export function invertAction(action: EditAction): EditAction {
  switch (action.type) {
    case "insertChar":
      return { type: "deleteChar", offset: action.offset, char: action.char };
    case "deleteChar":
      return { type: "insertChar", offset: action.offset, char: action.char };
    case "insertText":
      return { type: "deleteText", offset: action.offset, text: action.text };
    case "deleteText":
      return { type: "insertText", offset: action.offset, text: action.text };
    case "group":
      return { type: "group", actions: action.actions.map(invertAction).reverse() };
  }
}

/**
 * Replay an action against storage. Deletions remove the recorded text
 * starting at the recorded offset.
 */
export function applyAction(storage: TextStorage, action: EditAction): void {
  switch (action.type) {
    case "insertChar":
      storage.insert(action.offset, action.char);
      return;
    case "deleteChar":
      deleteRange(storage, action.offset, action.char.length);
      return;
    case "insertText":
      insertText(storage, action.offset, action.text);
      return;
    case "deleteText":
      deleteRange(storage, action.offset, action.text.length);
      return;
    case "group":
      for (const member of action.actions) applyAction(storage, member);
      return;
  }
}

export class ActionLog {
  readonly groupMode: GroupMode;
  private readonly _entries: HistoryStack<EditAction>;
  private _grouping = false;
  private _group: EditAction[] = [];

  constructor(options: ActionLogOptions = {}) {
    this._entries = new HistoryStack(options.capacity ?? DEFAULT_HISTORY_CAPACITY);
    this.groupMode = options.groupMode ?? "last";
  }

  get isGrouping(): boolean {
    return this._grouping;
  }

  /** Begin collecting actions into one undo unit. Restarts an open group. */
  startGroup(): void {
    this._grouping = true;
    this._group = [];
  }

  /** Close the open group and store it according to the group mode. */
  endGroup(): void {
    if (this._grouping && this._group.length > 0) {
      if (this.groupMode === "compound") {
        this._entries.saveState({ type: "group", actions: this._group });
      } else {
        const last = this._group[this._group.length - 1];
        if (last) this._entries.saveState(last);
      }
    }
    this._grouping = false;
    this._group = [];
  }

  record(action: EditAction): void {
    if (this._grouping) {
      this._group.push(action);
    } else {
      this._entries.saveState(action);
    }
  }

  /** The inverse of the newest entry, which moves to the redo side. */
  undoAction(): EditAction | undefined {
    const newest = this._entries.peek();
    if (newest === undefined) return undefined;
    this._entries.undo();
    return invertAction(newest);
  }

  /** The entry most recently undone, moved back to the undo side. */
  redoAction(): EditAction | undefined {
    return this._entries.redo();
  }

  canUndo(): boolean {
    return this._entries.canUndo();
  }

  canRedo(): boolean {
    return this._entries.canRedo();
  }

  clear(): void {
    this._entries.clear();
    this._grouping = false;
    this._group = [];
  }

  stats(): { undo: number; redo: number } {
    return { undo: this._entries.undoCount, redo: this._entries.redoCount };
  }
}
