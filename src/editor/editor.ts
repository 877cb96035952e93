/**
 * Editor: the command dispatcher that ties cursor, selection, clipboard and
 * history together over a Session.
 *
 * Each document gets its own cursor, selection anchor and snapshot history,
 * keyed by DocumentId, so switching documents picks up where that document
 * was left. The history starts with a baseline snapshot and gains one entry
 * after every edit; undo steps back exactly one edit.
 */

import { advance, constrain, fromOffset, snapToCharacter, toOffset } from "../buffer/translate.ts";
import {
  asOffset,
  type Document,
  type DocumentId,
  ORIGIN,
  type Offset,
  type Position,
  position,
} from "../buffer/types.ts";
import { InvalidOperationError } from "../errors.ts";
import { HistoryStack } from "../history/history-stack.ts";
import { type EngineLogger, silentLogger } from "../logger.ts";
import type { Session } from "../session/session.ts";
import { formatPosition } from "../session/status.ts";
import { Clipboard } from "./clipboard.ts";
import type { Direction, DisplaySurface, EditorCommand, SelectionRange } from "./types.ts";

/** A restorable moment in a document's life. */
interface HistoryEntry {
  readonly text: string;
  readonly cursor: Position;
}

interface DocumentState {
  cursor: Position;
  selectionAnchor: Offset | undefined;
  readonly history: HistoryStack<HistoryEntry>;
}

export interface EditorOptions {
  logger?: EngineLogger;
}

export class Editor {
  readonly session: Session;
  readonly clipboard = new Clipboard();
  private readonly _states = new Map<DocumentId, DocumentState>();
  private readonly _log: EngineLogger;
  private _onChange: (() => void) | null = null;

  constructor(session: Session, options: EditorOptions = {}) {
    this.session = session;
    this._log = options.logger ?? silentLogger;
  }

  get document(): Document {
    return this.session.currentDocument;
  }

  get cursor(): Position {
    return this._state().cursor;
  }

  /** Number of documents holding cursor and history state. */
  get trackedDocuments(): number {
    return this._states.size;
  }

  /** Set a callback to be notified after any dispatched command. */
  onChange(cb: () => void): void {
    this._onChange = cb;
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  insertChar(char: string): void {
    const state = this._state();
    const cursor = snapToCharacter(this.session, state.cursor);
    this.session.insert(toOffset(this.session, cursor), char);
    state.cursor = advance(cursor, char);
    this._record(state);
  }

  insertNewline(): void {
    this.insertChar("\n");
  }

  /** Insert `tabSize` spaces. */
  insertTab(): void {
    this.insertText(" ".repeat(this.session.config.tabSize));
  }

  /** Type `text` at the cursor as one undoable edit. */
  insertText(text: string): void {
    if (text.length === 0) return;
    const state = this._state();
    state.cursor = this.clipboard.paste(this.session, state.cursor, text);
    this._record(state);
  }

  /** Backspace. Does nothing at the start of the document. */
  deleteBackward(): void {
    const state = this._state();
    const offset = toOffset(this.session, snapToCharacter(this.session, state.cursor));
    if (offset === 0) return;
    const before = this.session.length;
    this.session.delete(offset);
    // One unit, or two for a surrogate pair.
    state.cursor = fromOffset(this.session, offset - (before - this.session.length));
    this._record(state);
  }

  /** Delete the character under the cursor. Does nothing at the end. */
  deleteForward(): void {
    const state = this._state();
    const offset = toOffset(this.session, snapToCharacter(this.session, state.cursor));
    if (offset >= this.session.length) return;
    this.session.delete(asOffset(offset + 1));
    state.cursor = fromOffset(this.session, offset);
    this._record(state);
  }

  // ===========================================================================
  // Movement
  // ===========================================================================

  /**
   * Move by `dx` columns and `dy` lines. Negative results stop at zero and
   * the result is clamped into the document; movement never wraps lines.
   * A column landing inside a surrogate pair skips over it in the direction
   * of travel.
   */
  moveCursor(dx: number, dy: number): void {
    const state = this._state();
    const line = Math.max(state.cursor.line + dy, 0);
    const column = Math.max(state.cursor.column + dx, 0);
    state.cursor = snapToCharacter(this.session, position(line, column), dx > 0);
  }

  moveTo(pos: Position): void {
    const state = this._state();
    state.cursor = snapToCharacter(this.session, pos);
  }

  moveToLineStart(): void {
    const state = this._state();
    const { line } = constrain(this.session, state.cursor);
    state.cursor = position(line, 0);
  }

  moveToLineEnd(): void {
    const state = this._state();
    const { line } = constrain(this.session, state.cursor);
    state.cursor = position(line, this.session.lineLength(line));
  }

  // ===========================================================================
  // Selection & clipboard
  // ===========================================================================

  /** Anchor a selection at the cursor; moving the cursor extends it. */
  startSelection(): void {
    const state = this._state();
    state.selectionAnchor = toOffset(this.session, state.cursor);
  }

  selectionRange(): SelectionRange | undefined {
    const state = this._state();
    if (state.selectionAnchor === undefined) return undefined;
    const anchor = Math.min(state.selectionAnchor, this.session.length);
    const head = toOffset(this.session, state.cursor);
    return {
      start: asOffset(Math.min(anchor, head)),
      end: asOffset(Math.max(anchor, head)),
    };
  }

  clearSelection(): void {
    this._state().selectionAnchor = undefined;
  }

  /** Copy the selection to the clipboard and return it. */
  copy(): string {
    const range = this._requireSelection();
    return this.clipboard.copy(this.session, range.start, range.end);
  }

  /** Cut the selection to the clipboard and return it. */
  cut(): string {
    const range = this._requireSelection();
    const state = this._state();
    const result = this.clipboard.cut(this.session, range.start, range.end);
    state.cursor = result.cursor;
    state.selectionAnchor = undefined;
    this._record(state);
    return result.text;
  }

  /** Type the clipboard contents at the cursor. */
  paste(): void {
    if (this.clipboard.isEmpty()) return;
    this.insertText(this.clipboard.contents);
  }

  // ===========================================================================
  // History
  // ===========================================================================

  /** Revert the last edit. Returns false when there is nothing to undo. */
  undo(): boolean {
    const state = this._state();
    // The bottom entry is the baseline, never popped.
    if (state.history.undoCount <= 1) return false;
    const entry = state.history.undo();
    if (entry === undefined) return false;
    this._restore(state, entry);
    return true;
  }

  /** Reapply the last undone edit. Returns false when there is nothing to redo. */
  redo(): boolean {
    const state = this._state();
    const entry = state.history.redo();
    if (entry === undefined) return false;
    this._restore(state, entry);
    return true;
  }

  canUndo(): boolean {
    return this._state().history.undoCount > 1;
  }

  canRedo(): boolean {
    return this._state().history.canRedo();
  }

  // ===========================================================================
  // Documents
  // ===========================================================================

  openDocument(name: string): void {
    this.session.openOrFocus(name);
  }

  newDocument(): void {
    this.session.newEmpty();
  }

  nextDocument(): void {
    this.session.next();
  }

  previousDocument(): void {
    this.session.previous();
  }

  /** Close the focused document and forget its editing state. */
  closeDocument(): void {
    const id = this.document.id;
    this.session.close(this.session.currentIndex);
    this._states.delete(id);
  }

  save(): void {
    this.session.saveCurrent();
  }

  // ===========================================================================
  // Dispatch & display
  // ===========================================================================

  /** Execute a command. */
  dispatch(command: EditorCommand): void {
    switch (command.type) {
      case "insertChar":
        this.insertChar(command.char);
        break;
      case "insertText":
        this.insertText(command.text);
        break;
      case "insertNewline":
        this.insertNewline();
        break;
      case "insertTab":
        this.insertTab();
        break;
      case "deleteBackward":
        this.deleteBackward();
        break;
      case "deleteForward":
        this.deleteForward();
        break;
      case "moveCursor":
        this._moveInDirection(command.direction);
        break;
      case "moveToLineStart":
        this.moveToLineStart();
        break;
      case "moveToLineEnd":
        this.moveToLineEnd();
        break;
      case "startSelection":
        this.startSelection();
        break;
      case "clearSelection":
        this.clearSelection();
        break;
      case "copy":
        this.copy();
        break;
      case "cut":
        this.cut();
        break;
      case "paste":
        this.paste();
        break;
      case "undo":
        this.undo();
        break;
      case "redo":
        this.redo();
        break;
      case "nextDocument":
        this.nextDocument();
        break;
      case "previousDocument":
        this.previousDocument();
        break;
      case "newDocument":
        this.newDocument();
        break;
      case "closeDocument":
        this.closeDocument();
        break;
      case "save":
        this.save();
        break;
    }

    this._onChange?.();
  }

  /** e.g. `notes.txt* [1/2] | Position: 3:7` */
  statusText(): string {
    return `${this.session.bufferStatusLine()} | Position: ${formatPosition(this.cursor)}`;
  }

  render(surface: DisplaySurface): void {
    const cursor = this.cursor;
    surface.renderText(this.session.text(), cursor);
    surface.renderStatus(this.statusText());
    surface.moveCursor(cursor);
    surface.refresh();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Editing state of the focused document, created on first use. State for
   * documents the session no longer holds is dropped first, which covers
   * documents closed through the Session rather than the Editor.
   */
  private _state(): DocumentState {
    if (this._states.size > 0) this._pruneClosed();
    const doc = this.document;
    const existing = this._states.get(doc.id);
    if (existing) return existing;

    const state: DocumentState = {
      cursor: ORIGIN,
      selectionAnchor: undefined,
      history: new HistoryStack(this.session.config.historyCapacity),
    };
    state.history.saveState({ text: doc.text(), cursor: ORIGIN });
    this._states.set(doc.id, state);
    return state;
  }

  private _pruneClosed(): void {
    const open = new Set(this.session.list().map((entry) => entry.id));
    for (const id of [...this._states.keys()]) {
      if (!open.has(id)) this._states.delete(id);
    }
  }

  private _record(state: DocumentState): void {
    state.history.saveState({ text: this.session.text(), cursor: state.cursor });
  }

  private _restore(state: DocumentState, entry: HistoryEntry): void {
    this.session.replaceContent(entry.text);
    state.cursor = snapToCharacter(this.session, entry.cursor);
    state.selectionAnchor = undefined;
    this._log("history restored", {
      document: this.document.id,
      cursor: formatPosition(state.cursor),
    });
  }

  private _requireSelection(): SelectionRange {
    const range = this.selectionRange();
    if (range === undefined) {
      throw new InvalidOperationError("No selection");
    }
    return range;
  }

  private _moveInDirection(direction: Direction): void {
    switch (direction) {
      case "left":
        this.moveCursor(-1, 0);
        break;
      case "right":
        this.moveCursor(1, 0);
        break;
      case "up":
        this.moveCursor(0, -1);
        break;
      case "down":
        this.moveCursor(0, 1);
        break;
    }
  }
}
