/**
 * Editor command and display types.
 */

import type { Offset, Position } from "../buffer/types.ts";

/** Direction for cursor movement. */
export type Direction = "left" | "right" | "up" | "down";

/** All editor commands. */
export type EditorCommand =
  | { type: "insertChar"; char: string }
  | { type: "insertText"; text: string }
  | { type: "insertNewline" }
  | { type: "insertTab" }
  | { type: "deleteBackward" }
  | { type: "deleteForward" }
  | { type: "moveCursor"; direction: Direction }
  | { type: "moveToLineStart" }
  | { type: "moveToLineEnd" }
  | { type: "startSelection" }
  | { type: "clearSelection" }
  | { type: "copy" }
  | { type: "cut" }
  | { type: "paste" }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "nextDocument" }
  | { type: "previousDocument" }
  | { type: "newDocument" }
  | { type: "closeDocument" }
  | { type: "save" };

/** Ordered `[start, end)` offsets of the selection. */
export interface SelectionRange {
  readonly start: Offset;
  readonly end: Offset;
}

/**
 * Raw input codes delivered by a display surface. Printable characters
 * arrive as their character code; the rest use these values.
 */
export const InputCode = {
  Backspace: 127,
  BackspaceAlt: 8,
  Tab: 9,
  Enter: 10,
  Return: 13,
  Escape: 27,
  Up: 1001,
  Down: 1002,
  Left: 1003,
  Right: 1004,
  Delete: 1005,
  Home: 1006,
  End: 1007,
} as const;

export type InputCode = number;

export interface DisplaySize {
  readonly rows: number;
  readonly columns: number;
}

/**
 * A terminal or other screen the editor draws onto. Implementations own
 * their own drawing state; the editor only pushes text, status and cursor.
 */
export interface DisplaySurface {
  /** Draw the document text with the cursor at `cursor`. */
  renderText(text: string, cursor: Position): void;
  renderStatus(status: string): void;
  moveCursor(position: Position): void;
  /** Flush pending drawing. */
  refresh(): void;
  /** Block until the next key and return its code. */
  readInput(): InputCode;
  size(): DisplaySize;
}
