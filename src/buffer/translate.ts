/**
 * Cursor translation: pure functions mapping a (line, column) position to a
 * linear offset into a document's text, and back.
 *
 * Both directions scan lines from the top, adding `lineLength + 1` per line
 * for its newline. That is linear in line count, which is fine for buffers a
 * person edits interactively. A prefix-sum table of line starts with a
 * binary search is the upgrade path if that ever stops being true.
 *
 * The tolerant functions (toOffset, fromOffset, constrain) never throw: a
 * cursor is routinely one keystroke stale relative to the text, and stale
 * positions saturate to the nearest valid one instead.
 */

import { OutOfBoundsError } from "../errors.ts";
import { asLine, asOffset, type Offset, type Position, position, type TextView } from "./types.ts";

/**
 * Clamp a position into the document: line into [0, lineCount - 1], column
 * into [0, lineLength(line)].
 */
export function constrain(view: TextView, pos: Position): Position {
  const lastLine = Math.max(view.lineCount - 1, 0);
  const line = Math.min(Math.max(pos.line, 0), lastLine);
  const lineLength = view.lineLength(asLine(line));
  const column = Math.min(Math.max(pos.column, 0), lineLength);
  if (line === pos.line && column === pos.column) return pos;
  return position(line, column);
}

/**
 * Offset of a position. Out-of-range lines and columns saturate.
 */
export function toOffset(view: TextView, pos: Position): Offset {
  const clamped = constrain(view, pos);
  let offset = 0;
  for (let i = 0; i < clamped.line; i++) {
    offset += view.lineLength(asLine(i)) + 1;
  }
  return asOffset(offset + clamped.column);
}

/**
 * Position of an offset. An offset on a newline maps to the end of the line
 * the newline terminates; anything past the text maps to the end of the
 * last line.
 */
export function fromOffset(view: TextView, offset: number): Position {
  if (offset <= 0) return position(0, 0);

  let lineStart = 0;
  for (let i = 0; i < view.lineCount; i++) {
    const lineLength = view.lineLength(asLine(i));
    if (lineStart + lineLength >= offset) {
      return position(i, offset - lineStart);
    }
    lineStart += lineLength + 1;
  }

  const lastLine = Math.max(view.lineCount - 1, 0);
  return position(lastLine, view.lineLength(asLine(lastLine)));
}

/**
 * Strict variant of fromOffset for callers that must not act on a clamped
 * position. Throws OutOfBoundsError outside [0, length].
 */
export function locate(view: TextView, offset: number): Position {
  if (!Number.isInteger(offset) || offset < 0 || offset > view.length) {
    throw new OutOfBoundsError("Offset", offset, view.length);
  }
  return fromOffset(view, offset);
}

/**
 * Where the cursor lands after typing `char` at `pos`.
 */
export function advance(pos: Position, char: string): Position {
  if (char === "\n") return position(pos.line + 1, 0);
  return position(pos.line, pos.column + char.length);
}

// =============================================================================
// Surrogate pairs
// =============================================================================

/**
 * True when `index` falls between the two halves of a surrogate pair in
 * `text`. Offsets count UTF-16 code units, so an astral character such as an
 * emoji spans two of them and no edit or cursor may stop in its middle.
 */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/**
 * Constrain a position, then move it off the middle of a surrogate pair:
 * forward past the pair, or back to its start.
 */
export function snapToCharacter(view: TextView, pos: Position, forward = false): Position {
  const clamped = constrain(view, pos);
  const line = view.getLine(asLine(clamped.line)) ?? "";
  if (!splitsSurrogatePair(line, clamped.column)) return clamped;
  return position(clamped.line, clamped.column + (forward ? 1 : -1));
}
