/**
 * Clipboard: copy, cut and paste over offsets.
 *
 * Cut and paste replay the single-character mutation API, so a paste is
 * indistinguishable from typing the same text.
 */

import { deleteRange } from "../buffer/edits.ts";
import {
  advance,
  fromOffset,
  snapToCharacter,
  splitsSurrogatePair,
  toOffset,
} from "../buffer/translate.ts";
import { asOffset, type Position, type TextStorage, type TextView } from "../buffer/types.ts";
import { InvalidOperationError } from "../errors.ts";

export interface CutResult {
  readonly text: string;
  /** Where the cursor goes: the start of the removed range. */
  readonly cursor: Position;
}

export class Clipboard {
  private _contents = "";

  get contents(): string {
    return this._contents;
  }

  isEmpty(): boolean {
    return this._contents.length === 0;
  }

  /**
   * Store `text[start, end)` and return it. An end that falls inside a
   * surrogate pair widens the range to cover the whole character; cut does
   * the same.
   * Throws InvalidOperationError unless `0 <= start < end <= length`.
   */
  copy(view: TextView, start: number, end: number): string {
    const range = this._range(view, start, end);
    this._contents = view.text().slice(range.start, range.end);
    return this._contents;
  }

  /** Copy `[start, end)`, then remove it from `storage`. */
  cut(storage: TextStorage, start: number, end: number): CutResult {
    const range = this._range(storage, start, end);
    const text = storage.text().slice(range.start, range.end);
    this._contents = text;
    deleteRange(storage, asOffset(range.start), range.end - range.start);
    return { text, cursor: fromOffset(storage, range.start) };
  }

  /**
   * Type `text` (the clipboard contents by default) at `cursor`, one
   * character at a time. Returns the cursor after the last character.
   */
  paste(storage: TextStorage, cursor: Position, text: string = this._contents): Position {
    let pos = snapToCharacter(storage, cursor);
    for (const char of text) {
      storage.insert(toOffset(storage, pos), char);
      pos = advance(pos, char);
    }
    return pos;
  }

  private _range(view: TextView, start: number, end: number): { start: number; end: number } {
    const length = view.length;
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start >= length ||
      end > length ||
      start >= end
    ) {
      throw new InvalidOperationError(
        `Invalid range [${start}, ${end}) for text of length ${length}`,
      );
    }
    const text = view.text();
    return {
      start: splitsSurrogatePair(text, start) ? start - 1 : start,
      end: splitsSurrogatePair(text, end) ? end + 1 : end,
    };
  }
}
