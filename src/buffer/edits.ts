/**
 * Multi-character edits expressed as replays of the single-character
 * mutation API, so they behave exactly like the equivalent keystrokes.
 */

import { asOffset, type Offset, type TextStorage } from "./types.ts";

/**
 * Remove `count` code units starting at `start`.
 *
 * `delete` removes the character *before* its offset, so every call targets
 * the fixed offset `start + 1`; each deletion shifts the rest of the range
 * left into that slot. A surrogate pair leaves in one call, so the loop runs
 * until the text is `count` units shorter.
 */
export function deleteRange(storage: TextStorage, start: Offset, count: number): void {
  const target = asOffset(start + 1);
  const finalLength = storage.length - count;
  while (storage.length > finalLength) {
    storage.delete(target);
  }
}

/**
 * Insert `text` one character at a time from `at`.
 * Returns the offset just past the inserted text.
 */
export function insertText(storage: TextStorage, at: Offset, text: string): Offset {
  let offset: number = at;
  for (const char of text) {
    storage.insert(asOffset(offset), char);
    offset += char.length;
  }
  return asOffset(offset);
}
