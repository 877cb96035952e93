/**
 * Text formatting for session state: the status line, the buffer listing
 * and cursor positions.
 */

import type { Position } from "../buffer/types.ts";
import type { DocumentMetadata } from "./types.ts";

/**
 * `name`, a `*` when dirty, and ` [i/n]` (1-based) when the session holds
 * more than one document.
 */
export function bufferStatusLine(
  documents: readonly DocumentMetadata[],
  currentIndex: number,
): string {
  const current = documents[currentIndex];
  if (current === undefined) return "";
  let status = current.name;
  if (current.dirty) status += "*";
  if (documents.length > 1) {
    status += ` [${currentIndex + 1}/${documents.length}]`;
  }
  return status;
}

/**
 * One line per document: `*` marks the current one, `+` a dirty one, then
 * the 1-based index right-aligned to width 3 and the name.
 *
 * ```
 * *+  1: notes.txt
 *     2: todo.txt
 * ```
 */
export function bufferListing(
  documents: readonly DocumentMetadata[],
  currentIndex: number,
): string {
  let listing = "";
  documents.forEach((doc, index) => {
    const marker = index === currentIndex ? "*" : " ";
    const modified = doc.dirty ? "+" : " ";
    listing += `${marker}${modified}${String(index + 1).padStart(3)}: ${doc.name}\n`;
  });
  return listing;
}

/** `line:column`, both 1-based. */
export function formatPosition(pos: Position): string {
  return `${pos.line + 1}:${pos.column + 1}`;
}
