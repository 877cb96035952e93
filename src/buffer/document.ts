/**
 * Document: mutable text storage backed by a line array.
 *
 * Character edits work on `lines` (splitting and joining lines in place) and
 * then rebuild `text` from them; `append` goes the other way and re-derives
 * `lines` from `text`. Either way `lines.join("\n") === text` holds whenever
 * a public method returns.
 *
 * Snapshots are immutable views created by copying the line array.
 */

import { InvalidOperationError, OutOfBoundsError } from "../errors.ts";
import { locate, splitsSurrogatePair } from "./translate.ts";
import type {
  Document,
  DocumentId,
  DocumentSnapshot,
  Line,
  Offset,
  TextSummary,
} from "./types.ts";

// =============================================================================
// Helpers
// =============================================================================

function splitLines(text: string): string[] {
  return text.split("\n");
}

/** UTF-8 byte length without allocating a Uint8Array. */
export function utf8ByteLength(str: string): number {
  let bytes = 0;
  for (let i = 0; i < str.length; i++) {
    const code = str.charCodeAt(i);
    if (code <= 0x7f) {
      bytes += 1;
    } else if (code <= 0x7ff) {
      bytes += 2;
    } else if (code >= 0xd800 && code <= 0xdbff) {
      // High surrogate: the pair encodes 4 bytes.
      bytes += 4;
      i++;
    } else {
      bytes += 3;
    }
  }
  return bytes;
}

export function computeTextSummary(lines: readonly string[]): TextSummary {
  let totalBytes = 0;
  let totalChars = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    totalBytes += utf8ByteLength(line);
    totalChars += line.length;
    if (i < lines.length - 1) {
      totalBytes += 1; // newline byte
      totalChars += 1; // newline char
    }
  }

  const lastLine = lines[lines.length - 1] ?? "";
  return {
    lines: lines.length,
    bytes: totalBytes,
    lastLineLength: lastLine.length,
    chars: totalChars,
  };
}

/** True when `value` is exactly one Unicode scalar value. */
function isSingleCharacter(value: string): boolean {
  if (value.length === 1) return true;
  if (value.length !== 2) return false;
  const high = value.charCodeAt(0);
  const low = value.charCodeAt(1);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

// =============================================================================
// DocumentSnapshot
// =============================================================================

class DocumentSnapshotImpl implements DocumentSnapshot {
  readonly id: DocumentId;
  readonly version: number;
  readonly lineCount: number;
  readonly length: number;
  private readonly _lines: readonly string[];
  private readonly _text: string;
  private _summary: TextSummary | undefined;

  constructor(id: DocumentId, version: number, lines: readonly string[], text: string) {
    this.id = id;
    this.version = version;
    this._lines = lines;
    this._text = text;
    this.lineCount = lines.length;
    this.length = text.length;
  }

  get textSummary(): TextSummary {
    this._summary ??= computeTextSummary(this._lines);
    return this._summary;
  }

  text(): string {
    return this._text;
  }

  lineLength(line: Line): number {
    return this._lines[line]?.length ?? 0;
  }

  getLine(line: Line): string | undefined {
    return this._lines[line];
  }

  lines(startLine: Line, endLine: Line): readonly string[] {
    return this._lines.slice(startLine, endLine);
  }

  isEmpty(): boolean {
    return this._text.length === 0;
  }
}

// =============================================================================
// Document
// =============================================================================

class DocumentImpl implements Document {
  readonly id: DocumentId;
  private _text: string;
  private _lines: string[];
  private _version = 0;

  constructor(id: DocumentId, text: string) {
    this.id = id;
    this._text = text;
    this._lines = splitLines(text);
  }

  get version(): number {
    return this._version;
  }

  get lineCount(): number {
    return this._lines.length;
  }

  get length(): number {
    return this._text.length;
  }

  text(): string {
    return this._text;
  }

  lineLength(line: Line): number {
    return this._lines[line]?.length ?? 0;
  }

  getLine(line: Line): string | undefined {
    return this._lines[line];
  }

  isEmpty(): boolean {
    return this._text.length === 0;
  }

  snapshot(): DocumentSnapshot {
    return new DocumentSnapshotImpl(this.id, this._version, this._lines.slice(), this._text);
  }

  insert(at: Offset, char: string): void {
    if (!isSingleCharacter(char)) {
      throw new InvalidOperationError(
        `insert takes a single character, got ${JSON.stringify(char)}`,
      );
    }
    const { line, column } = locate(this, at);
    const current = this._lines[line] ?? "";

    if (char === "\n") {
      this._lines.splice(line, 1, current.slice(0, column), current.slice(column));
    } else {
      this._lines[line] = current.slice(0, column) + char + current.slice(column);
    }

    this._rebuildText();
  }

  delete(at: Offset): void {
    if (!Number.isInteger(at) || at < 0 || at > this._text.length) {
      throw new OutOfBoundsError("Offset", at, this._text.length);
    }
    if (at === 0) {
      throw new InvalidOperationError("Cannot delete at the beginning of the document");
    }

    const { line, column } = locate(this, at);

    if (column === 0) {
      // Join this line onto the previous one, dropping the newline between them.
      const removed = this._lines[line] ?? "";
      this._lines.splice(line, 1);
      this._lines[line - 1] = (this._lines[line - 1] ?? "") + removed;
    } else {
      // A surrogate pair goes as a whole, whichever half the offset touches.
      const current = this._lines[line] ?? "";
      let start = column - 1;
      let end = column;
      if (splitsSurrogatePair(current, start)) start--;
      if (splitsSurrogatePair(current, end)) end++;
      this._lines[line] = current.slice(0, start) + current.slice(end);
    }

    this._rebuildText();
  }

  append(text: string): void {
    if (text.length === 0) return;
    this._text += text;
    this._lines = splitLines(this._text);
    this._version++;
  }

  clear(): void {
    this._text = "";
    this._lines = [""];
    this._version++;
  }

  private _rebuildText(): void {
    this._text = this._lines.join("\n");
    this._version++;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createDocument(id: DocumentId, text = ""): Document {
  return new DocumentImpl(id, text);
}
