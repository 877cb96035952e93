/**
 * Core types for the document model.
 *
 * Design principles:
 * - `text` and `lines` always agree: `lines.join("\n") === text`
 * - Offsets and columns count UTF-16 code units, the way string indices do
 * - Readers get immutable snapshots, writers go through TextStorage
 */

// =============================================================================
// Primitive Types
// =============================================================================

/** Unique identifier for a document within its session */
export type DocumentId = string & { readonly __brand: "DocumentId" };

/** Zero-based line number within a document */
export type Line = number & { readonly __brand: "Line" };

/** Zero-based index into a document's flattened text, in [0, length] */
export type Offset = number & { readonly __brand: "Offset" };

/** A cursor or caret position: zero-based line and column. */
export interface Position {
  readonly line: Line;
  readonly column: number;
}

// biome-ignore lint/plugin/no-type-assertion: expect: branded type construction
export const asDocumentId = (id: string): DocumentId => id as DocumentId;

// biome-ignore lint/plugin/no-type-assertion: expect: branded type construction
export const asLine = (n: number): Line => n as Line;

// biome-ignore lint/plugin/no-type-assertion: expect: branded type construction
export const asOffset = (n: number): Offset => n as Offset;

export function position(line: number, column: number): Position {
  return { line: asLine(line), column };
}

export const ORIGIN: Position = position(0, 0);

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

// =============================================================================
// Text Summary Types
// =============================================================================

/**
 * Aggregated metrics for a document's text.
 * Computed once per mutation and shared by every snapshot of that version.
 */
export interface TextSummary {
  /** Total number of lines (including partial last line) */
  readonly lines: number;
  /** Total UTF-8 byte count, what a file service writes */
  readonly bytes: number;
  /** Length of the last line (for column calculations) */
  readonly lastLineLength: number;
  /** Total character count, newlines included */
  readonly chars: number;
}

// =============================================================================
// Storage Capabilities
// =============================================================================

/**
 * Read side of a document. Everything the cursor translator needs.
 */
export interface TextView {
  readonly lineCount: number;
  /** Length of the flattened text. */
  readonly length: number;

  /** The full text. */
  text(): string;

  /** Length of a line, or 0 when the line does not exist. */
  lineLength(line: Line): number;

  /** Text of a line without its newline, or undefined when out of range. */
  getLine(line: Line): string | undefined;

  isEmpty(): boolean;
}

/**
 * Mutable text storage. Implemented by Document and, by delegation to its
 * current document, by Session.
 */
export interface TextStorage extends TextView {
  /**
   * Insert one character at an offset. A line feed splits the line.
   * Throws OutOfBoundsError past the end of the text.
   */
  insert(at: Offset, char: string): void;

  /**
   * Delete the character before an offset (backspace semantics).
   * At column 0 of a line this joins it onto the previous line. A character
   * outside the Basic Multilingual Plane is removed as both of its code units.
   * Throws InvalidOperationError at offset 0.
   */
  delete(at: Offset): void;

  /** Append text to the end. Empty text is a no-op. */
  append(text: string): void;

  /** Reset to a single empty line. */
  clear(): void;
}

/**
 * Immutable view of a document at one version.
 * Survives later mutations of the document it came from.
 */
export interface DocumentSnapshot extends TextView {
  readonly id: DocumentId;
  readonly version: number;
  readonly textSummary: TextSummary;

  /** Lines [startLine, endLine). */
  lines(startLine: Line, endLine: Line): readonly string[];
}

/**
 * A single in-memory text document.
 */
export interface Document extends TextStorage {
  readonly id: DocumentId;
  /** Incremented by every successful mutation. */
  readonly version: number;

  /** Get an immutable snapshot of current state */
  snapshot(): DocumentSnapshot;
}
