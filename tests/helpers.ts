/**
 * Test helpers and utilities.
 */

import { expect } from "vitest";
import { createDocument } from "../src/buffer/document.ts";
import {
  asDocumentId,
  asLine,
  asOffset,
  type Document,
  type DocumentId,
  type Offset,
  type Position,
  position,
} from "../src/buffer/types.ts";
import type { DisplaySize, DisplaySurface, InputCode } from "../src/editor/types.ts";
import type { EngineLogger } from "../src/logger.ts";
import { MemoryFileService } from "../src/session/file-service.ts";
import { Session } from "../src/session/session.ts";

// =============================================================================
// Type Constructors (for tests only)
// =============================================================================

let documentIdCounter = 0;

export function createDocumentId(): DocumentId {
  return asDocumentId(`test-doc-${++documentIdCounter}`);
}

export function doc(text = ""): Document {
  return createDocument(createDocumentId(), text);
}

export function offset(n: number): Offset {
  return asOffset(n);
}

export function pos(line: number, column: number): Position {
  return position(line, column);
}

// =============================================================================
// Sessions & Fakes
// =============================================================================

export function memorySession(
  files: Record<string, string> = {},
  config: Record<string, unknown> = {},
): { session: Session; files: MemoryFileService } {
  const fileService = new MemoryFileService({ files });
  const session = new Session({ fileService, config });
  return { session, files: fileService };
}

export interface LogEntry {
  message: string;
  details: Record<string, unknown> | undefined;
}

/** A logger that keeps everything it is given. */
export function recordingLogger(): { logger: EngineLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger: EngineLogger = (message, details) => {
    entries.push({ message, details });
  };
  return { logger, entries };
}

/** A display surface that records every call in order. */
export class RecordingSurface implements DisplaySurface {
  readonly calls: string[] = [];
  private readonly _inputs: InputCode[];
  private readonly _size: DisplaySize;

  constructor(inputs: InputCode[] = [], size: DisplaySize = { rows: 24, columns: 80 }) {
    this._inputs = inputs;
    this._size = size;
  }

  renderText(text: string, cursor: Position): void {
    this.calls.push(`text ${JSON.stringify(text)} @${cursor.line}:${cursor.column}`);
  }

  renderStatus(status: string): void {
    this.calls.push(`status ${status}`);
  }

  moveCursor(position: Position): void {
    this.calls.push(`cursor ${position.line}:${position.column}`);
  }

  refresh(): void {
    this.calls.push("refresh");
  }

  readInput(): InputCode {
    const code = this._inputs.shift();
    if (code === undefined) throw new Error("No more input");
    return code;
  }

  size(): DisplaySize {
    return this._size;
  }
}

// =============================================================================
// Test Data Generators
// =============================================================================

/**
 * Generate lines of text for testing.
 */
export function generateLines(count: number, prefix = "Line"): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`);
}

/**
 * Generate a text blob with N lines.
 */
export function generateText(lineCount: number, prefix = "Line"): string {
  return generateLines(lineCount, prefix).join("\n");
}

// =============================================================================
// Assertion Helpers
// =============================================================================

/**
 * Assert a position (handles branded types).
 */
export function expectPosition(actual: Position, line: number, column: number): void {
  expect({ line: actual.line, column: actual.column }).toEqual({ line, column });
}

/** Assert the document invariant: lines joined by "\n" reproduce the text. */
export function expectConsistent(document: Document): void {
  const lines: string[] = [];
  for (let i = 0; i < document.lineCount; i++) {
    lines.push(document.getLine(asLine(i)) ?? "");
  }
  expect(lines.join("\n")).toBe(document.text());
}

// =============================================================================
// Reset (for test isolation)
// =============================================================================

export function resetCounters(): void {
  documentIdCounter = 0;
}
