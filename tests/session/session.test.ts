/**
 * Session tests: document management, dirty tracking, persistence and
 * status formatting, against an in-memory file service.
 */

import { describe, expect, test } from "vitest";
import { asLine } from "../../src/buffer/types.ts";
import {
  ConfigError,
  FileServiceError,
  InvalidOperationError,
  isEngineError,
  OutOfBoundsError,
} from "../../src/errors.ts";
import { MemoryFileService } from "../../src/session/file-service.ts";
import { Session } from "../../src/session/session.ts";
import { formatPosition } from "../../src/session/status.ts";
import { memorySession, offset, pos, recordingLogger } from "../helpers.ts";

const FILES = { "a.txt": "alpha", "b.txt": "bravo\nline two" };

describe("Session - creation", () => {
  test("starts with one clean untitled document", () => {
    const { session } = memorySession();
    expect(session.documentCount).toBe(1);
    expect(session.currentIndex).toBe(0);
    expect(session.currentMetadata).toEqual({ id: "doc-1", name: "*untitled-1", dirty: false });
    expect(session.text()).toBe("");
  });

  test("rejects invalid configuration", () => {
    expect(() => memorySession({}, { tabSize: 0 })).toThrow(ConfigError);
  });

  test("fromFiles opens every name in order and focuses the first", () => {
    const fileService = new MemoryFileService({ files: FILES });
    const session = Session.fromFiles(["a.txt", "b.txt"], { fileService });
    expect(session.documentCount).toBe(2);
    expect(session.currentIndex).toBe(0);
    expect(session.list().map((entry) => entry.name)).toEqual(["a.txt", "b.txt"]);
    expect(session.text()).toBe("alpha");
  });

  test("fromFiles with no names gives one untitled document", () => {
    const session = Session.fromFiles([], { fileService: new MemoryFileService() });
    expect(session.documentCount).toBe(1);
    expect(session.currentMetadata.name).toBe("*untitled-1");
  });

  test("fromFiles starts the untitled counter fresh", () => {
    const fileService = new MemoryFileService({ files: FILES });
    const session = Session.fromFiles(["a.txt"], { fileService });
    session.newEmpty();
    expect(session.currentMetadata.name).toBe("*untitled-1");
    expect(session.currentDocument.id).toBe("doc-2");
  });

  test("fromFiles aborts on the first failing open", () => {
    const fileService = new MemoryFileService({ files: FILES });
    expect(() => Session.fromFiles(["a.txt", "missing.txt"], { fileService })).toThrow(
      FileServiceError,
    );
  });
});

describe("Session - opening and focus", () => {
  test("openOrFocus opens a new document and focuses it", () => {
    const { session } = memorySession(FILES);
    expect(session.openOrFocus("a.txt")).toBe(1);
    expect(session.currentIndex).toBe(1);
    expect(session.text()).toBe("alpha");
    expect(session.currentMetadata.dirty).toBe(false);
  });

  test("openOrFocus focuses a document that is already open", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.switchTo(0);
    expect(session.openOrFocus("a.txt")).toBe(1);
    expect(session.documentCount).toBe(2);
    expect(session.currentIndex).toBe(1);
  });

  test("file service errors pass through unchanged", () => {
    const { session } = memorySession(FILES);
    let caught: unknown;
    try {
      session.openOrFocus("missing.txt");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FileServiceError);
    expect(isEngineError(caught, "Io")).toBe(true);
    if (caught instanceof FileServiceError) {
      expect(caught.reason).toBe("NotFound");
      expect(caught.fileName).toBe("missing.txt");
    }
    expect(session.documentCount).toBe(1);
  });

  test("newEmpty numbers untitled documents and never reuses a number", () => {
    const { session } = memorySession();
    session.newEmpty();
    session.newEmpty();
    expect(session.currentMetadata.name).toBe("*untitled-3");
    session.close(2);
    session.newEmpty();
    expect(session.currentMetadata.name).toBe("*untitled-4");
  });

  test("switchTo rejects indices out of range", () => {
    const { session } = memorySession();
    expect(() => session.switchTo(1)).toThrow(OutOfBoundsError);
    expect(() => session.switchTo(-1)).toThrow(OutOfBoundsError);
  });

  test("next and previous wrap around", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.openOrFocus("b.txt");
    expect(session.next()).toBe(0);
    expect(session.previous()).toBe(2);
    expect(session.previous()).toBe(1);
  });

  test("documentAt returns the document at an index", () => {
    const fileService = new MemoryFileService({ files: FILES });
    const session = Session.fromFiles(["a.txt", "b.txt"], { fileService });
    expect(session.documentAt(1)?.text()).toBe("bravo\nline two");
    expect(session.documentAt(1)?.id).toBe(session.list()[1]?.id);
    expect(session.documentAt(2)).toBeUndefined();
  });

  test("findByName", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("b.txt");
    expect(session.findByName("b.txt")).toBe(1);
    expect(session.findByName("a.txt")).toBeUndefined();
  });
});

describe("Session - close", () => {
  test("closing the only document leaves a fresh untitled one", () => {
    const { session } = memorySession();
    session.insert(offset(0), "x");
    session.close(0);
    expect(session.documentCount).toBe(1);
    expect(session.text()).toBe("");
    expect(session.currentMetadata).toEqual({ id: "doc-2", name: "*untitled-2", dirty: false });
  });

  test("closing before the focused document shifts focus down", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.openOrFocus("b.txt");
    session.close(0);
    expect(session.currentIndex).toBe(1);
    expect(session.currentMetadata.name).toBe("b.txt");
  });

  test("closing after the focused document keeps focus", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.openOrFocus("b.txt");
    session.switchTo(0);
    session.close(2);
    expect(session.currentIndex).toBe(0);
    expect(session.documentCount).toBe(2);
  });

  test("closing the focused first document focuses the next one", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.switchTo(0);
    session.close(0);
    expect(session.currentIndex).toBe(0);
    expect(session.currentMetadata.name).toBe("a.txt");
  });

  test("closing the focused last document focuses the one before", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.close(1);
    expect(session.currentIndex).toBe(0);
    expect(session.currentMetadata.name).toBe("*untitled-1");
  });

  test("rejects indices out of range", () => {
    const { session } = memorySession();
    expect(() => session.close(3)).toThrow(OutOfBoundsError);
  });
});

describe("Session - mutations", () => {
  test("mutations go to the focused document and mark it dirty", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("b.txt");
    session.insert(offset(5), "!");
    expect(session.getLine(asLine(0))).toBe("bravo!");
    expect(session.lineCount).toBe(2);
    expect(session.currentMetadata.dirty).toBe(true);
    expect(session.metadataAt(0)?.dirty).toBe(false);
    expect(session.hasUnsavedChanges()).toBe(true);
  });

  test("delete, append and clear mark dirty", () => {
    for (const mutate of [
      (s: Session) => s.delete(offset(1)),
      (s: Session) => s.append("more"),
      (s: Session) => s.clear(),
    ]) {
      const { session } = memorySession(FILES);
      session.openOrFocus("a.txt");
      mutate(session);
      expect(session.currentMetadata.dirty).toBe(true);
    }
  });

  test("appending nothing leaves the document clean", () => {
    const { session } = memorySession();
    session.append("");
    expect(session.currentMetadata.dirty).toBe(false);
  });

  test("a failed mutation leaves the document clean", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    expect(() => session.delete(offset(0))).toThrow(InvalidOperationError);
    expect(session.currentMetadata.dirty).toBe(false);
  });

  test("replaceContent swaps the text and keeps the document", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    const id = session.currentDocument.id;
    session.replaceContent("new\ntext");
    expect(session.text()).toBe("new\ntext");
    expect(session.lineCount).toBe(2);
    expect(session.currentDocument.id).toBe(id);
    expect(session.currentMetadata.dirty).toBe(true);
  });

  test("read-only sessions reject mutations and saves", () => {
    const { session } = memorySession(FILES, { readonly: true });
    session.openOrFocus("a.txt");
    expect(() => session.insert(offset(0), "x")).toThrow(InvalidOperationError);
    expect(() => session.replaceContent("x")).toThrow(InvalidOperationError);
    expect(() => session.saveCurrent()).toThrow(InvalidOperationError);
    expect(session.text()).toBe("alpha");
  });
});

describe("Session - saving", () => {
  test("saveCurrent writes the text and clears dirty", () => {
    const { session, files } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.insert(offset(0), "X");
    session.saveCurrent();
    expect(files.read("a.txt")).toBe("Xalpha");
    expect(session.currentMetadata.dirty).toBe(false);
  });

  test("a failed save keeps the document dirty and logs", () => {
    const { logger, entries } = recordingLogger();
    const fileService = new MemoryFileService({ files: { "ro.txt": "x" }, readOnly: ["ro.txt"] });
    const session = new Session({ fileService, logger });
    session.openOrFocus("ro.txt");
    session.insert(offset(1), "y");

    expect(() => session.saveCurrent()).toThrow(FileServiceError);
    expect(session.currentMetadata.dirty).toBe(true);
    expect(entries.at(-1)).toEqual({
      message: "save failed",
      details: { name: "ro.txt", error: "Cannot write to file: ro.txt" },
    });
  });

  test("saveCurrentAs renames the document on success", () => {
    const { session, files } = memorySession();
    session.append("draft");
    session.saveCurrentAs("draft.txt");
    expect(files.read("draft.txt")).toBe("draft");
    expect(session.currentMetadata).toEqual({ id: "doc-1", name: "draft.txt", dirty: false });
    expect(session.findByName("draft.txt")).toBe(0);
  });

  test("saveCurrentAs keeps the old name when the save fails", () => {
    const { session } = memorySession();
    expect(() => session.saveCurrentAs("")).toThrow(FileServiceError);
    expect(session.currentMetadata.name).toBe("*untitled-1");
  });
});

describe("Session - status", () => {
  test("status line for a single clean document is just its name", () => {
    const { session } = memorySession();
    expect(session.bufferStatusLine()).toBe("*untitled-1");
  });

  test("status line marks dirty and shows the position among documents", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.insert(offset(0), "x");
    expect(session.bufferStatusLine()).toBe("a.txt* [2/2]");
  });

  test("listing marks the focused and dirty documents", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    session.insert(offset(0), "x");
    expect(session.bufferListing()).toBe("    1: *untitled-1\n*+  2: a.txt\n");
  });

  test("list describes every document", () => {
    const { session } = memorySession(FILES);
    session.openOrFocus("a.txt");
    expect(session.list()).toEqual([
      { index: 0, id: "doc-1", name: "*untitled-1", dirty: false, current: false },
      { index: 1, id: "doc-2", name: "a.txt", dirty: false, current: true },
    ]);
  });

  test("formatPosition is 1-based", () => {
    expect(formatPosition(pos(0, 0))).toBe("1:1");
    expect(formatPosition(pos(2, 7))).toBe("3:8");
  });
});

describe("Session - logging", () => {
  test("logs opens, focus changes and closes", () => {
    const { logger, entries } = recordingLogger();
    const session = new Session({ fileService: new MemoryFileService({ files: FILES }), logger });
    session.openOrFocus("a.txt");
    session.switchTo(0);
    session.close(1);
    expect(entries.map((entry) => entry.message)).toEqual([
      "document opened",
      "focus changed",
      "document closed",
    ]);
    expect(entries[0]?.details).toEqual({ name: "a.txt", index: 1, length: 5 });
  });
});
