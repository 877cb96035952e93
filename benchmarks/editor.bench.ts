/**
 * Editor benchmarks: typing and undo through a Session, the path every
 * keystroke takes.
 */

import { Editor } from "../src/editor/editor.ts";
import { MemoryFileService } from "../src/session/file-service.ts";
import { Session } from "../src/session/session.ts";
import type { BenchmarkSuite } from "./harness.ts";

function generateText(lines: number): string {
  return Array.from({ length: lines }, (_, i) => `Line ${i + 1}: editor content`).join("\n");
}

function openEditor(lines: number): Editor {
  const fileService = new MemoryFileService({ files: { "bench.txt": generateText(lines) } });
  const session = Session.fromFiles(["bench.txt"], { fileService });
  return new Editor(session);
}

let editor = openEditor(1);

export const editorBenchmarks: BenchmarkSuite = {
  name: "Editor Operations",
  benchmarks: [
    {
      name: "Type a character (1K lines)",
      iterations: 1000,
      targetMs: 1,
      setup: () => {
        editor = openEditor(1000);
        editor.moveCursor(5, 500);
      },
      fn: () => {
        editor.insertChar("x");
      },
    },
    {
      name: "Backspace (1K lines)",
      iterations: 1000,
      targetMs: 1,
      fn: () => {
        editor.deleteBackward();
      },
    },
    {
      name: "Undo + redo (1K lines)",
      iterations: 1000,
      targetMs: 1,
      setup: () => {
        editor = openEditor(1000);
        editor.insertChar("x");
      },
      fn: () => {
        editor.undo();
        editor.redo();
      },
    },
  ],
};
