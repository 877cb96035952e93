/**
 * Document and cursor translation benchmarks.
 *
 * Translation scans lines from the top, so these track how the linear cost
 * grows with document size:
 * - Document creation: <1ms for 1K lines, <10ms for 10K lines
 * - toOffset / fromOffset mid-document on 10K lines: <0.1ms
 * - Single-character edit on 1K lines: <0.5ms
 */

import { createDocument } from "../src/buffer/document.ts";
import { fromOffset, toOffset } from "../src/buffer/translate.ts";
import { asDocumentId, asOffset, type Document, position } from "../src/buffer/types.ts";
import { type BenchmarkSuite, measureMemory } from "./harness.ts";

function generateText(lines: number): string {
  return Array.from(
    { length: lines },
    (_, i) => `Line ${i + 1}: Some text content here`,
  ).join("\n");
}

const id = asDocumentId("bench-document");

let document10k: Document = createDocument(id);

export const documentBenchmarks: BenchmarkSuite = {
  name: "Document Operations",
  benchmarks: [
    {
      name: "Create 1K line document",
      iterations: 100,
      targetMs: 1,
      fn: () => {
        createDocument(id, generateText(1000));
      },
    },
    {
      name: "Create 10K line document",
      iterations: 10,
      targetMs: 10,
      setup: () => {
        const { heapUsedKb } = measureMemory(() => createDocument(id, generateText(10_000)));
        console.log(`  heap for 10K lines: ${heapUsedKb.toFixed(0)}KB`);
      },
      fn: () => {
        createDocument(id, generateText(10_000));
      },
    },
    {
      name: "Snapshot creation (10K lines)",
      iterations: 100,
      targetMs: 1,
      setup: () => {
        document10k = createDocument(id, generateText(10_000));
      },
      fn: () => {
        document10k.snapshot();
      },
    },
    {
      name: "toOffset - middle (line 5000)",
      iterations: 10000,
      targetMs: 0.1,
      fn: () => {
        toOffset(document10k, position(5000, 10));
      },
    },
    {
      name: "fromOffset - middle (offset 200000)",
      iterations: 10000,
      targetMs: 0.1,
      fn: () => {
        fromOffset(document10k, 200_000);
      },
    },
    {
      name: "Insert single character (1K document)",
      iterations: 1000,
      targetMs: 0.5,
      fn: () => {
        const doc = createDocument(id, generateText(1000));
        doc.insert(asOffset(500), "X");
      },
    },
    {
      name: "Delete single character (1K document)",
      iterations: 1000,
      targetMs: 0.5,
      fn: () => {
        const doc = createDocument(id, generateText(1000));
        doc.delete(asOffset(500));
      },
    },
  ],
};
