/**
 * Benchmark runner for the buffer engine.
 *
 * Run with: npm run bench
 *
 * Target performance:
 * - Document edits: <0.5ms on 1K lines
 * - Cursor translation: <0.1ms on 10K lines
 * - Editor keystroke round trip: <1ms
 */

import { documentBenchmarks } from "./document.bench.ts";
import { editorBenchmarks } from "./editor.bench.ts";
import { type BenchmarkSuite, runBenchmarks } from "./harness.ts";

const suites: BenchmarkSuite[] = [documentBenchmarks, editorBenchmarks];

console.log("=".repeat(60));
console.log("Buffer Engine Performance Benchmarks");
console.log("=".repeat(60));
console.log("");

runBenchmarks(suites);
