/**
 * Benchmark harness: warmup, timed iterations, percentile stats and a
 * pass/fail verdict against a per-benchmark target.
 */

export interface Benchmark {
  name: string;
  /** Runs once before warmup. */
  setup?: () => void;
  fn: () => void;
  /** Default 1000. */
  iterations?: number;
  /** Fails the benchmark when the median exceeds it. */
  targetMs?: number;
}

export interface BenchmarkSuite {
  name: string;
  benchmarks: Benchmark[];
}

export interface BenchmarkResult {
  name: string;
  iterations: number;
  medianMs: number;
  p95Ms: number;
  maxMs: number;
  opsPerSec: number;
  targetMs: number | undefined;
  passed: boolean;
}

function percentile(sorted: readonly number[], fraction: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(sorted.length - 1, Math.floor(sorted.length * fraction));
  return sorted[index] ?? 0;
}

export function runBenchmark(bench: Benchmark): BenchmarkResult {
  const iterations = bench.iterations ?? 1000;
  bench.setup?.();

  const warmup = Math.max(10, Math.floor(iterations / 10));
  for (let i = 0; i < warmup; i++) bench.fn();

  const samples = new Float64Array(iterations);
  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    bench.fn();
    samples[i] = performance.now() - start;
  }

  const sorted = Array.from(samples).sort((a, b) => a - b);
  const total = sorted.reduce((sum, ms) => sum + ms, 0);
  const medianMs = percentile(sorted, 0.5);

  return {
    name: bench.name,
    iterations,
    medianMs,
    p95Ms: percentile(sorted, 0.95),
    maxMs: percentile(sorted, 1),
    opsPerSec: total > 0 ? (iterations * 1000) / total : Number.POSITIVE_INFINITY,
    targetMs: bench.targetMs,
    passed: bench.targetMs === undefined || medianMs <= bench.targetMs,
  };
}

function formatMs(ms: number): string {
  return ms < 0.01 ? `${(ms * 1000).toFixed(2)}µs` : `${ms.toFixed(3)}ms`;
}

export function formatResult(result: BenchmarkResult): string {
  const verdict = result.passed ? "ok  " : "FAIL";
  const target = result.targetMs === undefined ? "" : ` (target <${result.targetMs}ms)`;
  const ops = Math.round(result.opsPerSec).toLocaleString("en-US");
  return [
    `${verdict} ${result.name}`,
    `     median ${formatMs(result.medianMs)}${target}, p95 ${formatMs(result.p95Ms)}, max ${formatMs(result.maxMs)}`,
    `     ${ops} ops/sec over ${result.iterations} iterations`,
  ].join("\n");
}

/**
 * Run every suite in order. Sets a failing exit code when a benchmark
 * misses its target or throws.
 */
export function runBenchmarks(suites: BenchmarkSuite[]): BenchmarkResult[] {
  const results: BenchmarkResult[] = [];
  let failed = 0;

  for (const suite of suites) {
    console.log(`\n## ${suite.name}\n`);
    for (const bench of suite.benchmarks) {
      try {
        const result = runBenchmark(bench);
        results.push(result);
        console.log(formatResult(result));
        if (!result.passed) failed++;
      } catch (error) {
        console.log(`FAIL ${bench.name}`);
        console.log(`     ${error instanceof Error ? error.message : String(error)}`);
        failed++;
      }
    }
  }

  const passed = results.filter((result) => result.passed).length;
  console.log(`\n${passed} passed, ${failed} failed`);
  if (failed > 0) process.exitCode = 1;
  return results;
}

/**
 * Heap growth across a call. Collects garbage first when node runs with
 * --expose-gc.
 */
export function measureMemory<T>(fn: () => T): { result: T; heapUsedKb: number } {
  globalThis.gc?.();
  const before = process.memoryUsage().heapUsed;
  const result = fn();
  const after = process.memoryUsage().heapUsed;
  return { result, heapUsedKb: (after - before) / 1024 };
}
