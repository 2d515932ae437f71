import { performance } from 'node:perf_hooks';
import type { BenchCase, BenchOptions, BenchResult, SkippedCase } from '../types/benchmark.js';
import type { FibVariant } from '../types/fibonacci.js';
import { resolveVariants } from './variants.js';
import { assertIndex } from './validate.js';
import { logger } from '../utils/logger.js';

export type Clock = () => number;

const defaultClock: Clock = () => performance.now();

// Every timed result is folded in here so the calls stay observable
let sink = 0n;

/**
 * Measure one variant at one size.
 *
 * Runs `warmupIterations` untimed calls, then timed batches starting at one
 * call and doubling until the batch takes at least `minTimeMs` or the
 * iteration cap is reached. The last batch is the one reported.
 */
export function measureCase(
  variant: FibVariant,
  n: number,
  options: Pick<BenchOptions, 'minTimeMs' | 'maxIterations' | 'warmupIterations'>,
  now: Clock = defaultClock,
): BenchCase {
  assertIndex(n);
  for (let i = 0; i < options.warmupIterations; i++) {
    sink ^= variant.fn(n);
  }

  let iterations = 1;
  let totalMs = 0;
  while (true) {
    const start = now();
    for (let i = 0; i < iterations; i++) {
      sink ^= variant.fn(n);
    }
    totalMs = now() - start;

    if (totalMs >= options.minTimeMs || iterations >= options.maxIterations) break;
    iterations = Math.min(iterations * 2, options.maxIterations);
  }

  const nsPerOp = (totalMs * 1e6) / iterations;
  return {
    variant: variant.name,
    n,
    iterations,
    totalMs,
    nsPerOp,
    opsPerSec: totalMs > 0 ? (iterations * 1000) / totalMs : Infinity,
  };
}

/**
 * Run every selected variant against every size it supports.
 */
export function runBenchmarks(options: BenchOptions, now: Clock = defaultClock): BenchResult {
  options.sizes.forEach(assertIndex);
  const variants = resolveVariants(options.variants);
  const sizes = [...new Set(options.sizes)].sort((a, b) => a - b);

  const cases: BenchCase[] = [];
  const skipped: SkippedCase[] = [];

  for (const variant of variants) {
    for (const n of sizes) {
      if (n > variant.benchmarkLimit) {
        skipped.push({ variant: variant.name, n, reason: `above benchmark limit ${variant.benchmarkLimit}` });
        continue;
      }
      const result = measureCase(variant, n, options, now);
      logger.debug(`${variant.name} n=${n}: ${result.iterations} iterations in ${result.totalMs.toFixed(2)}ms`);
      cases.push(result);
    }
  }

  return {
    startedAt: new Date().toISOString(),
    sizes,
    cases,
    skipped,
  };
}
