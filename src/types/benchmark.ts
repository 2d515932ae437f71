import type { VariantName } from './fibonacci.js';

export interface BenchOptions {
  variants: VariantName[];
  sizes: number[];
  minTimeMs: number;
  maxIterations: number;
  warmupIterations: number;
}

export interface BenchCase {
  variant: VariantName;
  n: number;
  iterations: number;
  totalMs: number;
  nsPerOp: number;
  opsPerSec: number;
}

export interface SkippedCase {
  variant: VariantName;
  n: number;
  reason: string;
}

export interface BenchResult {
  startedAt: string;
  sizes: number[];
  cases: BenchCase[];
  skipped: SkippedCase[];
}
