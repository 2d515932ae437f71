import type { VARIANT_NAMES } from '../constants.js';

export type VariantName = (typeof VARIANT_NAMES)[number];

export type FibFunction = (n: number) => bigint;

export interface FibVariant {
  name: VariantName;
  title: string;
  complexity: {
    time: string;
    space: string;
  };
  fn: FibFunction;
  maxIndex: number;  // inputs above this are rejected
  benchmarkLimit: number;  // sizes above this are skipped by the benchmark
}

/**
 * 2×2 matrix of signed 64-bit integers, row-major:
 *
 *   | m00 m01 |
 *   | m10 m11 |
 */
export interface Matrix2 {
  m00: bigint;
  m01: bigint;
  m10: bigint;
  m11: bigint;
}

export interface MultiplyCounter {
  multiplications: number;
}

export interface VerifyMismatch {
  variant: VariantName;
  n: number;
  expected: bigint;
  actual: bigint;
}

export interface VerifyResult {
  checked: number;
  mismatches: VerifyMismatch[];
  recurrenceFailures: number[];
}
