import type { FibVariant, VerifyMismatch, VerifyResult } from '../types/fibonacci.js';
import { fibIterative } from './fibonacci.js';
import { add64 } from './int64.js';
import { assertIndex } from './validate.js';
import { VARIANTS } from './variants.js';

// The exponential variant is only cross-checked up to here
export const RECURSIVE_VERIFY_LIMIT = 32;

export interface VerifyOptions {
  maxIndex: number;
  variants?: readonly FibVariant[];
}

/**
 * Cross-check every variant against the iterative one for n = 0..maxIndex,
 * and check F(n) = F(n-1) + F(n-2) on the iterative sequence itself.
 */
export function verifyVariants(options: VerifyOptions): VerifyResult {
  assertIndex(options.maxIndex);
  const variants = options.variants ?? VARIANTS;

  const expected: bigint[] = [];
  for (let n = 0; n <= options.maxIndex; n++) {
    expected.push(fibIterative(n));
  }

  const recurrenceFailures: number[] = [];
  for (let n = 2; n <= options.maxIndex; n++) {
    if (expected[n] !== add64(expected[n - 1], expected[n - 2])) {
      recurrenceFailures.push(n);
    }
  }

  let checked = 0;
  const mismatches: VerifyMismatch[] = [];
  for (const variant of variants) {
    const limit = Math.min(options.maxIndex, variant.maxIndex, verifyLimit(variant));
    for (let n = 0; n <= limit; n++) {
      const actual = variant.fn(n);
      checked++;
      if (actual !== expected[n]) {
        mismatches.push({ variant: variant.name, n, expected: expected[n], actual });
      }
    }
  }

  return { checked, mismatches, recurrenceFailures };
}

function verifyLimit(variant: FibVariant): number {
  return variant.name === 'recursive' ? RECURSIVE_VERIFY_LIMIT : Number.MAX_SAFE_INTEGER;
}
