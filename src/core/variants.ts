import type { FibVariant } from '../types/fibonacci.js';
import {
  MAX_RECURSION_DEPTH,
  RECURSIVE_BENCHMARK_LIMIT,
  RECURSIVE_MAX_INDEX,
  VARIANT_NAMES,
} from '../constants.js';
import { fibIterative, fibRecursive, fibRecursiveCache, fibTailRecursive } from './fibonacci.js';
import { fibPowerMatrix, fibPowerMatrixLog } from './matrix.js';
import { IndexOutOfRangeError, UnknownVariantError } from './errors.js';
import { assertIndex } from './validate.js';

export const VARIANTS: readonly FibVariant[] = [
  {
    name: 'recursive',
    title: 'Naive recursion',
    complexity: { time: 'O(2^n)', space: 'O(n)' },
    fn: fibRecursive,
    maxIndex: RECURSIVE_MAX_INDEX,
    benchmarkLimit: RECURSIVE_BENCHMARK_LIMIT,
  },
  {
    name: 'recursive-cache',
    title: 'Recursion with cache',
    complexity: { time: 'O(n)', space: 'O(n)' },
    fn: fibRecursiveCache,
    maxIndex: MAX_RECURSION_DEPTH,
    benchmarkLimit: MAX_RECURSION_DEPTH,
  },
  {
    name: 'tail-recursive',
    title: 'Tail recursion',
    complexity: { time: 'O(n)', space: 'O(n)' },
    fn: fibTailRecursive,
    maxIndex: MAX_RECURSION_DEPTH,
    benchmarkLimit: MAX_RECURSION_DEPTH,
  },
  {
    name: 'iterative',
    title: 'Iteration',
    complexity: { time: 'O(n)', space: 'O(1)' },
    fn: fibIterative,
    maxIndex: Number.MAX_SAFE_INTEGER,
    benchmarkLimit: Number.MAX_SAFE_INTEGER,
  },
  {
    name: 'power-matrix',
    title: 'Matrix power, linear',
    complexity: { time: 'O(n)', space: 'O(1)' },
    fn: (n) => fibPowerMatrix(n),
    maxIndex: Number.MAX_SAFE_INTEGER,
    benchmarkLimit: Number.MAX_SAFE_INTEGER,
  },
  {
    name: 'power-matrix-log',
    title: 'Matrix power, divide and conquer',
    complexity: { time: 'O(log n)', space: 'O(log n)' },
    fn: (n) => fibPowerMatrixLog(n),
    maxIndex: Number.MAX_SAFE_INTEGER,
    benchmarkLimit: Number.MAX_SAFE_INTEGER,
  },
];

export function getVariant(name: string): FibVariant {
  const variant = VARIANTS.find(v => v.name === name);
  if (!variant) {
    throw new UnknownVariantError(name, VARIANT_NAMES);
  }
  return variant;
}

/**
 * Resolve variant names in registry order. No names (or an empty list) means all.
 */
export function resolveVariants(names?: readonly string[]): FibVariant[] {
  if (!names || names.length === 0) {
    return [...VARIANTS];
  }
  const wanted = new Set(names.map(name => getVariant(name).name));
  return VARIANTS.filter(v => wanted.has(v.name));
}

/**
 * Compute F(n) with the named variant, refusing inputs past its `maxIndex`.
 */
export function computeFibonacci(name: string, n: number): bigint {
  const variant = getVariant(name);
  assertIndex(n);
  if (n > variant.maxIndex) {
    throw new IndexOutOfRangeError(variant.name, n, variant.maxIndex);
  }
  return variant.fn(n);
}
