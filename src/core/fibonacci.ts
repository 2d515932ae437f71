import { add64 } from './int64.js';
import { assertIndex } from './validate.js';

// Every function here returns F(n) as a signed 64-bit integer that wraps
// silently past F(92). They differ only in time and space cost.

/**
 * Naive exponential recursion: two calls per level, no caching. O(2^n) time.
 */
export function fibRecursive(n: number): bigint {
  assertIndex(n);
  return recursive(n);
}

function recursive(n: number): bigint {
  if (n < 2) {
    return BigInt(n);
  }
  return add64(recursive(n - 1), recursive(n - 2));
}

/**
 * Linear recursion that fills a cache while the stack unwinds.
 *
 * The helper recurses down to the base case before writing anything, seeds
 * cache[0] and cache[1], and then computes one entry per returning frame.
 * The cache belongs to this call and is dropped when it returns.
 */
export function fibRecursiveCache(n: number): bigint {
  assertIndex(n);
  // Two slots minimum so the base case can always seed both entries
  const cache: bigint[] = new Array<bigint>(Math.max(n + 1, 2)).fill(0n);
  fillCache(n, cache);
  return cache[n];
}

function fillCache(n: number, cache: bigint[]): void {
  if (n < 2) {
    cache[0] = 0n;
    cache[1] = 1n;
    return;
  }
  fillCache(n - 1, cache);

  cache[n] = add64(cache[n - 1], cache[n - 2]);
}

/**
 * Tail-recursive accumulator over the pair (first, second).
 *
 * V8 does not eliminate tail calls, so this still uses one stack frame per
 * step. Callers going through the variant registry are capped well below
 * the default stack size.
 */
export function fibTailRecursive(n: number): bigint {
  assertIndex(n);
  return tailRecursive(n, 0n, 1n);
}

function tailRecursive(n: number, first: bigint, second: bigint): bigint {
  if (n === 0) {
    return first;
  }
  return tailRecursive(n - 1, second, add64(first, second));
}

/**
 * Iterative two-variable update. Fastest for small and moderate n.
 *
 * The loop runs n-1 times and returns `second`, which for n = 0 would be the
 * seed 1. n = 0 is answered up front with 0 instead, so this variant agrees
 * with the others; the loop-only form returned 1 there.
 */
export function fibIterative(n: number): bigint {
  assertIndex(n);
  if (n === 0) {
    return 0n;
  }

  let temp: bigint;
  let first = 0n;
  let second = 1n;
  for (let i = 0; i < n - 1; i++) {
    temp = second;
    second = add64(first, second);
    first = temp;
  }
  return second;
}
