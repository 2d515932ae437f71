import type { Matrix2, MultiplyCounter } from '../types/fibonacci.js';
import { add64, mul64 } from './int64.js';
import { assertIndex } from './validate.js';

/**
 * Fresh copy of the Fibonacci matrix [[1, 1], [1, 0]].
 * Raised to the power k its top-left entry is F(k + 1).
 */
export function createFibMatrix(): Matrix2 {
  return { m00: 1n, m01: 1n, m10: 1n, m11: 0n };
}

/**
 * Multiply `target` by `other` and store the product in `target`.
 * All four entries are computed before any is written, so squaring in place
 * (`target === other`) is fine.
 */
export function multiplyInto(target: Matrix2, other: Matrix2, counter?: MultiplyCounter): void {
  const m00 = add64(mul64(target.m00, other.m00), mul64(target.m01, other.m10));
  const m01 = add64(mul64(target.m00, other.m01), mul64(target.m01, other.m11));
  const m10 = add64(mul64(target.m10, other.m00), mul64(target.m11, other.m10));
  const m11 = add64(mul64(target.m10, other.m01), mul64(target.m11, other.m11));

  target.m00 = m00;
  target.m01 = m01;
  target.m10 = m10;
  target.m11 = m11;

  if (counter) counter.multiplications++;
}

/**
 * F(n) via the (n-1)th power of the Fibonacci matrix, one multiplication per
 * exponent step. O(n) time, O(1) space.
 */
export function fibPowerMatrix(n: number, counter?: MultiplyCounter): bigint {
  assertIndex(n);
  if (n === 0) {
    return 0n;
  }
  const f = createFibMatrix();
  powerLinear(f, n - 1, counter);
  return f.m00;
}

function powerLinear(f: Matrix2, exponent: number, counter?: MultiplyCounter): void {
  const base = createFibMatrix();
  for (let i = 2; i <= exponent; i++) {
    multiplyInto(f, base, counter);
  }
}

/**
 * F(n) via the (n-1)th power of the Fibonacci matrix, computed by repeated
 * squaring. O(log n) multiplications: exponent 2^k takes exactly k.
 */
export function fibPowerMatrixLog(n: number, counter?: MultiplyCounter): bigint {
  assertIndex(n);
  if (n === 0) {
    return 0n;
  }
  const f = createFibMatrix();
  powerLog(f, n - 1, counter);
  return f.m00;
}

function powerLog(f: Matrix2, exponent: number, counter?: MultiplyCounter): void {
  if (exponent === 0 || exponent === 1) {
    return;
  }

  powerLog(f, Math.floor(exponent / 2), counter);
  multiplyInto(f, f, counter);

  if (exponent % 2 !== 0) {
    multiplyInto(f, createFibMatrix(), counter);
  }
}
