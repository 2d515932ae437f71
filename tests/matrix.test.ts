import { describe, it, expect } from 'vitest';
import type { Matrix2, MultiplyCounter } from '../src/types/fibonacci.js';
import {
  createFibMatrix,
  fibPowerMatrix,
  fibPowerMatrixLog,
  multiplyInto,
} from '../src/core/matrix.js';
import { add64, mul64, INT64_MAX } from '../src/core/int64.js';
import { InvalidIndexError } from '../src/core/errors.js';

describe('int64', () => {
  it('should wrap addition past the signed maximum', () => {
    expect(add64(INT64_MAX, 1n)).toBe(-(2n ** 63n));
  });

  it('should wrap multiplication', () => {
    expect(mul64(2n ** 62n, 4n)).toBe(0n);
    expect(mul64(3n, 7n)).toBe(21n);
  });
});

describe('multiplyInto', () => {
  it('should write the product into the first matrix', () => {
    const a: Matrix2 = { m00: 1n, m01: 2n, m10: 3n, m11: 4n };
    const b: Matrix2 = { m00: 5n, m01: 6n, m10: 7n, m11: 8n };
    multiplyInto(a, b);
    expect(a).toEqual({ m00: 19n, m01: 22n, m10: 43n, m11: 50n });
    expect(b).toEqual({ m00: 5n, m01: 6n, m10: 7n, m11: 8n });
  });

  it('should square in place when both arguments are the same matrix', () => {
    const f = createFibMatrix();
    multiplyInto(f, f);
    expect(f).toEqual({ m00: 2n, m01: 1n, m10: 1n, m11: 1n });
  });

  it('should count multiplications when given a counter', () => {
    const counter: MultiplyCounter = { multiplications: 0 };
    const f = createFibMatrix();
    multiplyInto(f, createFibMatrix(), counter);
    multiplyInto(f, f, counter);
    expect(counter.multiplications).toBe(2);
  });
});

const matrixVariants: Array<{ name: string; fn: (n: number) => bigint }> = [
  { name: 'fibPowerMatrix', fn: fibPowerMatrix },
  { name: 'fibPowerMatrixLog', fn: fibPowerMatrixLog },
];

describe.each(matrixVariants)('$name', ({ fn }) => {
  it('should return the base cases', () => {
    expect(fn(0)).toBe(0n);
    expect(fn(1)).toBe(1n);
    expect(fn(2)).toBe(1n);
    expect(fn(3)).toBe(2n);
  });

  it('should return known sequence values', () => {
    expect(fn(10)).toBe(55n);
    expect(fn(16)).toBe(987n);
    expect(fn(20)).toBe(6765n);
    expect(fn(92)).toBe(7540113804746346429n);
    expect(fn(93)).toBe(-6246583658587674878n);
  });

  it('should reject negative input', () => {
    expect(() => fn(-3)).toThrow(InvalidIndexError);
  });
});

describe('matrix power variants', () => {
  it('should agree for every n from 0 to 200', () => {
    for (let n = 0; n <= 200; n++) {
      expect(fibPowerMatrixLog(n), `n=${n}`).toBe(fibPowerMatrix(n));
    }
  });

  it('should use one multiplication per exponent step in the linear variant', () => {
    const counter: MultiplyCounter = { multiplications: 0 };
    fibPowerMatrix(10, counter);
    expect(counter.multiplications).toBe(8);
  });

  it('should use k multiplications for exponent 2^k in the log variant', () => {
    for (let k = 1; k <= 20; k++) {
      const counter: MultiplyCounter = { multiplications: 0 };
      fibPowerMatrixLog(2 ** k + 1, counter);
      expect(counter.multiplications, `k=${k}`).toBe(k);
    }
  });

  it('should use 2(k-1) multiplications when every exponent bit is set', () => {
    const counter: MultiplyCounter = { multiplications: 0 };
    // n = 1024 raises the matrix to 1023 = 0b1111111111
    fibPowerMatrixLog(1024, counter);
    expect(counter.multiplications).toBe(18);
  });

  it('should not multiply at all for n <= 2', () => {
    const counter: MultiplyCounter = { multiplications: 0 };
    fibPowerMatrixLog(1, counter);
    fibPowerMatrixLog(2, counter);
    fibPowerMatrix(2, counter);
    expect(counter.multiplications).toBe(0);
  });
});
