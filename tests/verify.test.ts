import { describe, it, expect } from 'vitest';
import type { FibVariant } from '../src/types/fibonacci.js';
import { verifyVariants } from '../src/core/verify.js';
import { getVariant } from '../src/core/variants.js';
import { fibIterative } from '../src/core/fibonacci.js';

describe('verifyVariants', () => {
  it('should find no mismatches across the exact range', () => {
    const result = verifyVariants({ maxIndex: 92 });
    expect(result.mismatches).toEqual([]);
    expect(result.recurrenceFailures).toEqual([]);
    // recursive checks 0..32, the other five 0..92
    expect(result.checked).toBe(33 + 5 * 93);
  });

  it('should report a variant that disagrees', () => {
    const broken: FibVariant = {
      ...getVariant('iterative'),
      fn: (n) => (n === 5 ? 0n : fibIterative(n)),
    };
    const result = verifyVariants({ maxIndex: 10, variants: [broken] });
    expect(result.checked).toBe(11);
    expect(result.mismatches).toEqual([
      { variant: 'iterative', n: 5, expected: 5n, actual: 0n },
    ]);
  });

  it('should respect a variant maxIndex', () => {
    const capped: FibVariant = { ...getVariant('iterative'), maxIndex: 3 };
    const result = verifyVariants({ maxIndex: 10, variants: [capped] });
    expect(result.checked).toBe(4);
  });
});
