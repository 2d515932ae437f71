import { InvalidIndexError } from './errors.js';

/**
 * Throw unless `n` is a usable Fibonacci index (a non-negative safe integer).
 */
export function assertIndex(n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidIndexError(n);
  }
}

/**
 * Parse a CLI argument into an index, rejecting anything `assertIndex` would.
 */
export function parseIndex(raw: string): number {
  const trimmed = raw.trim();
  const n = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  assertIndex(n);
  return n;
}
