/**
 * Signed 64-bit integer arithmetic on bigints. Results wrap on overflow
 * instead of growing, so every variant shares one fixed-width number type.
 */

export const INT64_MAX = 2n ** 63n - 1n;

export function add64(a: bigint, b: bigint): bigint {
  return BigInt.asIntN(64, a + b);
}

export function mul64(a: bigint, b: bigint): bigint {
  return BigInt.asIntN(64, a * b);
}
