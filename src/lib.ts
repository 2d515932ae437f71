export {
  fibRecursive,
  fibRecursiveCache,
  fibTailRecursive,
  fibIterative,
} from './core/fibonacci.js';
export { createFibMatrix, multiplyInto, fibPowerMatrix, fibPowerMatrixLog } from './core/matrix.js';
export { add64, mul64, INT64_MAX } from './core/int64.js';
export {
  VARIANTS,
  getVariant,
  resolveVariants,
  computeFibonacci,
} from './core/variants.js';
export { verifyVariants } from './core/verify.js';
export { measureCase, runBenchmarks, type Clock } from './core/benchmark.js';
export { formatTable, formatJson, formatNs, findCrossover } from './core/report.js';
export { loadConfig, resolveBenchOptions, BenchConfigSchema, type BenchConfig } from './core/config.js';
export {
  FibenchError,
  InvalidIndexError,
  IndexOutOfRangeError,
  UnknownVariantError,
  ConfigError,
} from './core/errors.js';
export { assertIndex } from './core/validate.js';
export { MAX_EXACT_INDEX, VARIANT_NAMES } from './constants.js';
export type * from './types/fibonacci.js';
export type * from './types/benchmark.js';
