// Variant names, in the order they are listed, benchmarked and reported
export const VARIANT_NAMES = [
  'recursive',
  'recursive-cache',
  'tail-recursive',
  'iterative',
  'power-matrix',
  'power-matrix-log',
] as const;

// Largest n whose Fibonacci number fits in a signed 64-bit integer
export const MAX_EXACT_INDEX = 92;

// Benchmark input sizes used when neither config nor flags name any
export const DEFAULT_SIZES = [1, 2, 4, 8, 16, 32, 64, 128, 256, 512, 1024];

// The exponential variant is not benchmarked above this size
export const RECURSIVE_BENCHMARK_LIMIT = 32;

// Largest input the exponential variant accepts; past this it does not finish
export const RECURSIVE_MAX_INDEX = 40;

// Deepest input the recursive variants accept before the stack is at risk
export const MAX_RECURSION_DEPTH = 5000;

// Minimum wall-clock time spent measuring each benchmark case (ms)
export const DEFAULT_MIN_TIME_MS = 100;

// Hard cap on iterations per benchmark case
export const DEFAULT_MAX_ITERATIONS = 1_000_000_000;

// Untimed calls made before measuring each case
export const DEFAULT_WARMUP_ITERATIONS = 10;

// Default upper bound for `fibench verify`
export const DEFAULT_VERIFY_MAX = 92;

// Default config file name, resolved against the working directory
export const CONFIG_FILE = 'fibench.config.json';

// Default debounce interval for watch mode (ms)
export const DEFAULT_DEBOUNCE_MS = 500;
