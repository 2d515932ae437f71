export type FibenchErrorCode =
  | 'INVALID_INDEX'
  | 'INDEX_OUT_OF_RANGE'
  | 'UNKNOWN_VARIANT'
  | 'INVALID_CONFIG';

export class FibenchError extends Error {
  readonly code: FibenchErrorCode;

  constructor(code: FibenchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidIndexError extends FibenchError {
  readonly index: number;

  constructor(index: number) {
    super('INVALID_INDEX', `Index must be a non-negative safe integer, got ${index}`);
    this.index = index;
  }
}

export class IndexOutOfRangeError extends FibenchError {
  readonly index: number;
  readonly max: number;

  constructor(variant: string, index: number, max: number) {
    super('INDEX_OUT_OF_RANGE', `Variant "${variant}" accepts n <= ${max}, got ${index}`);
    this.index = index;
    this.max = max;
  }
}

export class UnknownVariantError extends FibenchError {
  constructor(name: string, known: readonly string[]) {
    super('UNKNOWN_VARIANT', `Unknown variant "${name}". Available: ${known.join(', ')}`);
  }
}

export class ConfigError extends FibenchError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super('INVALID_CONFIG', `Invalid config ${path}: ${detail}`);
    this.path = path;
  }
}
