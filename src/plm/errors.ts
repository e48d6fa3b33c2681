export type TransformField =
  | 'pi'
  | 'lambda'
  | 'mu'
  | 'x'
  | 'hashHex'
  | 'blockSize'
  | 'crcValue';

/**
 * Base class for input-validity failures raised by the transform. Every
 * subclass names the offending field and the value it was given so callers
 * can report the problem without re-deriving it.
 */
export class TransformInputError extends Error {
  readonly field: TransformField | readonly TransformField[];
  readonly value: string;

  constructor(message: string, field: TransformField | readonly TransformField[], value: string) {
    super(message);
    this.name = 'TransformInputError';
    this.field = field;
    this.value = value;
  }
}

export class InvalidHexError extends TransformInputError {
  constructor(value: string, reason: string) {
    super(`Invalid hex string ${JSON.stringify(value)}: ${reason}`, 'hashHex', value);
    this.name = 'InvalidHexError';
  }
}

export class DivisionByZeroError extends TransformInputError {
  constructor(value: string) {
    super(`mu cannot be 0 (received ${value})`, 'mu', value);
    this.name = 'DivisionByZeroError';
  }
}

export class NonPositiveBlockError extends TransformInputError {
  readonly blockSize: bigint;
  readonly crcValue: bigint;

  constructor(blockSize: bigint, crcValue: bigint) {
    const sum = blockSize + crcValue;
    super(
      `C = blockSize + crcValue must be positive (blockSize=${blockSize}, crcValue=${crcValue}, C=${sum})`,
      ['blockSize', 'crcValue'],
      sum.toString(),
    );
    this.name = 'NonPositiveBlockError';
    this.blockSize = blockSize;
    this.crcValue = crcValue;
  }
}

/** Raised when a field cannot be normalized into its numeric type at all. */
export class InputTypeError extends TransformInputError {
  constructor(field: TransformField, value: string, expected: string) {
    super(`${field} must be ${expected} (received ${value})`, field, value);
    this.name = 'InputTypeError';
  }
}
