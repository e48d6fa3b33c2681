import type { Decimal } from 'decimal.js';

import { PlmDecimal, type DecimalLike } from './decimal.js';
import { InputTypeError, type TransformField } from './errors.js';
import { computeC, computeSecretValue } from './transform.js';

export type IntegerLike = bigint | number | string;

/**
 * Immutable inputs of the PLM transform. `y` and `c` are derived on demand
 * (`deriveY`, `deriveC`) and never stored.
 */
export type TransformInputs = {
  readonly pi: Decimal;
  readonly lambda: Decimal;
  readonly mu: Decimal;
  readonly x: bigint;
  readonly hashHex: string;
  readonly blockSize: bigint;
  readonly crcValue: bigint;
};

export type TransformInputsInit = {
  pi: DecimalLike;
  lambda: DecimalLike;
  mu: DecimalLike;
  x: IntegerLike;
  hashHex: string;
  blockSize: IntegerLike;
  crcValue: IntegerLike;
};

export type TransformInputsPatch = Partial<TransformInputsInit>;

const INTEGER_TEXT = /^[+-]?\d+$/;

const describe = (value: unknown): string =>
  typeof value === 'string' ? JSON.stringify(value) : String(value);

export const toInteger = (value: IntegerLike, field: TransformField): bigint => {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new InputTypeError(field, describe(value), 'a safe integer');
    }
    return BigInt(value);
  }
  const trimmed = value.trim();
  if (!INTEGER_TEXT.test(trimmed)) {
    throw new InputTypeError(field, describe(value), 'a base-10 integer');
  }
  return BigInt(trimmed);
};

export const toDecimal = (value: DecimalLike, field: TransformField): Decimal => {
  let decimal: Decimal;
  try {
    decimal = new PlmDecimal(value);
  } catch {
    throw new InputTypeError(field, describe(value), 'a decimal number');
  }
  if (!decimal.isFinite()) {
    throw new InputTypeError(field, describe(value), 'a finite decimal number');
  }
  return decimal;
};

const normalize = (init: TransformInputsInit): TransformInputs => {
  if (typeof init.hashHex !== 'string') {
    throw new InputTypeError('hashHex', describe(init.hashHex), 'a string');
  }
  return Object.freeze({
    pi: toDecimal(init.pi, 'pi'),
    lambda: toDecimal(init.lambda, 'lambda'),
    mu: toDecimal(init.mu, 'mu'),
    x: toInteger(init.x, 'x'),
    hashHex: init.hashHex,
    blockSize: toInteger(init.blockSize, 'blockSize'),
    crcValue: toInteger(init.crcValue, 'crcValue'),
  });
};

/**
 * Build inputs from user-supplied values and reject anything the transform
 * cannot evaluate: negative block or CRC values, invalid hex, `mu = 0` and
 * `C <= 0` all fail here rather than on first use.
 */
export const createTransformInputs = (init: TransformInputsInit): TransformInputs => {
  const inputs = normalize(init);
  if (inputs.blockSize < 0n) {
    throw new InputTypeError('blockSize', inputs.blockSize.toString(), 'a non-negative integer');
  }
  if (inputs.crcValue < 0n) {
    throw new InputTypeError('crcValue', inputs.crcValue.toString(), 'a non-negative integer');
  }
  computeSecretValue(inputs);
  return inputs;
};

/**
 * Structural update for update rules: copies every field not named in
 * `patch`. Types are normalized but the result is not checked for
 * computability, that is the sequencer's decision.
 */
export const updateInputs = (
  inputs: TransformInputs,
  patch: TransformInputsPatch,
): TransformInputs =>
  normalize({
    pi: patch.pi ?? inputs.pi,
    lambda: patch.lambda ?? inputs.lambda,
    mu: patch.mu ?? inputs.mu,
    x: patch.x ?? inputs.x,
    hashHex: patch.hashHex ?? inputs.hashHex,
    blockSize: patch.blockSize ?? inputs.blockSize,
    crcValue: patch.crcValue ?? inputs.crcValue,
  });

export const deriveC = (inputs: TransformInputs): bigint =>
  computeC(inputs.blockSize, inputs.crcValue);

/** Plain JSON-friendly view of the inputs; decimals and integers as strings. */
export const describeInputs = (inputs: TransformInputs) => ({
  pi: inputs.pi.toString(),
  lambda: inputs.lambda.toString(),
  mu: inputs.mu.toString(),
  x: inputs.x.toString(),
  hashHex: inputs.hashHex,
  blockSize: inputs.blockSize.toString(),
  crcValue: inputs.crcValue.toString(),
});
