import type { Decimal } from 'decimal.js';

import {
  decimalToFraction,
  divideFractions,
  fractionToDecimal,
  integerFraction,
  multiplyFractions,
  toPlmDecimal,
  type DecimalLike,
  type Fraction,
} from './decimal.js';
import { DivisionByZeroError, NonPositiveBlockError } from './errors.js';
import { parseHexAsInteger } from './hex.js';
import type { TransformInputs } from './inputs.js';

const assertNonZeroMu = (mu: Decimal) => {
  if (mu.isZero()) {
    throw new DivisionByZeroError(mu.toString());
  }
};

export const computeC = (blockSize: bigint, crcValue: bigint): bigint => {
  const c = blockSize + crcValue;
  if (c <= 0n) {
    throw new NonPositiveBlockError(blockSize, crcValue);
  }
  return c;
};

export const deriveY = (inputs: TransformInputs): bigint => parseHexAsInteger(inputs.hashHex);

/** Exact `(pi * lambda) / mu`. */
export const computeRatioFraction = (
  pi: DecimalLike,
  lambda: DecimalLike,
  mu: DecimalLike,
): Fraction => {
  const muDecimal = toPlmDecimal(mu);
  assertNonZeroMu(muDecimal);
  const numerator = multiplyFractions(
    decimalToFraction(toPlmDecimal(pi)),
    decimalToFraction(toPlmDecimal(lambda)),
  );
  return divideFractions(numerator, decimalToFraction(muDecimal));
};

export const computeRatio = (pi: DecimalLike, lambda: DecimalLike, mu: DecimalLike): Decimal =>
  fractionToDecimal(computeRatioFraction(pi, lambda, mu));

/**
 * Exact `((pi * y) * (lambda * x)) / (mu * c)`. `mu` is checked before `y`
 * and `c` are derived, so a zero `mu` wins over a bad hash or block size.
 */
export const computeSecretFraction = (inputs: TransformInputs): Fraction => {
  assertNonZeroMu(inputs.mu);
  const y = deriveY(inputs);
  const c = computeC(inputs.blockSize, inputs.crcValue);

  const numerator = multiplyFractions(
    decimalToFraction(inputs.pi),
    integerFraction(y),
    decimalToFraction(inputs.lambda),
    integerFraction(inputs.x),
  );
  const denominator = multiplyFractions(decimalToFraction(inputs.mu), integerFraction(c));
  return divideFractions(numerator, denominator);
};

/**
 * S at PLM_PRECISION significant digits. Products are carried exactly and
 * the quotient is rounded once (half-even), so equal inputs always produce
 * the same digits regardless of how large the hash-derived `y` is.
 */
export const computeSecretValue = (inputs: TransformInputs): Decimal =>
  fractionToDecimal(computeSecretFraction(inputs));
