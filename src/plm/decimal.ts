import { Decimal } from 'decimal.js';

export const PLM_PRECISION = 80;

/** Magnitudes below 10^PLM_PLAIN_EXPONENT_LIMIT print as plain digits. */
export const PLM_PLAIN_EXPONENT_LIMIT = 1024;

/**
 * Decimal constructor used by every transform result. A clone keeps the
 * precision local to this package instead of reconfiguring the global
 * decimal.js defaults for the host application.
 */
export const PlmDecimal: Decimal.Constructor = Decimal.clone({
  precision: PLM_PRECISION,
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpPos: PLM_PLAIN_EXPONENT_LIMIT,
});

export type DecimalLike = Decimal.Value;

/**
 * Exact rational number `numerator / denominator * 10^exponent`. The
 * denominator is always positive and the sign lives on the numerator. The
 * power of ten is kept apart so inputs such as `1e1000000000` never expand
 * into their full digit string. Values are not reduced, compare with
 * `fractionsEqual` or `compareFractions`.
 */
export type Fraction = {
  readonly numerator: bigint;
  readonly denominator: bigint;
  readonly exponent: number;
};

export const makeFraction = (numerator: bigint, denominator: bigint, exponent = 0): Fraction => {
  if (denominator === 0n) {
    throw new RangeError('Fraction denominator cannot be 0');
  }
  if (!Number.isSafeInteger(exponent)) {
    throw new RangeError(`Fraction exponent must be a safe integer (received ${exponent})`);
  }
  return denominator < 0n
    ? { numerator: -numerator, denominator: -denominator, exponent }
    : { numerator, denominator, exponent };
};

export const multiplyFractions = (...factors: Fraction[]): Fraction => {
  let numerator = 1n;
  let denominator = 1n;
  let exponent = 0;
  for (const factor of factors) {
    numerator *= factor.numerator;
    denominator *= factor.denominator;
    exponent += factor.exponent;
  }
  return makeFraction(numerator, denominator, exponent);
};

export const divideFractions = (dividend: Fraction, divisor: Fraction): Fraction =>
  makeFraction(
    dividend.numerator * divisor.denominator,
    dividend.denominator * divisor.numerator,
    dividend.exponent - divisor.exponent,
  );

export const fractionSign = (value: Fraction): -1 | 0 | 1 => {
  if (value.numerator < 0n) return -1;
  if (value.numerator > 0n) return 1;
  return 0;
};

const abs = (value: bigint) => (value < 0n ? -value : value);

const digitCount = (value: bigint) => abs(value).toString().length;

/**
 * Compare |a| and |b|, both non-zero. When the decimal magnitudes are more
 * than one order apart the digit counts decide; otherwise the exponent gap
 * is bounded by the operands' own digit counts and the cross products stay
 * proportional to them.
 */
const compareMagnitudes = (a: Fraction, b: Fraction): -1 | 0 | 1 => {
  const spreadA = digitCount(a.numerator) - digitCount(a.denominator) + a.exponent;
  const spreadB = digitCount(b.numerator) - digitCount(b.denominator) + b.exponent;
  // |a| lies in (10^(spreadA - 1), 10^(spreadA + 1)).
  if (spreadA + 1 < spreadB) return -1;
  if (spreadB + 1 < spreadA) return 1;

  let left = abs(a.numerator) * b.denominator;
  let right = abs(b.numerator) * a.denominator;
  const gap = a.exponent - b.exponent;
  if (gap > 0) {
    left *= 10n ** BigInt(gap);
  } else if (gap < 0) {
    right *= 10n ** BigInt(-gap);
  }
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

export const compareFractions = (a: Fraction, b: Fraction): -1 | 0 | 1 => {
  const signA = fractionSign(a);
  const signB = fractionSign(b);
  if (signA !== signB) {
    return signA < signB ? -1 : 1;
  }
  if (signA === 0) {
    return 0;
  }
  const magnitude = compareMagnitudes(a, b);
  if (signA > 0 || magnitude === 0) {
    return magnitude;
  }
  return magnitude === 1 ? -1 : 1;
};

export const fractionsEqual = (a: Fraction, b: Fraction): boolean => compareFractions(a, b) === 0;

export const integerFraction = (value: bigint): Fraction => ({
  numerator: value,
  denominator: 1n,
  exponent: 0,
});

/**
 * Exact fraction of a finite decimal, read from its exponential form so only
 * the significant digits become a bigint.
 */
export const decimalToFraction = (value: Decimal): Fraction => {
  if (!value.isFinite()) {
    throw new RangeError(`Cannot convert non-finite decimal ${value.toString()} to a fraction`);
  }
  const text = value.toExponential();
  const marker = text.indexOf('e');
  const mantissa = text.slice(0, marker);
  const negative = mantissa.startsWith('-');
  const [whole, fractional = ''] = (negative ? mantissa.slice(1) : mantissa).split('.');
  const digits = BigInt(`${whole}${fractional}`);
  return {
    numerator: negative ? -digits : digits,
    denominator: 1n,
    exponent: Number(text.slice(marker + 1)) - fractional.length,
  };
};

/**
 * The one rounding step: a single correctly rounded division at
 * PLM_PRECISION, then an exact shift by the power of ten.
 */
export const fractionToDecimal = (value: Fraction): Decimal => {
  const quotient = new PlmDecimal(value.numerator.toString()).div(
    new PlmDecimal(value.denominator.toString()),
  );
  return value.exponent === 0 ? quotient : quotient.times(new PlmDecimal(`1e${value.exponent}`));
};

export const toPlmDecimal = (value: DecimalLike): Decimal => new PlmDecimal(value);
