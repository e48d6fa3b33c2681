import type { Decimal } from 'decimal.js';

export const TAU = 2 * Math.PI;

/**
 * Floored modulo: the result takes the sign of the divisor, so any finite
 * input lands in [0, TAU) for a positive TAU.
 */
const floorMod = (value: number, divisor: number): number => {
  const remainder = value % divisor;
  if (remainder !== 0 && (remainder < 0) !== (divisor < 0)) {
    // A tiny negative remainder can round up to the divisor itself.
    const wrapped = remainder + divisor;
    return wrapped === divisor ? 0 : wrapped;
  }
  return remainder === 0 ? 0 : remainder;
};

/**
 * Reduce a transform output to a rotation angle: `scale * (float(value) mod 2π)`.
 *
 * The conversion goes through a double and then discards whole turns, so
 * the original value cannot be recovered from the angle. Keep the decimal if
 * it is needed later.
 */
export const angleFromValue = (value: Decimal, scale = 1): number => {
  const asFloat = value.toNumber();
  if (!Number.isFinite(asFloat)) {
    throw new RangeError(`Value ${value.toString()} does not fit a finite double`);
  }
  if (!Number.isFinite(scale)) {
    throw new RangeError(`Angle scale must be finite (received ${scale})`);
  }
  return scale * floorMod(asFloat, TAU);
};
