import { InvalidHexError } from './errors.js';

const HEX_DIGITS = /^[0-9a-f]+$/i;

const stripPrefix = (text: string): string =>
  text.length >= 2 && text[0] === '0' && (text[1] === 'x' || text[1] === 'X')
    ? text.slice(2)
    : text;

/**
 * Parse a "public hash" string into its integer value. Accepts surrounding
 * whitespace and an optional `0x`/`0X` prefix; digits are case-insensitive
 * and of any length.
 */
export const parseHexAsInteger = (text: string): bigint => {
  const digits = stripPrefix(text.trim());
  if (digits.length === 0) {
    throw new InvalidHexError(text, 'no hex digits after prefix');
  }
  if (!HEX_DIGITS.test(digits)) {
    throw new InvalidHexError(text, 'contains a non-hex character');
  }
  return BigInt(`0x${digits}`);
};

export const isHexString = (text: string): boolean => {
  const digits = stripPrefix(text.trim());
  return digits.length > 0 && HEX_DIGITS.test(digits);
};

export const toHexString = (value: bigint, width = 1): string => {
  if (value < 0n) {
    throw new RangeError(`Cannot encode negative integer ${value} as a hash string`);
  }
  return value.toString(16).padStart(Math.max(1, Math.floor(width)), '0');
};
