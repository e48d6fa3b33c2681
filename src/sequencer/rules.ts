import { parseHexAsInteger, toHexString } from '../plm/hex.js';
import { updateInputs } from '../plm/inputs.js';
import type { UpdateRule, UpdateRuleSpec } from './types.js';

export const incrementX =
  (delta: bigint | number = 1n): UpdateRule =>
  (inputs) =>
    updateInputs(inputs, { x: inputs.x + BigInt(delta) });

export const incrementCrc =
  (delta: bigint | number = 1n): UpdateRule =>
  (inputs) =>
    updateInputs(inputs, { crcValue: inputs.crcValue + BigInt(delta) });

/**
 * Treat the hash as an integer, add one and wrap modulo 2^bits. The result
 * is written back as fixed-width lower-case hex (`ceil(bits / 4)` digits).
 */
export const rollHash = (bits = 16): UpdateRule => {
  if (!Number.isInteger(bits) || bits < 1) {
    throw new RangeError(`hash-rollover bits must be a positive integer (received ${bits})`);
  }
  const width = Math.ceil(bits / 4);
  const modulus = 1n << BigInt(bits);
  return (inputs) => {
    const next = (parseHexAsInteger(inputs.hashHex) + 1n) % modulus;
    return updateInputs(inputs, { hashHex: toHexString(next, width) });
  };
};

/** Apply rules left to right within a single step. */
export const composeRules =
  (...rules: UpdateRule[]): UpdateRule =>
  (inputs, t) =>
    rules.reduce((current, rule) => rule(current, t), inputs);

export const ruleFromSpec = (spec: UpdateRuleSpec): UpdateRule => {
  switch (spec.kind) {
    case 'increment-x':
      return incrementX(spec.delta);
    case 'increment-crc':
      return incrementCrc(spec.delta);
    case 'hash-rollover':
      return rollHash(spec.bits);
  }
};

export const ruleFromSpecs = (specs: readonly UpdateRuleSpec[]): UpdateRule =>
  specs.length === 1 ? ruleFromSpec(specs[0]) : composeRules(...specs.map(ruleFromSpec));
