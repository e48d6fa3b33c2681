import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { Decimal } from 'decimal.js';

import {
  PlmDecimal,
  compareFractions,
  fractionSign,
  fractionsEqual,
  integerFraction,
  multiplyFractions,
  divideFractions,
} from '../src/plm/decimal.js';
import { toHexString } from '../src/plm/hex.js';
import { createTransformInputs, updateInputs } from '../src/plm/inputs.js';
import {
  computeRatioFraction,
  computeSecretFraction,
  computeSecretValue,
} from '../src/plm/transform.js';

const decimalText = fc
  .tuple(fc.bigInt({ min: -(10n ** 24n), max: 10n ** 24n }), fc.integer({ min: 0, max: 30 }))
  .map(([digits, scale]) => `${digits}e-${scale}`);

const nonZeroDecimalText = fc
  .tuple(fc.bigInt({ min: 1n, max: 10n ** 24n }), fc.boolean(), fc.integer({ min: 0, max: 30 }))
  .map(([digits, negative, scale]) => `${negative ? '-' : ''}${digits}e-${scale}`);

const inputsArbitrary = fc
  .record({
    pi: decimalText,
    lambda: decimalText,
    mu: nonZeroDecimalText,
    x: fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n }),
    y: fc.bigInt({ min: 0n, max: (1n << 256n) - 1n }),
    blockSize: fc.bigInt({ min: 0n, max: 1n << 40n }),
    crcValue: fc.bigInt({ min: 0n, max: 1n << 32n }),
  })
  .filter(({ blockSize, crcValue }) => blockSize + crcValue > 0n)
  .map(({ y, ...rest }) => createTransformInputs({ ...rest, hashHex: toHexString(y) }));

test('S scales linearly in x', () => {
  fc.assert(
    fc.property(inputsArbitrary, fc.bigInt({ min: -1000n, max: 1000n }), (inputs, k) => {
      const scaled = computeSecretFraction(updateInputs(inputs, { x: inputs.x * k }));
      const expected = multiplyFractions(computeSecretFraction(inputs), integerFraction(k));
      assert.ok(fractionsEqual(scaled, expected));
    }),
  );
});

test('S is inversely proportional to mu', () => {
  fc.assert(
    fc.property(inputsArbitrary, fc.bigInt({ min: 1n, max: 1000n }), (inputs, k) => {
      const scaled = computeSecretFraction(
        updateInputs(inputs, { mu: inputs.mu.times(k.toString()) }),
      );
      const expected = divideFractions(computeSecretFraction(inputs), integerFraction(k));
      assert.ok(fractionsEqual(scaled, expected));
    }),
  );
});

test('pi and lambda commute', () => {
  fc.assert(
    fc.property(inputsArbitrary, (inputs) => {
      const swapped = updateInputs(inputs, { pi: inputs.lambda, lambda: inputs.pi });
      assert.ok(fractionsEqual(computeSecretFraction(swapped), computeSecretFraction(inputs)));
    }),
  );
});

test('S equals ratio * y * x / C', () => {
  fc.assert(
    fc.property(inputsArbitrary, (inputs) => {
      const ratio = computeRatioFraction(inputs.pi, inputs.lambda, inputs.mu);
      const y = BigInt(`0x${inputs.hashHex}`);
      const expected = divideFractions(
        multiplyFractions(ratio, integerFraction(y), integerFraction(inputs.x)),
        integerFraction(inputs.blockSize + inputs.crcValue),
      );
      assert.ok(fractionsEqual(computeSecretFraction(inputs), expected));
    }),
  );
});

test('the sign of S is the product of the input signs', () => {
  const sign = (value: { isZero(): boolean; isNegative(): boolean }) =>
    value.isZero() ? 0 : value.isNegative() ? -1 : 1;
  fc.assert(
    fc.property(inputsArbitrary, (inputs) => {
      const y = BigInt(`0x${inputs.hashHex}`);
      const expected =
        sign(inputs.pi) *
        sign(inputs.lambda) *
        sign(inputs.mu) *
        (inputs.x === 0n ? 0 : inputs.x < 0n ? -1 : 1) *
        (y === 0n ? 0 : 1);
      assert.equal(fractionSign(computeSecretFraction(inputs)), expected === 0 ? 0 : expected);
    }),
  );
});

test('the decimal result is the exact quotient rounded once to 80 digits', () => {
  const Exact = Decimal.clone({ precision: 1000 });
  fc.assert(
    fc.property(inputsArbitrary, (inputs) => {
      const y = BigInt(`0x${inputs.hashHex}`);
      const c = inputs.blockSize + inputs.crcValue;
      const numerator = new Exact(inputs.pi)
        .times(y.toString())
        .times(inputs.lambda)
        .times(inputs.x.toString());
      const denominator = new Exact(inputs.mu).times(c.toString());
      const expected = new PlmDecimal(numerator).div(new PlmDecimal(denominator));
      const value = computeSecretValue(inputs);
      assert.ok(value.equals(expected), `${value.toString()} != ${expected.toString()}`);
      assert.ok(value.precision() <= 80);
    }),
    { numRuns: 50 },
  );
});

test('S is unchanged when x and C, or y and C, scale together', () => {
  fc.assert(
    fc.property(inputsArbitrary, fc.bigInt({ min: 1n, max: 1000n }), (inputs, k) => {
      const base = computeSecretFraction(inputs);
      const scaledX = updateInputs(inputs, {
        x: inputs.x * k,
        blockSize: inputs.blockSize * k,
        crcValue: inputs.crcValue * k,
      });
      assert.ok(fractionsEqual(computeSecretFraction(scaledX), base));

      const y = BigInt(`0x${inputs.hashHex}`);
      const scaledY = updateInputs(inputs, {
        hashHex: toHexString(y * k),
        blockSize: inputs.blockSize * k,
        crcValue: inputs.crcValue * k,
      });
      assert.ok(fractionsEqual(computeSecretFraction(scaledY), base));
    }),
  );
});

const positiveInputsArbitrary = inputsArbitrary
  .map((inputs) =>
    updateInputs(inputs, { pi: inputs.pi.abs(), lambda: inputs.lambda.abs(), mu: inputs.mu.abs() }),
  )
  .filter(
    (inputs) => !inputs.pi.isZero() && !inputs.lambda.isZero() && BigInt(`0x${inputs.hashHex}`) > 0n,
  );

test('S is strictly increasing in x for positive parameters', () => {
  fc.assert(
    fc.property(positiveInputsArbitrary, fc.bigInt({ min: 1n, max: 10n ** 6n }), (inputs, d) => {
      const before = computeSecretFraction(inputs);
      const after = computeSecretFraction(updateInputs(inputs, { x: inputs.x + d }));
      assert.equal(compareFractions(before, after), -1);
      assert.equal(compareFractions(after, before), 1);
    }),
  );
});

test('S scales linearly in y', () => {
  fc.assert(
    fc.property(inputsArbitrary, fc.bigInt({ min: 0n, max: 1000n }), (inputs, b) => {
      const y = BigInt(`0x${inputs.hashHex}`);
      const scaled = computeSecretFraction(updateInputs(inputs, { hashHex: toHexString(y * b) }));
      const expected = multiplyFractions(computeSecretFraction(inputs), integerFraction(b));
      assert.ok(fractionsEqual(scaled, expected));
    }),
  );
});

test('decimal inputs are taken at face value rather than through a double', () => {
  const inputs = createTransformInputs({
    pi: '0.1',
    lambda: '3',
    mu: '1',
    x: 1,
    hashHex: '1',
    blockSize: 1,
    crcValue: 0,
  });
  assert.ok(computeSecretValue(inputs).equals(new PlmDecimal('0.3')));
});
