import test from 'node:test';
import assert from 'node:assert/strict';

import {
  DivisionByZeroError,
  InvalidHexError,
  NonPositiveBlockError,
  TransformInputError,
} from '../src/plm/errors.js';
import { compareFractions, makeFraction } from '../src/plm/decimal.js';
import { createTransformInputs, updateInputs, type TransformInputsInit } from '../src/plm/inputs.js';
import {
  computeC,
  computeRatio,
  computeSecretValue,
  deriveY,
} from '../src/plm/transform.js';

const scenario: TransformInputsInit = {
  pi: '3.141592653589793',
  lambda: '1.618033988749895',
  mu: '1',
  x: 123,
  hashHex: 'a3f1c9',
  blockSize: 4096,
  crcValue: 987654321,
};

test('computes S for a realistic input set to 80 significant digits', () => {
  const inputs = createTransformInputs(scenario);
  assert.equal(deriveY(inputs), 10744265n);
  assert.equal(computeC(inputs.blockSize, inputs.crcValue), 987658417n);
  assert.equal(
    computeSecretValue(inputs).toString(),
    '6.8016231616474694265835883652303676690328858909527219672345484602901936287553554',
  );
});

test('small integral inputs give an exact result', () => {
  const inputs = createTransformInputs({
    pi: 3,
    lambda: 2,
    mu: 4,
    x: 5,
    hashHex: '0a',
    blockSize: 20,
    crcValue: 5,
  });
  assert.equal(computeSecretValue(inputs).toString(), '3');
});

test('non-terminating quotients are rounded once at the last digit', () => {
  const inputs = createTransformInputs({
    pi: 1,
    lambda: 1,
    mu: 3,
    x: 1,
    hashHex: '1',
    blockSize: 0,
    crcValue: 1,
  });
  assert.equal(computeSecretValue(inputs).toString(), `0.${'3'.repeat(80)}`);
});

test('negative mu flips the sign and decimal inputs stay exact', () => {
  const negative = createTransformInputs({
    pi: 1,
    lambda: 1,
    mu: '-2',
    x: 1,
    hashHex: '3',
    blockSize: 1,
    crcValue: 0,
  });
  assert.equal(computeSecretValue(negative).toString(), '-1.5');

  const tenths = createTransformInputs({
    pi: '0.1',
    lambda: '0.2',
    mu: '0.3',
    x: 7,
    hashHex: 'ff',
    blockSize: 1,
    crcValue: 1,
  });
  assert.equal(computeSecretValue(tenths).toString(), '59.5');
});

test('x = 0 and y = 0 give zero', () => {
  const base = createTransformInputs(scenario);
  assert.ok(computeSecretValue(updateInputs(base, { x: 0 })).isZero());
  assert.ok(computeSecretValue(updateInputs(base, { hashHex: '0000' })).isZero());
});

test('computeRatio is pi * lambda / mu', () => {
  assert.equal(
    computeRatio('3.141592653589793', '1.618033988749895', '1').toString(),
    '5.083203692315259906848201821735',
  );
  assert.equal(computeRatio(3, 2, 4).toString(), '1.5');
  assert.throws(() => computeRatio(1, 1, 0), DivisionByZeroError);
});

test('mu = 0 raises DivisionByZeroError naming mu', () => {
  const inputs = updateInputs(createTransformInputs(scenario), { mu: 0 });
  assert.throws(
    () => computeSecretValue(inputs),
    (error: unknown) =>
      error instanceof DivisionByZeroError &&
      error instanceof TransformInputError &&
      error.field === 'mu' &&
      error.value === '0',
  );
});

test('C <= 0 raises NonPositiveBlockError with the components', () => {
  const inputs = updateInputs(createTransformInputs(scenario), { blockSize: 0, crcValue: 0 });
  assert.throws(
    () => computeSecretValue(inputs),
    (error: unknown) =>
      error instanceof NonPositiveBlockError &&
      error.blockSize === 0n &&
      error.crcValue === 0n &&
      error.value === '0',
  );
  assert.throws(() => computeC(-5n, 3n), NonPositiveBlockError);
});

test('an invalid hash raises InvalidHexError', () => {
  const inputs = updateInputs(createTransformInputs(scenario), { hashHex: 'not-hex' });
  assert.throws(() => computeSecretValue(inputs), InvalidHexError);
});

test('mu is checked before the hash and the block size', () => {
  const inputs = updateInputs(createTransformInputs(scenario), {
    mu: 0,
    hashHex: 'zz',
    blockSize: 0,
    crcValue: 0,
  });
  assert.throws(() => computeSecretValue(inputs), DivisionByZeroError);
});

test('evaluation is deterministic for equal inputs', () => {
  const a = computeSecretValue(createTransformInputs(scenario));
  const b = computeSecretValue(createTransformInputs({ ...scenario, x: '123', hashHex: '0xA3F1C9' }));
  assert.equal(a.toString(), b.toString());
});

test('large decimal exponents stay symbolic until the final rounding', () => {
  assert.equal(computeRatio('1e1000000000', '1', '1').toString(), '1e+1000000000');
  assert.equal(computeRatio('2.5e-3', '4e2', '1').toString(), '1');
  const inputs = createTransformInputs({
    pi: 1,
    lambda: 1,
    mu: '1e-1000000000',
    x: 1,
    hashHex: '1',
    blockSize: 1,
    crcValue: 0,
  });
  assert.equal(computeSecretValue(inputs).toString(), '1e+1000000000');
});

test('hash-sized results print as plain digits', () => {
  const inputs = createTransformInputs({
    pi: 1,
    lambda: 1,
    mu: 1,
    x: 1,
    hashHex: 'f'.repeat(64),
    blockSize: 1,
    crcValue: 0,
  });
  assert.equal(computeSecretValue(inputs).toString(), ((1n << 256n) - 1n).toString());
});

test('fractions compare across separate powers of ten', () => {
  assert.equal(compareFractions(makeFraction(1n, 1n, 1_000_000_000), makeFraction(10n ** 6n, 1n)), 1);
  assert.equal(compareFractions(makeFraction(25n, 1n, -1), makeFraction(5n, 2n)), 0);
  assert.equal(compareFractions(makeFraction(-1n, 1n, 3), makeFraction(-999n, 1n)), -1);
  assert.deepEqual(makeFraction(1n, -2n), { numerator: -1n, denominator: 2n, exponent: 0 });
  assert.throws(() => makeFraction(1n, 0n), RangeError);
});
