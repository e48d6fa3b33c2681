import { createHash } from 'node:crypto';

/**
 * Boundary to the external single-qubit encoding: given a rotation angle and
 * a shot count, report the probability of measuring |1>.
 */
export type RotationOracle = (angle: number, shots: number) => number;

export type OracleKind = 'analytic' | 'sampled';

const assertShots = (shots: number) => {
  if (!Number.isSafeInteger(shots) || shots <= 0) {
    throw new RangeError(`shots must be a positive integer (received ${shots})`);
  }
};

/** P(1) for |0> -H- Rz(θ) -H- measure. */
export const rotationProbability = (angle: number): number => {
  const amplitude = Math.sin(angle / 2);
  return amplitude * amplitude;
};

export const createAnalyticOracle = (): RotationOracle => (angle, shots) => {
  assertShots(shots);
  return rotationProbability(angle);
};

const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const deriveShotSeed = (seed: number, callIndex: number): number => {
  const buffer = Buffer.alloc(8);
  buffer.writeUInt32LE(seed >>> 0, 0);
  buffer.writeUInt32LE(callIndex >>> 0, 4);
  const digest = createHash('sha256').update(buffer).digest();
  return digest.readUInt32LE(0);
};

/**
 * Shot-noise stand-in for a circuit simulator. Each call draws `shots`
 * Bernoulli samples from a generator seeded by `(seed, call index)`, so two
 * oracles built from the same seed return the same sequence of estimates.
 */
export const createSampledOracle = (seed: number): RotationOracle => {
  let callIndex = 0;
  return (angle, shots) => {
    assertShots(shots);
    const probability = rotationProbability(angle);
    const rng = mulberry32(deriveShotSeed(seed, callIndex));
    callIndex += 1;
    let ones = 0;
    for (let shot = 0; shot < shots; shot++) {
      if (rng() < probability) {
        ones += 1;
      }
    }
    return ones / shots;
  };
};

export const createOracle = (kind: OracleKind, seed: number): RotationOracle =>
  kind === 'sampled' ? createSampledOracle(seed) : createAnalyticOracle();
