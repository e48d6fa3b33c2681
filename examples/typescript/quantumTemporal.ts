/**
 * Example usage of the library API: step the transform twenty times with the
 * analytic oracle and print the series as CSV.
 *
 *   npx tsx examples/typescript/quantumTemporal.ts
 */

import {
  Sequencer,
  composeRules,
  createAnalyticOracle,
  createTransformInputs,
  formatRecordsCsv,
  incrementX,
  rollHash,
  simulateTimeSeries,
} from '../../src/index.js';

const inputs = createTransformInputs({
  pi: '3.14159265358979323846264338327950288419716939937510',
  lambda: '1.61803398874989484820458683436563811772030917980576',
  mu: '1.0',
  x: 1,
  hashHex: '0001',
  blockSize: 4096,
  crcValue: 100,
});

const sequencer = new Sequencer(inputs, composeRules(incrementX(1n), rollHash(16)));
const records = simulateTimeSeries(sequencer, 20, { scale: 1, shots: 2000 }, createAnalyticOracle());

console.log(formatRecordsCsv(records));
console.log(`final t=${sequencer.t} x=${sequencer.state.inputs.x} hash=${sequencer.state.inputs.hashHex}`);
