import test from 'node:test';
import assert from 'node:assert/strict';

import { createAnalyticOracle, type RotationOracle } from '../src/encoding/oracle.js';
import {
  CSV_HEADER,
  formatRecordCsv,
  formatRecordsCsv,
  simulateTimeSeries,
  type TimeSeriesRecord,
} from '../src/encoding/timeSeries.js';
import { createTransformInputs } from '../src/plm/inputs.js';
import { incrementX } from '../src/sequencer/rules.js';
import { Sequencer } from '../src/sequencer/sequencer.js';

const createSequencer = () =>
  new Sequencer(
    createTransformInputs({
      pi: 3,
      lambda: 2,
      mu: 4,
      x: 5,
      hashHex: '0a',
      blockSize: 20,
      crcValue: 5,
    }),
    incrementX(1n),
  );

test('records S, the angle and the oracle estimate for each step', () => {
  const sequencer = createSequencer();
  const records = simulateTimeSeries(sequencer, 3, { scale: 1, shots: 100 }, createAnalyticOracle());

  assert.deepEqual(
    records.map((record) => [record.t, record.S, record.theta]),
    [
      [0, '3', 3],
      [1, '3.6', 3.6],
      [2, '4.2', 4.2],
    ],
  );
  assert.equal(records[0].p1, 0.9949962483002227);
  assert.equal(records[0].expZ, -0.9899924966004454);
  assert.equal(sequencer.t, 3);
  assert.equal(sequencer.state.inputs.x, 8n);
});

test('passes the scaled angle and shot count to the oracle', () => {
  const calls: Array<[number, number]> = [];
  const oracle: RotationOracle = (angle, shots) => {
    calls.push([angle, shots]);
    return 0.25;
  };
  const records = simulateTimeSeries(createSequencer(), 2, { scale: 0.5, shots: 64 }, oracle);
  assert.deepEqual(calls, [
    [1.5, 64],
    [1.8, 64],
  ]);
  assert.equal(records[1].expZ, 0.5);
});

test('streams each record as it is produced', () => {
  const streamed: TimeSeriesRecord[] = [];
  const records = simulateTimeSeries(
    createSequencer(),
    2,
    { scale: 1, shots: 1 },
    createAnalyticOracle(),
    (record) => streamed.push(record),
  );
  assert.deepEqual(streamed, records);
});

test('zero steps leave the sequencer where it was; negative steps are rejected', () => {
  const sequencer = createSequencer();
  assert.deepEqual(simulateTimeSeries(sequencer, 0, { scale: 1, shots: 1 }, createAnalyticOracle()), []);
  assert.equal(sequencer.t, 0);
  assert.throws(
    () => simulateTimeSeries(sequencer, -1, { scale: 1, shots: 1 }, createAnalyticOracle()),
    RangeError,
  );
});

test('formats records as CSV with fixed decimals', () => {
  const records = simulateTimeSeries(createSequencer(), 3, { scale: 1, shots: 1 }, createAnalyticOracle());
  assert.equal(formatRecordCsv(records[0]), '0,3,3.00000000,0.994996,-0.989992');
  assert.equal(
    formatRecordsCsv(records),
    [
      CSV_HEADER,
      '0,3,3.00000000,0.994996,-0.989992',
      '1,3.6,3.60000000,0.948379,-0.896758',
      '2,4.2,4.20000000,0.745130,-0.490261',
    ].join('\n'),
  );
});

test('records hash-sized S values as plain digits', () => {
  const sequencer = new Sequencer(
    createTransformInputs({
      pi: 1,
      lambda: 1,
      mu: 1,
      x: 1,
      hashHex: 'f'.repeat(64),
      blockSize: 1,
      crcValue: 0,
    }),
    incrementX(1n),
  );
  const records = simulateTimeSeries(sequencer, 2, { scale: 1, shots: 1 }, () => 0);
  const max = (1n << 256n) - 1n;
  assert.deepEqual(
    records.map((record) => record.S),
    [max.toString(), (max * 2n).toString()],
  );
  assert.ok(formatRecordCsv(records[0]).startsWith(`0,${max.toString()},`));
});
