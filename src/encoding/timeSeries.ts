import type { Sequencer } from '../sequencer/sequencer.js';
import { angleFromValue } from './angle.js';
import type { RotationOracle } from './oracle.js';

export type EncodingConfig = {
  scale: number;
  shots: number;
};

export const DEFAULT_ENCODING: Readonly<EncodingConfig> = Object.freeze({ scale: 1, shots: 2000 });

export type TimeSeriesRecord = {
  readonly t: number;
  /** Full-precision decimal string of S at step t. */
  readonly S: string;
  readonly theta: number;
  readonly p1: number;
  readonly expZ: number;
};

export const CSV_HEADER = 't,S,theta,p1,expZ';

/**
 * Read S at the current step, encode it as an angle, ask the oracle for P(1)
 * and advance. After `steps` records the sequencer has moved `steps` times.
 */
export const simulateTimeSeries = (
  sequencer: Sequencer,
  steps: number,
  config: EncodingConfig,
  oracle: RotationOracle,
  onRecord?: (record: TimeSeriesRecord) => void,
): TimeSeriesRecord[] => {
  if (!Number.isSafeInteger(steps) || steps < 0) {
    throw new RangeError(`steps must be a non-negative integer (received ${steps})`);
  }
  const records: TimeSeriesRecord[] = [];
  for (let index = 0; index < steps; index++) {
    const value = sequencer.currentValue();
    const theta = angleFromValue(value, config.scale);
    const p1 = oracle(theta, config.shots);
    const record: TimeSeriesRecord = {
      t: sequencer.t,
      S: value.toString(),
      theta,
      p1,
      expZ: 1 - p1 - p1,
    };
    records.push(record);
    onRecord?.(record);
    sequencer.step();
  }
  return records;
};

export const formatRecordCsv = (record: TimeSeriesRecord): string =>
  `${record.t},${record.S},${record.theta.toFixed(8)},${record.p1.toFixed(6)},${record.expZ.toFixed(6)}`;

export const formatRecordsCsv = (records: readonly TimeSeriesRecord[]): string =>
  [CSV_HEADER, ...records.map(formatRecordCsv)].join('\n');
