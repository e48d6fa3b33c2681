export { TAU, angleFromValue } from './angle.js';
export {
  createAnalyticOracle,
  createOracle,
  createSampledOracle,
  deriveShotSeed,
  rotationProbability,
  type OracleKind,
  type RotationOracle,
} from './oracle.js';
export {
  CSV_HEADER,
  DEFAULT_ENCODING,
  formatRecordCsv,
  formatRecordsCsv,
  simulateTimeSeries,
  type EncodingConfig,
  type TimeSeriesRecord,
} from './timeSeries.js';
