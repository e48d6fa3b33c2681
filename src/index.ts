export * from './plm/index.js';
export * from './sequencer/index.js';
export * from './encoding/index.js';
export * from './config/index.js';
export {
  hashCanonicalJson,
  hashCanonicalJsonString,
  writeCanonicalJson,
  type CanonicalJsonWriteOptions,
} from './serialization/canonicalJson.js';
export {
  createAdHocConfig,
  evaluateInputs,
  resolveRunConfig,
  runTimeSeries,
  type RunOptions,
  type RunOverrides,
  type RunSummary,
  type ValueSummary,
} from './runtime/services.js';
export {
  RecordBroadcaster,
  startRecordBroadcaster,
  type BroadcastFrame,
  type BroadcastOptions,
} from './telemetry/broadcast.js';
