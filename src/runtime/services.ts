import { setTimeout as delay } from 'node:timers/promises';

import { DEFAULT_RULES, DEFAULT_RUN_SETTINGS, RUN_CONFIG_SCHEMA_VERSION } from '../config/schema.js';
import { requireRunConfig } from '../config/loader.js';
import type { RunConfig, RunSettings } from '../config/types.js';
import { createOracle, type RotationOracle } from '../encoding/oracle.js';
import { simulateTimeSeries, type TimeSeriesRecord } from '../encoding/timeSeries.js';
import { deriveC, describeInputs, type TransformInputs } from '../plm/inputs.js';
import { computeRatio, computeSecretValue, deriveY } from '../plm/transform.js';
import { ruleFromSpecs } from '../sequencer/rules.js';
import { Sequencer } from '../sequencer/sequencer.js';
import type { UpdateRuleSpec } from '../sequencer/types.js';
import { hashCanonicalJson } from '../serialization/canonicalJson.js';

export type RunOverrides = { -readonly [K in keyof RunSettings]?: RunSettings[K] };

export type ValueSummary = {
  inputs: ReturnType<typeof describeInputs>;
  y: string;
  c: string;
  ratio: string;
  value: string;
};

export type RunSummary = {
  name: string;
  steps: number;
  settings: RunSettings;
  records: TimeSeriesRecord[];
  final: { t: number; inputs: ReturnType<typeof describeInputs> };
  digest: string;
};

export type RunOptions = {
  /** Replaces the oracle named in the settings (e.g. a real circuit backend). */
  oracle?: RotationOracle;
  onRecord?: (record: TimeSeriesRecord) => void;
  /** Pause between steps so streaming viewers can follow along. */
  intervalMs?: number;
};

export const createAdHocConfig = (
  inputs: TransformInputs,
  rules: readonly UpdateRuleSpec[] = DEFAULT_RULES,
  settings: RunOverrides = {},
): RunConfig => ({
  schemaVersion: RUN_CONFIG_SCHEMA_VERSION,
  metadata: { name: 'ad-hoc' },
  inputs,
  rules,
  run: { ...DEFAULT_RUN_SETTINGS, ...settings },
});

export const resolveRunConfig = async (
  configPath: string | undefined,
  fallbackInputs: TransformInputs | undefined,
  overrides: RunOverrides = {},
): Promise<RunConfig> => {
  if (configPath) {
    const config = await requireRunConfig(configPath);
    return { ...config, run: { ...config.run, ...overrides } };
  }
  if (!fallbackInputs) {
    throw new Error('Provide --config <file> or all of --pi --lambda --mu --x --hash --block-size --crc');
  }
  return createAdHocConfig(fallbackInputs, DEFAULT_RULES, overrides);
};

export const evaluateInputs = (inputs: TransformInputs): ValueSummary => ({
  inputs: describeInputs(inputs),
  y: deriveY(inputs).toString(),
  c: deriveC(inputs).toString(),
  ratio: computeRatio(inputs.pi, inputs.lambda, inputs.mu).toString(),
  value: computeSecretValue(inputs).toString(),
});

const buildDigest = (config: RunConfig, records: readonly TimeSeriesRecord[]): string =>
  hashCanonicalJson({
    inputs: describeInputs(config.inputs),
    rules: config.rules,
    run: config.run,
    records,
  }).hash;

export const runTimeSeries = async (
  config: RunConfig,
  options: RunOptions = {},
): Promise<RunSummary> => {
  const sequencer = new Sequencer(config.inputs, ruleFromSpecs(config.rules), {
    commitPolicy: config.run.commitPolicy,
  });
  const oracle = options.oracle ?? createOracle(config.run.oracle, config.run.seed);
  const encoding = { scale: config.run.scale, shots: config.run.shots };

  let records: TimeSeriesRecord[];
  if (options.intervalMs && options.intervalMs > 0) {
    records = [];
    for (let index = 0; index < config.run.steps; index++) {
      records.push(...simulateTimeSeries(sequencer, 1, encoding, oracle, options.onRecord));
      await delay(options.intervalMs);
    }
  } else {
    records = simulateTimeSeries(sequencer, config.run.steps, encoding, oracle, options.onRecord);
  }

  return {
    name: config.metadata.name,
    steps: records.length,
    settings: config.run,
    records,
    final: { t: sequencer.t, inputs: describeInputs(sequencer.state.inputs) },
    digest: buildDigest(config, records),
  };
};
