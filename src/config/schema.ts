import type { Decimal } from 'decimal.js';

import type { OracleKind } from '../encoding/oracle.js';
import type { TransformField } from '../plm/errors.js';
import { isHexString } from '../plm/hex.js';
import { toDecimal, toInteger, type TransformInputs } from '../plm/inputs.js';
import type { CommitPolicy, UpdateRuleSpec } from '../sequencer/types.js';
import type {
  RunConfig,
  RunConfigMetadata,
  RunConfigValidationIssue,
  RunConfigValidationResult,
  RunSettings,
} from './types.js';

export const RUN_CONFIG_SCHEMA_VERSION = '1.0.0';

export const DEFAULT_RUN_SETTINGS: Readonly<RunSettings> = {
  steps: 20,
  scale: 1,
  shots: 2000,
  oracle: 'sampled',
  seed: 1337,
  commitPolicy: 'validate-first',
};

export const DEFAULT_RULES: readonly UpdateRuleSpec[] = [{ kind: 'increment-x', delta: 1n }];

const MAX_HASH_ROLLOVER_BITS = 4096;

type Path = readonly (string | number)[];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const toPath = (...parts: (string | number)[]): Path => parts;

const pushIssue = (
  issues: RunConfigValidationIssue[],
  code: string,
  message: string,
  path: Path,
  severity: RunConfigValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

export class RunConfigValidationError extends Error {
  constructor(
    message: string,
    readonly issues: RunConfigValidationIssue[],
  ) {
    super(message);
    this.name = 'RunConfigValidationError';
  }
}

const normaliseMetadata = (
  value: unknown,
  issues: RunConfigValidationIssue[],
  path: Path,
): RunConfigMetadata => {
  if (value === undefined) {
    pushIssue(issues, 'metadata/missing', 'Run config has no metadata; using "untitled"', path, 'warning');
    return { name: 'untitled' };
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'metadata/type', 'metadata must be an object', path);
    return { name: 'untitled' };
  }
  const name = asString(value.name);
  if (!name) {
    pushIssue(issues, 'metadata/name', 'metadata.name must be a non-empty string', [...path, 'name']);
  }
  const description = asString(value.description) ?? undefined;
  return { name: name || 'untitled', description };
};

const DECIMAL_FIELDS = ['pi', 'lambda', 'mu'] as const;
const INTEGER_FIELDS = ['x', 'blockSize', 'crcValue'] as const;

const readDecimal = (
  source: Record<string, unknown>,
  field: (typeof DECIMAL_FIELDS)[number],
  issues: RunConfigValidationIssue[],
  path: Path,
): Decimal | null => {
  const raw = source[field];
  const fieldPath = [...path, field];
  if (typeof raw === 'number') {
    pushIssue(
      issues,
      `inputs/${field}/number`,
      `${field} was given as a JSON number and may have lost digits; write it as a string`,
      fieldPath,
      'warning',
    );
  } else if (typeof raw !== 'string') {
    pushIssue(issues, `inputs/${field}/type`, `${field} must be a decimal string`, fieldPath);
    return null;
  }
  try {
    return toDecimal(raw, field);
  } catch (error) {
    pushIssue(issues, `inputs/${field}/invalid`, describeError(error), fieldPath);
    return null;
  }
};

const readInteger = (
  source: Record<string, unknown>,
  field: TransformField,
  issues: RunConfigValidationIssue[],
  path: Path,
): bigint | null => {
  const raw = source[field];
  const fieldPath = [...path, field];
  if (typeof raw !== 'number' && typeof raw !== 'string') {
    pushIssue(issues, `inputs/${field}/type`, `${field} must be an integer or integer string`, fieldPath);
    return null;
  }
  try {
    return toInteger(raw, field);
  } catch (error) {
    pushIssue(issues, `inputs/${field}/invalid`, describeError(error), fieldPath);
    return null;
  }
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const normaliseInputs = (
  value: unknown,
  issues: RunConfigValidationIssue[],
  path: Path,
): TransformInputs | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'inputs/type', 'inputs must be an object', path);
    return null;
  }

  const [pi, lambda, mu] = DECIMAL_FIELDS.map((field) => readDecimal(value, field, issues, path));
  const [x, blockSize, crcValue] = INTEGER_FIELDS.map((field) =>
    readInteger(value, field, issues, path),
  );

  const hashHex = asString(value.hashHex);
  if (hashHex === null) {
    pushIssue(issues, 'inputs/hashHex/type', 'hashHex must be a string', [...path, 'hashHex']);
  } else if (!isHexString(hashHex)) {
    pushIssue(
      issues,
      'inputs/hashHex/invalid',
      `hashHex ${JSON.stringify(hashHex)} is not a hexadecimal string`,
      [...path, 'hashHex'],
    );
  }

  if (blockSize !== null && blockSize < 0n) {
    pushIssue(issues, 'inputs/blockSize/negative', `blockSize must not be negative (received ${blockSize})`, [
      ...path,
      'blockSize',
    ]);
  }
  if (crcValue !== null && crcValue < 0n) {
    pushIssue(issues, 'inputs/crcValue/negative', `crcValue must not be negative (received ${crcValue})`, [
      ...path,
      'crcValue',
    ]);
  }
  if (mu !== null && mu.isZero()) {
    pushIssue(issues, 'inputs/mu/zero', 'mu cannot be 0', [...path, 'mu']);
  }
  if (blockSize !== null && crcValue !== null && blockSize + crcValue <= 0n) {
    pushIssue(
      issues,
      'inputs/c/non-positive',
      `blockSize + crcValue must be positive (blockSize=${blockSize}, crcValue=${crcValue})`,
      path,
    );
  }

  if (
    pi === null ||
    lambda === null ||
    mu === null ||
    x === null ||
    blockSize === null ||
    crcValue === null ||
    hashHex === null
  ) {
    return null;
  }
  return Object.freeze({ pi, lambda, mu, x, hashHex, blockSize, crcValue });
};

const normaliseRule = (
  value: unknown,
  issues: RunConfigValidationIssue[],
  path: Path,
): UpdateRuleSpec | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'rules/type', 'Each rule must be an object', path);
    return null;
  }
  const kind = asString(value.kind);
  if (kind === 'increment-x' || kind === 'increment-crc') {
    const rawDelta = value.delta ?? 1;
    if (typeof rawDelta !== 'number' && typeof rawDelta !== 'string') {
      pushIssue(issues, 'rules/delta/type', 'delta must be an integer', [...path, 'delta']);
      return null;
    }
    try {
      const delta = toInteger(rawDelta, kind === 'increment-x' ? 'x' : 'crcValue');
      return { kind, delta };
    } catch (error) {
      pushIssue(issues, 'rules/delta/invalid', describeError(error), [...path, 'delta']);
      return null;
    }
  }
  if (kind === 'hash-rollover') {
    const bits = value.bits ?? 16;
    if (
      typeof bits !== 'number' ||
      !Number.isInteger(bits) ||
      bits < 1 ||
      bits > MAX_HASH_ROLLOVER_BITS
    ) {
      pushIssue(
        issues,
        'rules/bits/invalid',
        `bits must be an integer between 1 and ${MAX_HASH_ROLLOVER_BITS}`,
        [...path, 'bits'],
      );
      return null;
    }
    return { kind, bits };
  }
  pushIssue(
    issues,
    'rules/kind',
    `Unknown rule kind ${JSON.stringify(value.kind)}; expected increment-x, increment-crc or hash-rollover`,
    [...path, 'kind'],
  );
  return null;
};

const normaliseRules = (
  value: unknown,
  issues: RunConfigValidationIssue[],
  path: Path,
): UpdateRuleSpec[] => {
  if (value === undefined) {
    return [...DEFAULT_RULES];
  }
  if (!Array.isArray(value)) {
    pushIssue(issues, 'rules/type', 'rules must be an array', path);
    return [];
  }
  if (value.length === 0) {
    pushIssue(issues, 'rules/empty', 'rules is empty; inputs will not change between steps', path, 'warning');
  }
  const rules: UpdateRuleSpec[] = [];
  value.forEach((entry, index) => {
    const rule = normaliseRule(entry, issues, [...path, index]);
    if (rule) {
      rules.push(rule);
    }
  });
  return rules;
};

const readCount = (
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  allowZero: boolean,
  issues: RunConfigValidationIssue[],
  path: Path,
): number => {
  const raw = source[key];
  if (raw === undefined) {
    return fallback;
  }
  const lowest = allowZero ? 0 : 1;
  if (typeof raw !== 'number' || !Number.isSafeInteger(raw) || raw < lowest) {
    pushIssue(issues, `run/${key}`, `run.${key} must be an integer >= ${lowest}`, [...path, key]);
    return fallback;
  }
  return raw;
};

const normaliseRunSettings = (
  value: unknown,
  issues: RunConfigValidationIssue[],
  path: Path,
): RunSettings => {
  if (value === undefined) {
    return { ...DEFAULT_RUN_SETTINGS };
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'run/type', 'run must be an object', path);
    return { ...DEFAULT_RUN_SETTINGS };
  }

  const steps = readCount(value, 'steps', DEFAULT_RUN_SETTINGS.steps, true, issues, path);
  const shots = readCount(value, 'shots', DEFAULT_RUN_SETTINGS.shots, false, issues, path);
  const seed = readCount(value, 'seed', DEFAULT_RUN_SETTINGS.seed, true, issues, path);

  let scale = DEFAULT_RUN_SETTINGS.scale;
  if (value.scale !== undefined) {
    if (typeof value.scale === 'number' && Number.isFinite(value.scale)) {
      scale = value.scale;
    } else {
      pushIssue(issues, 'run/scale', 'run.scale must be a finite number', [...path, 'scale']);
    }
  }

  let oracle: OracleKind = DEFAULT_RUN_SETTINGS.oracle;
  if (value.oracle !== undefined) {
    if (value.oracle === 'analytic' || value.oracle === 'sampled') {
      oracle = value.oracle;
    } else {
      pushIssue(issues, 'run/oracle', 'run.oracle must be "analytic" or "sampled"', [...path, 'oracle']);
    }
  }

  let commitPolicy: CommitPolicy = DEFAULT_RUN_SETTINGS.commitPolicy;
  if (value.commitPolicy !== undefined) {
    if (value.commitPolicy === 'validate-first' || value.commitPolicy === 'commit-first') {
      commitPolicy = value.commitPolicy;
    } else {
      pushIssue(
        issues,
        'run/commitPolicy',
        'run.commitPolicy must be "validate-first" or "commit-first"',
        [...path, 'commitPolicy'],
      );
    }
  }

  return { steps, scale, shots, oracle, seed, commitPolicy };
};

export function validateRunConfig(payload: unknown): RunConfigValidationResult {
  const issues: RunConfigValidationIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'config/type', 'Run config root must be an object', toPath());
    throw new RunConfigValidationError('Run config root must be an object', issues);
  }

  const schemaVersion = asString(payload.schemaVersion);
  if (!schemaVersion) {
    pushIssue(
      issues,
      'config/schemaVersion',
      `Run config has no schemaVersion; assuming ${RUN_CONFIG_SCHEMA_VERSION}`,
      toPath('schemaVersion'),
      'warning',
    );
  } else if (schemaVersion.split('.')[0] !== RUN_CONFIG_SCHEMA_VERSION.split('.')[0]) {
    pushIssue(
      issues,
      'config/schemaVersion',
      `Unsupported schemaVersion ${schemaVersion}; expected ${RUN_CONFIG_SCHEMA_VERSION}`,
      toPath('schemaVersion'),
    );
  }

  const metadata = normaliseMetadata(payload.metadata, issues, toPath('metadata'));
  const inputs = normaliseInputs(payload.inputs, issues, toPath('inputs'));
  const rules = normaliseRules(payload.rules, issues, toPath('rules'));
  const run = normaliseRunSettings(payload.run, issues, toPath('run'));

  const hasFatalIssues = issues.some((issue) => issue.severity === 'error');
  if (hasFatalIssues || inputs === null) {
    throw new RunConfigValidationError('Run config validation failed', issues);
  }

  const config: RunConfig = {
    schemaVersion: schemaVersion ?? RUN_CONFIG_SCHEMA_VERSION,
    metadata,
    inputs,
    rules,
    run,
  };
  return { config, issues };
}
