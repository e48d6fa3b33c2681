import type { OracleKind } from '../../encoding/oracle.js';
import type { TransformInputsInit } from '../../plm/inputs.js';
import type { RunOverrides } from '../../runtime/services.js';

export class CliUsageError extends Error {
  readonly flag: string | undefined;

  constructor(message: string, flag?: string) {
    super(message);
    this.name = 'CliUsageError';
    this.flag = flag;
  }
}

const INPUT_FLAGS = {
  '--pi': 'pi',
  '--lambda': 'lambda',
  '--mu': 'mu',
  '--x': 'x',
  '--hash': 'hashHex',
  '--block-size': 'blockSize',
  '--crc': 'crcValue',
} as const satisfies Record<string, keyof TransformInputsInit>;

type InputFlag = keyof typeof INPUT_FLAGS;

const isInputFlag = (flag: string): flag is InputFlag => Object.hasOwn(INPUT_FLAGS, flag);

export type ValueCommandOptions = {
  config?: string;
  inputs?: TransformInputsInit;
  json: boolean;
};

export type RunOutputFormat = 'csv' | 'json';

export type RunCommandOptions = {
  config?: string;
  inputs?: TransformInputsInit;
  overrides: RunOverrides;
  format: RunOutputFormat;
  output?: string;
  broadcast?: number;
  interval?: number;
};

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value.`, flag);
  }
  return value;
};

const readCount = (flag: string, raw: string, allowZero: boolean): number => {
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new CliUsageError(
      `${flag} expects a ${allowZero ? 'non-negative' : 'positive'} integer (received "${raw}").`,
      flag,
    );
  }
  return value;
};

const readFinite = (flag: string, raw: string): number => {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a finite number (received "${raw}").`, flag);
  }
  return value;
};

const readPort = (flag: string, raw: string): number => {
  const value = readCount(flag, raw, true);
  if (value > 65535) {
    throw new CliUsageError(`${flag} expects a port between 0 and 65535 (received "${raw}").`, flag);
  }
  return value;
};

const readOracle = (raw: string): OracleKind => {
  if (raw === 'analytic' || raw === 'sampled') {
    return raw;
  }
  throw new CliUsageError(`Unsupported oracle "${raw}". Use analytic or sampled.`, '--oracle');
};

const readFormat = (raw: string): RunOutputFormat => {
  if (raw === 'csv' || raw === 'json') {
    return raw;
  }
  throw new CliUsageError(`Unsupported format "${raw}". Use csv or json.`, '--format');
};

/**
 * Inline inputs are all-or-nothing: either none of the seven flags is given
 * (the run config supplies them) or every one is.
 */
const finishInputs = (
  collected: Partial<Record<keyof TransformInputsInit, string>>,
): TransformInputsInit | undefined => {
  const given = Object.keys(collected).length;
  if (given === 0) {
    return undefined;
  }
  const { pi, lambda, mu, x, hashHex, blockSize, crcValue } = collected;
  if (
    pi === undefined ||
    lambda === undefined ||
    mu === undefined ||
    x === undefined ||
    hashHex === undefined ||
    blockSize === undefined ||
    crcValue === undefined
  ) {
    const missing = Object.entries(INPUT_FLAGS)
      .filter(([, field]) => collected[field] === undefined)
      .map(([flag]) => flag);
    throw new CliUsageError(`Missing input flags: ${missing.join(', ')}`);
  }
  return { pi, lambda, mu, x, hashHex, blockSize, crcValue };
};

const assertSingleSource = (options: { config?: string; inputs?: TransformInputsInit }) => {
  if (options.config && options.inputs) {
    throw new CliUsageError('Use either --config <file> or the inline input flags, not both.');
  }
};

export const parseValueArgs = (args: readonly string[]): ValueCommandOptions => {
  const options: ValueCommandOptions = { json: false };
  const collected: Partial<Record<keyof TransformInputsInit, string>> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isInputFlag(arg)) {
      collected[INPUT_FLAGS[arg]] = takeValue(args, i, arg);
      i++;
      continue;
    }
    switch (arg) {
      case '--config':
        options.config = takeValue(args, i, arg);
        i++;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        throw new CliUsageError(`Unknown option "${arg}".`, arg);
    }
  }
  options.inputs = finishInputs(collected);
  assertSingleSource(options);
  if (!options.config && !options.inputs) {
    throw new CliUsageError('value requires --config <file> or the inline input flags.');
  }
  return options;
};

const RUN_VALUE_FLAGS = new Set([
  '--config',
  '--steps',
  '--scale',
  '--shots',
  '--seed',
  '--oracle',
  '--format',
  '--output',
  '--broadcast',
  '--interval',
]);

export const parseRunArgs = (args: readonly string[]): RunCommandOptions => {
  const options: RunCommandOptions = { overrides: {}, format: 'csv' };
  const collected: Partial<Record<keyof TransformInputsInit, string>> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isInputFlag(arg)) {
      collected[INPUT_FLAGS[arg]] = takeValue(args, i, arg);
      i++;
      continue;
    }
    if (arg === '--json') {
      options.format = 'json';
      continue;
    }
    if (!RUN_VALUE_FLAGS.has(arg)) {
      throw new CliUsageError(`Unknown option "${arg}".`, arg);
    }
    const value = takeValue(args, i, arg);
    i++;
    switch (arg) {
      case '--config':
        options.config = value;
        break;
      case '--steps':
        options.overrides.steps = readCount(arg, value, true);
        break;
      case '--scale':
        options.overrides.scale = readFinite(arg, value);
        break;
      case '--shots':
        options.overrides.shots = readCount(arg, value, false);
        break;
      case '--seed':
        options.overrides.seed = readCount(arg, value, true);
        break;
      case '--oracle':
        options.overrides.oracle = readOracle(value);
        break;
      case '--format':
        options.format = readFormat(value);
        break;
      case '--output':
        options.output = value;
        break;
      case '--broadcast':
        options.broadcast = readPort(arg, value);
        break;
      case '--interval':
        options.interval = readCount(arg, value, true);
        break;
      default:
        throw new CliUsageError(`Unknown option "${arg}".`, arg);
    }
  }
  options.inputs = finishInputs(collected);
  assertSingleSource(options);
  return options;
};
