import { createHash } from 'node:crypto';

type CanonicalScalar = null | boolean | number | string;

type CanonicalValue = CanonicalScalar | CanonicalValue[] | { [key: string]: CanonicalValue };

/**
 * Shortest round-trip text for a double with `-0` folded into `0` and the
 * exponent sign dropped, so the same number always serializes the same way.
 */
const formatCanonicalNumber = (value: number): string => {
  if (value === 0) {
    return '0';
  }
  const text = String(value);
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) {
    return text;
  }
  const mantissa = text.slice(0, exponentAt);
  const exponent = text.slice(exponentAt + 1);
  return `${mantissa}e${exponent.startsWith('+') ? exponent.slice(1) : exponent}`;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const hasToJson = (value: object): value is { toJSON: () => unknown } =>
  typeof (value as { toJSON?: unknown }).toJSON === 'function';

const normalizeEntries = (entries: Iterable<[string, unknown]>): CanonicalValue => {
  const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const result: Record<string, CanonicalValue> = {};
  for (const [key, entry] of sorted) {
    const normalized = normalizeValue(entry, false);
    if (normalized !== undefined) {
      result[key] = normalized;
    }
  }
  return result;
};

/**
 * Arbitrary-precision values stay exact: `bigint` becomes its base-10
 * digits as a string and decimal instances go through their `toJSON`.
 */
const normalizeValue = (value: unknown, inArray: boolean): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return inArray ? null : undefined;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
      }
      return Object.is(value, -0) ? 0 : value;
    case 'bigint':
      return value.toString();
    case 'string':
    case 'boolean':
      return value;
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => normalizeValue(entry, true) ?? null);
  }
  if (typeof value === 'object' && hasToJson(value)) {
    return normalizeValue(value.toJSON(), inArray);
  }
  if (value instanceof Map) {
    return normalizeEntries(
      Array.from(value.entries(), ([key, entry]): [string, unknown] => [String(key), entry]),
    );
  }
  if (isPlainObject(value)) {
    return normalizeEntries(Object.entries(value));
  }
  throw new TypeError(`Unsupported canonical JSON value of type ${Object.prototype.toString.call(value)}`);
};

const stringifyCanonicalValue = (value: CanonicalValue, indentUnit: string | undefined, depth: number): string => {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return formatCanonicalNumber(value);
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  const parts = Array.isArray(value)
    ? value.map((entry) => stringifyCanonicalValue(entry, indentUnit, depth + 1))
    : Object.keys(value).map(
        (key) =>
          `${JSON.stringify(key)}:${indentUnit === undefined ? '' : ' '}${stringifyCanonicalValue(
            value[key],
            indentUnit,
            depth + 1,
          )}`,
      );
  const [open, close] = Array.isArray(value) ? ['[', ']'] : ['{', '}'];
  if (parts.length === 0) {
    return `${open}${close}`;
  }
  if (indentUnit === undefined) {
    return `${open}${parts.join(',')}${close}`;
  }
  const nextIndent = indentUnit.repeat(depth + 1);
  const baseIndent = indentUnit.repeat(depth);
  return `${open}\n${parts.map((part) => `${nextIndent}${part}`).join(',\n')}\n${baseIndent}${close}`;
};

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const normalized = normalizeValue(value, false);
  const indentUnit =
    typeof options.indent === 'number' && options.indent > 0
      ? ' '.repeat(Math.min(options.indent, 10))
      : undefined;
  return stringifyCanonicalValue(normalized ?? null, indentUnit, 0);
};

export const hashCanonicalJsonString = (json: string): string =>
  createHash('sha256').update(json, 'utf8').digest('hex');

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
