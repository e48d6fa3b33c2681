import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { RunConfigValidationError, validateRunConfig } from './schema.js';
import type { RunConfig, RunConfigValidationIssue } from './types.js';

export type RunConfigLoadResult =
  | {
      readonly kind: 'success';
      readonly config: RunConfig;
      readonly issues: RunConfigValidationIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: RunConfigValidationIssue[] | undefined;
      readonly sourceName?: string;
    };

export function loadRunConfigFromJson(json: string, sourceName?: string): RunConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON run config',
      issues: undefined,
      sourceName,
    };
  }

  try {
    const { config, issues } = validateRunConfig(parsed);
    return { kind: 'success', config, issues, sourceName };
  } catch (error) {
    if (error instanceof RunConfigValidationError) {
      return { kind: 'error', message: error.message, issues: error.issues, sourceName };
    }
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Unknown run config validation error',
      issues: undefined,
      sourceName,
    };
  }
}

export async function loadRunConfigFromPath(path: string): Promise<RunConfigLoadResult> {
  const json = await readFile(resolve(process.cwd(), path), 'utf8');
  return loadRunConfigFromJson(json, path);
}

/** Load and unwrap, turning a failed validation into a thrown error. */
export async function requireRunConfig(path: string): Promise<RunConfig> {
  const result = await loadRunConfigFromPath(path);
  if (result.kind === 'error') {
    throw new RunConfigValidationError(`${path}: ${result.message}`, result.issues ?? []);
  }
  return result.config;
}
