import type { OracleKind } from '../encoding/oracle.js';
import type { TransformInputs } from '../plm/inputs.js';
import type { CommitPolicy, UpdateRuleSpec } from '../sequencer/types.js';

export interface RunConfigMetadata {
  readonly name: string;
  readonly description?: string;
}

export interface RunSettings {
  readonly steps: number;
  readonly scale: number;
  readonly shots: number;
  readonly oracle: OracleKind;
  readonly seed: number;
  readonly commitPolicy: CommitPolicy;
}

export interface RunConfig {
  readonly schemaVersion: string;
  readonly metadata: RunConfigMetadata;
  readonly inputs: TransformInputs;
  readonly rules: readonly UpdateRuleSpec[];
  readonly run: RunSettings;
}

export interface RunConfigValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: 'error' | 'warning';
}

export interface RunConfigValidationResult {
  readonly config: RunConfig;
  readonly issues: RunConfigValidationIssue[];
}
