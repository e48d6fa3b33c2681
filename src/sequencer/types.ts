import type { Decimal } from 'decimal.js';

import type { TransformInputs } from '../plm/inputs.js';

export type SequencerState = {
  readonly t: number;
  readonly inputs: TransformInputs;
};

/**
 * Produces the inputs for step `t + 1` from the inputs at step `t`. Rules
 * never touch the step counter; the sequencer advances it by exactly one.
 */
export type UpdateRule = (inputs: TransformInputs, t: number) => TransformInputs;

export type SequencerObserver = (state: SequencerState, value: Decimal) => void;

/**
 * - `validate-first`: evaluate the candidate state before committing it; a
 *   failing step leaves the sequencer at its last good state.
 * - `commit-first`: commit the candidate state, then evaluate it; a failing
 *   step leaves the sequencer at the new state and every later read fails.
 */
export type CommitPolicy = 'validate-first' | 'commit-first';

export type SequencerOptions = {
  observer?: SequencerObserver;
  commitPolicy?: CommitPolicy;
};

export type UpdateRuleSpec =
  | { kind: 'increment-x'; delta: bigint }
  | { kind: 'increment-crc'; delta: bigint }
  | { kind: 'hash-rollover'; bits: number };
