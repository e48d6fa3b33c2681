import type { Decimal } from 'decimal.js';

import type { TransformInputs } from '../plm/inputs.js';
import { computeSecretValue } from '../plm/transform.js';
import type {
  CommitPolicy,
  SequencerObserver,
  SequencerOptions,
  SequencerState,
  UpdateRule,
} from './types.js';

const isState = (value: SequencerState | TransformInputs): value is SequencerState =>
  'inputs' in value && 't' in value;

/**
 * Discrete-time driver around the transform. Owns a single `(t, inputs)`
 * cell that is replaced wholesale on every step; no history is kept.
 *
 * Instances are not safe for concurrent advancement. Callers that share a
 * sequencer between readers and a stepping owner must synchronize around it.
 */
export class Sequencer {
  readonly commitPolicy: CommitPolicy;
  private readonly rule: UpdateRule;
  private readonly observer?: SequencerObserver;
  private current: SequencerState;

  constructor(
    initial: SequencerState | TransformInputs,
    rule: UpdateRule,
    options: SequencerOptions = {},
  ) {
    const state = isState(initial) ? initial : { t: 0, inputs: initial };
    if (!Number.isSafeInteger(state.t) || state.t < 0) {
      throw new RangeError(`Sequencer step counter must be a non-negative integer (received ${state.t})`);
    }
    this.current = Object.freeze({ t: state.t, inputs: state.inputs });
    this.rule = rule;
    this.observer = options.observer;
    this.commitPolicy = options.commitPolicy ?? 'validate-first';
  }

  get state(): SequencerState {
    return this.current;
  }

  get t(): number {
    return this.current.t;
  }

  currentValue(): Decimal {
    return computeSecretValue(this.current.inputs);
  }

  step(): Decimal {
    const next: SequencerState = Object.freeze({
      t: this.current.t + 1,
      inputs: this.rule(this.current.inputs, this.current.t),
    });

    let value: Decimal;
    if (this.commitPolicy === 'commit-first') {
      this.current = next;
      value = computeSecretValue(next.inputs);
    } else {
      value = computeSecretValue(next.inputs);
      this.current = next;
    }

    this.observer?.(this.current, value);
    return value;
  }
}
