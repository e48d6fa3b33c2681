export { Sequencer } from './sequencer.js';
export {
  composeRules,
  incrementCrc,
  incrementX,
  rollHash,
  ruleFromSpec,
  ruleFromSpecs,
} from './rules.js';
export type {
  CommitPolicy,
  SequencerObserver,
  SequencerOptions,
  SequencerState,
  UpdateRule,
  UpdateRuleSpec,
} from './types.js';
