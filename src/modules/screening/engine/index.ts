/**
 * Call Classification Engine — Barrel Exports
 */

export {
  AnalysisMode,
  BlockReason,
  ThreatType,
  isAnalysisMode,
} from './types';
export type {
  Verdict,
  ReferenceLists,
  RuleInput,
  ScreeningRule,
  Labelled,
} from './types';

export {
  extractDigits,
  hasRepeatedDigitRun,
  hasRepeatedPairRun,
  hasSequentialRun,
} from './digits';

export {
  RULE_SETS,
  SMART_RULES,
  AGGRESSIVE_EXTRA_RULES,
  PERMISSIVE_RULES,
} from './rules';

export {
  DEFAULT_KNOWN_SPAM,
  DEFAULT_HIGH_RISK,
  DEFAULT_REFERENCE_LISTS,
} from './reference-lists';

export {
  MODE_LABELS,
  REASON_LABELS,
  THREAT_TYPE_LABELS,
  ALLOWED_LABEL,
} from './labels';

export { threatTypeFor, describeVerdict } from './threat-type';
export { ClassificationEngine } from './classification-engine';
export type { Evaluation } from './classification-engine';
