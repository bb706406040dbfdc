/**
 * Rule sets per analysis mode.
 *
 * Each mode is an ordered list; the first rule whose `test` passes decides
 * the reason and nothing after it runs. Aggressive is Smart followed by
 * its own extra checks, so anything Smart blocks Aggressive blocks for the
 * same reason.
 */

import {
  hasRepeatedDigitRun,
  hasRepeatedPairRun,
  hasSequentialRun,
} from './digits';
import { AnalysisMode, BlockReason, type ScreeningRule } from './types';

// ── Thresholds ─────────────────────────────────────────────────────

export const SMART_REPEAT_RUN = 7;
export const SMART_MIN_DIGITS = 7;
export const PERMISSIVE_REPEAT_RUN = 9;
export const PERMISSIVE_MIN_DIGITS = 5;
export const SEQUENTIAL_RUN = 7;
export const PAIR_REPEATS = 4;

// ── Textual markers ────────────────────────────────────────────────

export const SUSPICIOUS_SUBSTRINGS = ['0000', '1111', '999'] as const;
export const PRIVATE_SENTINELS = ['unknown', 'private'] as const;
export const HIDE_CALLER_ID_CODE = '#31#';
export const US_PREFIX = '+1';
export const US_FICTIONAL_EXCHANGE = '555';
export const RU_PREFIX = '+7';
export const MASS_DIALING_PREFIX = '+7900';

// Sentinels like "unknown" carry no digits at all; they are not short
// numbers, they fall through to the textual rules.
function isShort(digits: string, minDigits: number): boolean {
  return digits.length > 0 && digits.length < minDigits;
}

// ── Smart ──────────────────────────────────────────────────────────

export const SMART_RULES: readonly ScreeningRule[] = [
  {
    name: 'repeating-digits',
    reason: BlockReason.REPEATING_DIGITS,
    test: ({ digits }) => hasRepeatedDigitRun(digits, SMART_REPEAT_RUN),
  },
  {
    name: 'short-number',
    reason: BlockReason.SHORT_NUMBER,
    test: ({ digits }) => isShort(digits, SMART_MIN_DIGITS),
  },
  {
    name: 'suspicious-substring',
    reason: BlockReason.SUSPICIOUS_PATTERN,
    test: ({ raw }) => SUSPICIOUS_SUBSTRINGS.some((s) => raw.includes(s)),
  },
  {
    name: 'known-spam',
    reason: BlockReason.KNOWN_SPAM,
    test: ({ raw, knownSpam }) => knownSpam.has(raw),
  },
  {
    name: 'private-number',
    reason: BlockReason.PRIVATE_NUMBER,
    test: ({ raw }) =>
      PRIVATE_SENTINELS.some((s) => raw === s) || raw.includes(HIDE_CALLER_ID_CODE),
  },
  {
    name: 'us-fictional-exchange',
    reason: BlockReason.INTERNATIONAL_SCAM,
    test: ({ raw }) => raw.startsWith(US_PREFIX) && raw.includes(US_FICTIONAL_EXCHANGE),
  },
];

// ── Aggressive (runs after Smart) ──────────────────────────────────

export const AGGRESSIVE_EXTRA_RULES: readonly ScreeningRule[] = [
  {
    name: 'sequential-digits',
    reason: BlockReason.SEQUENTIAL_NUMBER,
    test: ({ digits }) => hasSequentialRun(digits, SEQUENTIAL_RUN),
  },
  {
    name: 'mass-dialing-range',
    reason: BlockReason.MASS_DIALING,
    test: ({ raw }) => raw.startsWith(MASS_DIALING_PREFIX),
  },
  {
    name: 'foreign-number',
    reason: BlockReason.INTERNATIONAL_SCAM,
    test: ({ raw }) =>
      raw.startsWith('+') && !raw.startsWith(RU_PREFIX) && !raw.startsWith(US_PREFIX),
  },
  {
    name: 'repeated-pairs',
    reason: BlockReason.SUSPICIOUS_PATTERN,
    test: ({ digits }) => hasRepeatedPairRun(digits, PAIR_REPEATS),
  },
];

// ── Permissive (independent) ───────────────────────────────────────

export const PERMISSIVE_RULES: readonly ScreeningRule[] = [
  {
    name: 'high-risk',
    reason: BlockReason.KNOWN_SPAM,
    test: ({ raw, highRisk }) => highRisk.has(raw),
  },
  {
    name: 'repeating-digits',
    reason: BlockReason.REPEATING_DIGITS,
    test: ({ digits }) => hasRepeatedDigitRun(digits, PERMISSIVE_REPEAT_RUN),
  },
  {
    name: 'short-number',
    reason: BlockReason.SHORT_NUMBER,
    test: ({ digits }) => isShort(digits, PERMISSIVE_MIN_DIGITS),
  },
];

export const RULE_SETS: Readonly<Record<AnalysisMode, readonly ScreeningRule[]>> = {
  [AnalysisMode.SMART]: SMART_RULES,
  [AnalysisMode.AGGRESSIVE]: [...SMART_RULES, ...AGGRESSIVE_EXTRA_RULES],
  [AnalysisMode.PERMISSIVE]: PERMISSIVE_RULES,
};
