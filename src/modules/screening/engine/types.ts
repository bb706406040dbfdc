/**
 * Call Classification Engine — Shared Types
 *
 * Closed sets are declared as `as const` objects so they can be used both
 * as runtime values (validation, iteration) and as string-literal unions.
 */

// ── Analysis modes ─────────────────────────────────────────────────

export const AnalysisMode = {
  SMART: 'SMART',
  AGGRESSIVE: 'AGGRESSIVE',
  PERMISSIVE: 'PERMISSIVE',
} as const;

export type AnalysisMode = (typeof AnalysisMode)[keyof typeof AnalysisMode];

// ── Block reasons ──────────────────────────────────────────────────

export const BlockReason = {
  REPEATING_DIGITS: 'REPEATING_DIGITS',
  SHORT_NUMBER: 'SHORT_NUMBER',
  SUSPICIOUS_PATTERN: 'SUSPICIOUS_PATTERN',
  KNOWN_SPAM: 'KNOWN_SPAM',
  PRIVATE_NUMBER: 'PRIVATE_NUMBER',
  INTERNATIONAL_SCAM: 'INTERNATIONAL_SCAM',
  SEQUENTIAL_NUMBER: 'SEQUENTIAL_NUMBER',
  MASS_DIALING: 'MASS_DIALING',
} as const;

export type BlockReason = (typeof BlockReason)[keyof typeof BlockReason];

// ── Threat categories (display grouping of reasons) ────────────────

export const ThreatType = {
  SPAM: 'SPAM',
  FRAUD: 'FRAUD',
  SUSPICIOUS_PATTERN: 'SUSPICIOUS_PATTERN',
  BLACKLIST: 'BLACKLIST',
  INTERNATIONAL: 'INTERNATIONAL',
  ANONYMOUS: 'ANONYMOUS',
} as const;

export type ThreatType = (typeof ThreatType)[keyof typeof ThreatType];

// ── Verdict ────────────────────────────────────────────────────────

/** A reason is present exactly when the call is blocked. */
export type Verdict =
  | { blocked: true; reason: BlockReason }
  | { blocked: false; reason: null };

// ── Reference data ─────────────────────────────────────────────────

export interface ReferenceLists {
  knownSpam: readonly string[];
  highRisk: readonly string[];
}

// ── Rules ──────────────────────────────────────────────────────────

export interface RuleInput {
  raw: string;
  digits: string;
  knownSpam: ReadonlySet<string>;
  highRisk: ReadonlySet<string>;
}

export interface ScreeningRule {
  name: string;
  reason: BlockReason;
  test(input: RuleInput): boolean;
}

export interface Labelled {
  label: string;
  description: string;
}

export function isAnalysisMode(value: string): value is AnalysisMode {
  return Object.values<string>(AnalysisMode).includes(value);
}
