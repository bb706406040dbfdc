import { ALLOWED_LABEL, REASON_LABELS } from './labels';
import { BlockReason, ThreatType, type Verdict } from './types';

/** Display category of a block reason. No reason falls back to SPAM. */
export function threatTypeFor(reason: BlockReason | null): ThreatType {
  switch (reason) {
    case BlockReason.REPEATING_DIGITS:
    case BlockReason.SEQUENTIAL_NUMBER:
      return ThreatType.SUSPICIOUS_PATTERN;
    case BlockReason.SHORT_NUMBER:
      return ThreatType.FRAUD;
    case BlockReason.KNOWN_SPAM:
    case BlockReason.MASS_DIALING:
      return ThreatType.BLACKLIST;
    case BlockReason.PRIVATE_NUMBER:
      return ThreatType.ANONYMOUS;
    case BlockReason.INTERNATIONAL_SCAM:
      return ThreatType.INTERNATIONAL;
    case BlockReason.SUSPICIOUS_PATTERN:
    case null:
      return ThreatType.SPAM;
  }
}

export function describeVerdict(verdict: Verdict): string {
  return verdict.blocked ? REASON_LABELS[verdict.reason].label : ALLOWED_LABEL;
}
