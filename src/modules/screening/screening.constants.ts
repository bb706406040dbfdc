import { BlockReason } from './engine';

/** DI token for the reference lists handed to the classification engine. */
export const REFERENCE_LISTS = 'REFERENCE_LISTS';

/** Confidence (0-100) reported on a threat alert for each block reason. */
export const THREAT_CONFIDENCE: Readonly<Record<BlockReason, number>> = {
  [BlockReason.REPEATING_DIGITS]: 95,
  [BlockReason.SHORT_NUMBER]: 88,
  [BlockReason.SUSPICIOUS_PATTERN]: 92,
  [BlockReason.KNOWN_SPAM]: 97,
  [BlockReason.PRIVATE_NUMBER]: 85,
  [BlockReason.INTERNATIONAL_SCAM]: 90,
  [BlockReason.SEQUENTIAL_NUMBER]: 89,
  [BlockReason.MASS_DIALING]: 93,
};
