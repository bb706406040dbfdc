import {
  AnalysisMode,
  BlockReason,
  ThreatType,
  type Labelled,
} from './types';

export const MODE_LABELS: Readonly<Record<AnalysisMode, Labelled>> = {
  [AnalysisMode.SMART]: {
    label: 'Smart',
    description: 'Balance between protection and convenience',
  },
  [AnalysisMode.AGGRESSIVE]: {
    label: 'Aggressive',
    description: 'Blocks everything suspicious',
  },
  [AnalysisMode.PERMISSIVE]: {
    label: 'Permissive',
    description: 'Blocks only obvious threats',
  },
};

export const REASON_LABELS: Readonly<Record<BlockReason, Labelled>> = {
  [BlockReason.REPEATING_DIGITS]: {
    label: 'Repeating digits',
    description: 'Long run of the same digit',
  },
  [BlockReason.SHORT_NUMBER]: {
    label: 'Short number',
    description: 'Too few digits for a subscriber number',
  },
  [BlockReason.SUSPICIOUS_PATTERN]: {
    label: 'Suspicious pattern',
    description: 'Contains 0000, 1111, 999 or repeated digit pairs',
  },
  [BlockReason.KNOWN_SPAM]: {
    label: 'Known spam',
    description: 'Listed as a spam number',
  },
  [BlockReason.PRIVATE_NUMBER]: {
    label: 'Private number',
    description: 'Hidden or anonymous caller',
  },
  [BlockReason.INTERNATIONAL_SCAM]: {
    label: 'International scam',
    description: 'Suspicious international number',
  },
  [BlockReason.SEQUENTIAL_NUMBER]: {
    label: 'Sequential digits',
    description: 'Digits in ascending or descending order',
  },
  [BlockReason.MASS_DIALING]: {
    label: 'Mass dialing',
    description: 'Range used for mass calling campaigns',
  },
};

export const THREAT_TYPE_LABELS: Readonly<Record<ThreatType, string>> = {
  [ThreatType.SPAM]: 'Spam',
  [ThreatType.FRAUD]: 'Fraud',
  [ThreatType.SUSPICIOUS_PATTERN]: 'Suspicious pattern',
  [ThreatType.BLACKLIST]: 'Blacklist',
  [ThreatType.INTERNATIONAL]: 'International spam',
  [ThreatType.ANONYMOUS]: 'Anonymous call',
};

export const ALLOWED_LABEL = 'Allowed';
