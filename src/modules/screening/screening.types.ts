import type { AnalysisMode, BlockReason, ThreatType } from './engine';

export const CallStatus = {
  BLOCKED: 'BLOCKED',
  ALLOWED: 'ALLOWED',
} as const;

export type CallStatus = (typeof CallStatus)[keyof typeof CallStatus];

export interface ClassificationResult {
  phoneNumber: string;
  mode: AnalysisMode;
  blocked: boolean;
  reason: BlockReason | null;
  reasonLabel: string;
  threatType: ThreatType | null;
  rule: string | null; // name of the rule that fired
}

/**
 * One screened call. `reason` is the engine's verdict and is kept even
 * when protection is off and the call went through.
 */
export interface CallRecord {
  id: number;
  phoneNumber: string;
  contactName: string | null;
  status: CallStatus;
  reason: BlockReason | null;
  mode: AnalysisMode;
  timestamp: number;
}

export interface ThreatAlert {
  id: number;
  phoneNumber: string;
  threatType: ThreatType;
  reason: BlockReason;
  confidence: number;
  timestamp: number;
}

export interface ScreeningSettings {
  protectionActive: boolean;
  mode: AnalysisMode;
}

export interface ScreeningStats extends ScreeningSettings {
  blockedCount: number;
  allowedCount: number;
  totalScreened: number;
  threatsByType: Record<ThreatType, number>;
}

export interface ScreenCallOptions {
  contactName?: string | null;
  mode?: AnalysisMode; // overrides the current mode for this call only
}
