/**
 * Screening state container.
 *
 * Holds the protection toggle, selected mode, recent call log, detected
 * threats and counters for this process. State only changes through the
 * explicit methods below; the classification itself is delegated to the
 * pure engine.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AnalysisMode,
  ClassificationEngine,
  ThreatType,
  describeVerdict,
  isAnalysisMode,
  threatTypeFor,
} from './engine';
import { THREAT_CONFIDENCE } from './screening.constants';
import {
  CallStatus,
  type CallRecord,
  type ClassificationResult,
  type ScreenCallOptions,
  type ScreeningSettings,
  type ScreeningStats,
  type ThreatAlert,
} from './screening.types';

interface ScreeningState {
  protectionActive: boolean;
  mode: AnalysisMode;
  recentCalls: CallRecord[];
  threats: ThreatAlert[];
  blockedCount: number;
  allowedCount: number;
  threatsByType: Record<ThreatType, number>;
}

function emptyThreatCounts(): Record<ThreatType, number> {
  return {
    [ThreatType.SPAM]: 0,
    [ThreatType.FRAUD]: 0,
    [ThreatType.SUSPICIOUS_PATTERN]: 0,
    [ThreatType.BLACKLIST]: 0,
    [ThreatType.INTERNATIONAL]: 0,
    [ThreatType.ANONYMOUS]: 0,
  };
}

@Injectable()
export class ScreeningService {
  private readonly logger = new Logger(ScreeningService.name);
  private readonly defaultMode: AnalysisMode;
  private readonly defaultProtection: boolean;
  private readonly historyLimit: number;
  private readonly threatLimit: number;
  private readonly initialBlockedCount: number;
  private state: ScreeningState;
  private nextId = 1;

  constructor(
    private readonly engine: ClassificationEngine,
    private readonly configService: ConfigService,
  ) {
    this.defaultMode = this.resolveMode(
      this.configService.get<string>('screening.defaultMode', AnalysisMode.SMART),
    );
    this.defaultProtection = this.configService.get<boolean>('screening.protectionActive', true);
    this.historyLimit = this.configService.get<number>('screening.historyLimit', 10);
    this.threatLimit = this.configService.get<number>('screening.threatLimit', 5);
    this.initialBlockedCount = this.configService.get<number>('screening.initialBlockedCount', 0);
    this.state = this.initialState();
  }

  // ── Classification (no state change) ──────────────────────────────

  classify(phoneNumber: string, mode: AnalysisMode = this.state.mode): ClassificationResult {
    const { verdict, rule } = this.engine.evaluate(phoneNumber, mode);
    return {
      phoneNumber,
      mode,
      blocked: verdict.blocked,
      reason: verdict.reason,
      reasonLabel: describeVerdict(verdict),
      threatType: verdict.blocked ? threatTypeFor(verdict.reason) : null,
      rule,
    };
  }

  // ── Incoming calls ────────────────────────────────────────────────

  screenIncomingCall(phoneNumber: string, options: ScreenCallOptions = {}): CallRecord {
    const mode = options.mode ?? this.state.mode;
    const verdict = this.engine.classify(phoneNumber, mode);
    const blocked = verdict.blocked && this.state.protectionActive;
    const timestamp = Date.now();

    const record: CallRecord = {
      id: this.nextId++,
      phoneNumber,
      contactName: options.contactName ?? null,
      status: blocked ? CallStatus.BLOCKED : CallStatus.ALLOWED,
      reason: verdict.reason,
      mode,
      timestamp,
    };
    this.state.recentCalls = [record, ...this.state.recentCalls].slice(0, this.historyLimit);

    if (blocked && verdict.reason) {
      const threatType = threatTypeFor(verdict.reason);
      const alert: ThreatAlert = {
        id: record.id,
        phoneNumber,
        threatType,
        reason: verdict.reason,
        confidence: THREAT_CONFIDENCE[verdict.reason],
        timestamp,
      };
      this.state.threats = [alert, ...this.state.threats].slice(0, this.threatLimit);
      this.state.blockedCount++;
      this.state.threatsByType[threatType]++;
      this.logger.log(`Blocked ${phoneNumber} (${verdict.reason}, mode=${mode})`);
    } else {
      this.state.allowedCount++;
      this.logger.debug(
        `Allowed ${phoneNumber} (verdict=${verdict.reason ?? 'clean'}, protection=${this.state.protectionActive})`,
      );
    }

    return record;
  }

  // ── Settings ──────────────────────────────────────────────────────

  getSettings(): ScreeningSettings {
    return { protectionActive: this.state.protectionActive, mode: this.state.mode };
  }

  updateSettings(update: Partial<ScreeningSettings>): ScreeningSettings {
    if (update.protectionActive !== undefined) this.setProtection(update.protectionActive);
    if (update.mode !== undefined) this.setMode(update.mode);
    return this.getSettings();
  }

  setProtection(active: boolean): ScreeningSettings {
    if (this.state.protectionActive !== active) {
      this.state.protectionActive = active;
      this.logger.log(`Protection ${active ? 'enabled' : 'disabled'}`);
    }
    return this.getSettings();
  }

  toggleProtection(): ScreeningSettings {
    return this.setProtection(!this.state.protectionActive);
  }

  setMode(mode: AnalysisMode): ScreeningSettings {
    if (this.state.mode !== mode) {
      this.logger.log(`Analysis mode ${this.state.mode} → ${mode}`);
      this.state.mode = mode;
    }
    return this.getSettings();
  }

  // ── Reads ─────────────────────────────────────────────────────────

  getRecentCalls(): CallRecord[] {
    return [...this.state.recentCalls];
  }

  getThreats(): ThreatAlert[] {
    return [...this.state.threats];
  }

  getStats(): ScreeningStats {
    const { blockedCount, allowedCount } = this.state;
    return {
      ...this.getSettings(),
      blockedCount,
      allowedCount,
      totalScreened: blockedCount - this.initialBlockedCount + allowedCount,
      threatsByType: { ...this.state.threatsByType },
    };
  }

  reset(): ScreeningStats {
    this.state = this.initialState();
    this.logger.log('Screening state reset');
    return this.getStats();
  }

  // ── Internal ──────────────────────────────────────────────────────

  private initialState(): ScreeningState {
    return {
      protectionActive: this.defaultProtection,
      mode: this.defaultMode,
      recentCalls: [],
      threats: [],
      blockedCount: this.initialBlockedCount,
      allowedCount: 0,
      threatsByType: emptyThreatCounts(),
    };
  }

  private resolveMode(value: string): AnalysisMode {
    if (isAnalysisMode(value)) return value;
    this.logger.warn(`Unknown analysis mode "${value}", falling back to ${AnalysisMode.SMART}`);
    return AnalysisMode.SMART;
  }
}
