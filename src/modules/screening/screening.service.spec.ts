import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ScreeningService } from './screening.service';
import { AnalysisMode, BlockReason, ClassificationEngine, ThreatType } from './engine';
import { CallStatus } from './screening.types';

async function createService(screening: Record<string, unknown> = {}) {
  const moduleRef = await Test.createTestingModule({
    providers: [
      ScreeningService,
      { provide: ClassificationEngine, useValue: new ClassificationEngine() },
      {
        provide: ConfigService,
        useValue: new ConfigService({
          screening: {
            defaultMode: 'SMART',
            protectionActive: true,
            historyLimit: 10,
            threatLimit: 5,
            initialBlockedCount: 0,
            ...screening,
          },
        }),
      },
    ],
  }).compile();

  return moduleRef.get(ScreeningService);
}

describe('ScreeningService', () => {
  let service: ScreeningService;

  beforeEach(async () => {
    service = await createService();
  });

  describe('classify', () => {
    it('uses the current mode by default and does not touch state', () => {
      expect(service.classify('+712345')).toEqual({
        phoneNumber: '+712345',
        mode: AnalysisMode.SMART,
        blocked: true,
        reason: BlockReason.SHORT_NUMBER,
        reasonLabel: 'Short number',
        threatType: ThreatType.FRAUD,
        rule: 'short-number',
      });
      expect(service.getRecentCalls()).toEqual([]);
      expect(service.getStats().totalScreened).toBe(0);
    });

    it('accepts a mode override', () => {
      const result = service.classify('+79161234567', AnalysisMode.AGGRESSIVE);
      expect(result.reason).toBe(BlockReason.SEQUENTIAL_NUMBER);
      expect(result.threatType).toBe(ThreatType.SUSPICIOUS_PATTERN);
    });

    it('has no threat type for an allowed number', () => {
      const result = service.classify('+441234567890');
      expect(result.blocked).toBe(false);
      expect(result.reasonLabel).toBe('Allowed');
      expect(result.threatType).toBeNull();
      expect(result.rule).toBeNull();
    });
  });

  describe('screenIncomingCall', () => {
    it('blocks a threat and records an alert', () => {
      const call = service.screenIncomingCall('+79991111111', { contactName: 'Spammer' });

      expect(call).toMatchObject({
        id: 1,
        phoneNumber: '+79991111111',
        contactName: 'Spammer',
        status: CallStatus.BLOCKED,
        reason: BlockReason.REPEATING_DIGITS,
        mode: AnalysisMode.SMART,
      });
      expect(service.getThreats()).toEqual([
        {
          id: 1,
          phoneNumber: '+79991111111',
          threatType: ThreatType.SUSPICIOUS_PATTERN,
          reason: BlockReason.REPEATING_DIGITS,
          confidence: 95,
          timestamp: call.timestamp,
        },
      ]);
      expect(service.getStats()).toMatchObject({ blockedCount: 1, allowedCount: 0, totalScreened: 1 });
    });

    it('lets a clean call through without an alert', () => {
      const call = service.screenIncomingCall('+441234567890');

      expect(call.status).toBe(CallStatus.ALLOWED);
      expect(call.reason).toBeNull();
      expect(call.contactName).toBeNull();
      expect(service.getThreats()).toEqual([]);
      expect(service.getStats()).toMatchObject({ blockedCount: 0, allowedCount: 1 });
    });

    it('allows threats while protection is off but keeps the verdict', () => {
      service.setProtection(false);
      const call = service.screenIncomingCall('+712345');

      expect(call.status).toBe(CallStatus.ALLOWED);
      expect(call.reason).toBe(BlockReason.SHORT_NUMBER);
      expect(service.getThreats()).toEqual([]);
      expect(service.getStats().blockedCount).toBe(0);
    });

    it('applies a per-call mode override without changing the setting', () => {
      const call = service.screenIncomingCall('+79161234567', { mode: AnalysisMode.AGGRESSIVE });

      expect(call.status).toBe(CallStatus.BLOCKED);
      expect(call.mode).toBe(AnalysisMode.AGGRESSIVE);
      expect(service.getSettings().mode).toBe(AnalysisMode.SMART);
    });

    it('keeps the newest calls first and caps history and threats', () => {
      for (let i = 0; i < 12; i++) service.screenIncomingCall('+712345');

      const calls = service.getRecentCalls();
      expect(calls).toHaveLength(10);
      expect(calls[0].id).toBe(12);
      expect(calls[9].id).toBe(3);

      const threats = service.getThreats();
      expect(threats).toHaveLength(5);
      expect(threats[0].id).toBe(12);
      expect(service.getStats().blockedCount).toBe(12);
    });

    it('counts blocked calls by threat type', () => {
      service.screenIncomingCall('+712345');
      service.screenIncomingCall('unknown');
      service.screenIncomingCall('+79031112233');
      service.screenIncomingCall('+79017778899');

      expect(service.getStats().threatsByType).toEqual({
        [ThreatType.SPAM]: 0,
        [ThreatType.FRAUD]: 1,
        [ThreatType.SUSPICIOUS_PATTERN]: 0,
        [ThreatType.BLACKLIST]: 2,
        [ThreatType.INTERNATIONAL]: 0,
        [ThreatType.ANONYMOUS]: 1,
      });
    });

    it('returns copies of the call log', () => {
      service.screenIncomingCall('+712345');
      service.getRecentCalls().pop();
      expect(service.getRecentCalls()).toHaveLength(1);
    });
  });

  describe('settings', () => {
    it('toggles protection', () => {
      expect(service.toggleProtection()).toEqual({ protectionActive: false, mode: AnalysisMode.SMART });
      expect(service.toggleProtection()).toEqual({ protectionActive: true, mode: AnalysisMode.SMART });
    });

    it('updates mode and protection together', () => {
      expect(
        service.updateSettings({ mode: AnalysisMode.PERMISSIVE, protectionActive: false }),
      ).toEqual({ protectionActive: false, mode: AnalysisMode.PERMISSIVE });
    });

    it('classifies with the newly selected mode', () => {
      service.setMode(AnalysisMode.PERMISSIVE);
      expect(service.classify('+74951230000').blocked).toBe(false);
    });
  });

  describe('reset', () => {
    it('restores configured defaults', () => {
      service.setMode(AnalysisMode.AGGRESSIVE);
      service.setProtection(false);
      service.screenIncomingCall('+712345');

      expect(service.reset()).toEqual({
        protectionActive: true,
        mode: AnalysisMode.SMART,
        blockedCount: 0,
        allowedCount: 0,
        totalScreened: 0,
        threatsByType: {
          [ThreatType.SPAM]: 0,
          [ThreatType.FRAUD]: 0,
          [ThreatType.SUSPICIOUS_PATTERN]: 0,
          [ThreatType.BLACKLIST]: 0,
          [ThreatType.INTERNATIONAL]: 0,
          [ThreatType.ANONYMOUS]: 0,
        },
      });
      expect(service.getRecentCalls()).toEqual([]);
    });
  });

  describe('configuration', () => {
    it('starts from configured mode, protection and blocked count', async () => {
      const configured = await createService({
        defaultMode: 'AGGRESSIVE',
        protectionActive: false,
        initialBlockedCount: 127,
      });

      expect(configured.getStats()).toMatchObject({
        mode: AnalysisMode.AGGRESSIVE,
        protectionActive: false,
        blockedCount: 127,
        totalScreened: 0,
      });
    });

    it('falls back to SMART for an unknown mode', async () => {
      const configured = await createService({ defaultMode: 'PARANOID' });
      expect(configured.getSettings().mode).toBe(AnalysisMode.SMART);
    });

    it('honours a smaller history limit', async () => {
      const configured = await createService({ historyLimit: 2 });
      configured.screenIncomingCall('+712345');
      configured.screenIncomingCall('+712345');
      configured.screenIncomingCall('+712345');
      expect(configured.getRecentCalls().map((c) => c.id)).toEqual([3, 2]);
    });
  });
});
