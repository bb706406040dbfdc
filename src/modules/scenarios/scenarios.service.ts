import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScreeningService } from '../screening/screening.service';
import { CallStatus } from '../screening/screening.types';
import type { AnalysisMode } from '../screening/engine';
import { SCENARIO_CATALOG, SCENARIO_CATEGORIES } from './scenario-catalog';
import type {
  ScenarioFilter,
  ScenarioRunSummary,
  TestResult,
  TestScenario,
} from './scenarios.types';

@Injectable()
export class ScenariosService {
  private readonly logger = new Logger(ScenariosService.name);
  private readonly resultLimit: number;
  private results: TestResult[] = [];

  constructor(
    private readonly screeningService: ScreeningService,
    private readonly configService: ConfigService,
  ) {
    this.resultLimit = this.configService.get<number>('screening.resultLimit', 15);
  }

  list(filter: ScenarioFilter = {}): TestScenario[] {
    return SCENARIO_CATALOG.filter(
      (s) =>
        (filter.category === undefined || s.category === filter.category) &&
        (filter.difficulty === undefined || s.difficulty === filter.difficulty),
    );
  }

  categories(): string[] {
    return [...SCENARIO_CATEGORIES];
  }

  findOne(id: number): TestScenario {
    const scenario = SCENARIO_CATALOG.find((s) => s.id === id);
    if (!scenario) {
      throw new NotFoundException(`Scenario ${id} not found`);
    }
    return scenario;
  }

  /**
   * Replays one scenario as an incoming call, so it shows up in the call
   * log and threat list like any other call. Success compares the
   * block/allow action only, not the reason.
   */
  runScenario(id: number, mode?: AnalysisMode): TestResult {
    return this.run(this.findOne(id), mode);
  }

  /**
   * Runs every scenario matching `filter` in catalog order. A run without
   * a filter is a full pass and starts from an empty result log.
   */
  runMany(filter: ScenarioFilter = {}, mode?: AnalysisMode): ScenarioRunSummary {
    const scenarios = this.list(filter);
    if (filter.category === undefined && filter.difficulty === undefined) {
      this.results = [];
    }

    const results = scenarios.map((s) => this.run(s, mode));
    const passed = results.filter((r) => r.success).length;

    this.logger.log(
      `Scenario run (${this.describeFilter(filter)}): ${passed}/${results.length} passed`,
    );
    return { results, passed, failed: results.length - passed, total: results.length };
  }

  getResults(): TestResult[] {
    return [...this.results];
  }

  clearResults(): void {
    this.results = [];
  }

  // ── Internal ──────────────────────────────────────────────────────

  private run(scenario: TestScenario, mode?: AnalysisMode): TestResult {
    const { protectionActive } = this.screeningService.getSettings();
    const call = this.screeningService.screenIncomingCall(scenario.phoneNumber, {
      contactName: scenario.description,
      mode,
    });

    const blocked = call.status === CallStatus.BLOCKED;
    const flagged = call.reason !== null;
    const expectBlock = scenario.expectedReason !== null;

    let success: boolean;
    if (!protectionActive) success = !blocked;
    else if (expectBlock) success = flagged && blocked;
    else success = !flagged && !blocked;

    const result: TestResult = {
      scenarioId: scenario.id,
      phoneNumber: scenario.phoneNumber,
      description: scenario.description,
      category: scenario.category,
      mode: call.mode,
      expectedAction: expectBlock ? 'BLOCK' : 'ALLOW',
      actualAction: blocked ? 'BLOCKED' : 'ALLOWED',
      success,
      reason: call.reason,
      details: scenario.details,
      timestamp: call.timestamp,
    };

    this.results = [result, ...this.results].slice(0, this.resultLimit);
    this.logger.debug(
      `Scenario #${scenario.id} ${scenario.phoneNumber}: ${result.actualAction} (${success ? 'pass' : 'fail'})`,
    );
    return result;
  }

  private describeFilter(filter: ScenarioFilter): string {
    const parts: string[] = [];
    if (filter.category !== undefined) parts.push(`category=${filter.category}`);
    if (filter.difficulty !== undefined) parts.push(`difficulty=${filter.difficulty}`);
    return parts.length > 0 ? parts.join(', ') : 'all';
  }
}
