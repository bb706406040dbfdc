import type { AnalysisMode, BlockReason } from '../screening/engine';
import type { ScenarioCategory } from './scenario-catalog';

export type ExpectedAction = 'BLOCK' | 'ALLOW';
export type ActualAction = 'BLOCKED' | 'ALLOWED';

export interface TestScenario {
  id: number;
  phoneNumber: string;
  description: string;
  category: ScenarioCategory;
  expectedReason: BlockReason | null;
  details: string;
  difficulty: number; // 1 easy, 2 medium, 3 hard
}

export interface ScenarioFilter {
  category?: string;
  difficulty?: number;
}

export interface TestResult {
  scenarioId: number;
  phoneNumber: string;
  description: string;
  category: string;
  mode: AnalysisMode;
  expectedAction: ExpectedAction;
  actualAction: ActualAction;
  success: boolean;
  reason: BlockReason | null;
  details: string;
  timestamp: number;
}

export interface ScenarioRunSummary {
  results: TestResult[];
  passed: number;
  failed: number;
  total: number;
}
