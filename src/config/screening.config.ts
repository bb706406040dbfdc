import { registerAs } from '@nestjs/config';
import { parseIntAtLeast, parseList } from './env';

export interface ScreeningConfig {
  defaultMode: string;
  protectionActive: boolean;
  historyLimit: number;
  threatLimit: number;
  resultLimit: number;
  initialBlockedCount: number;
  knownSpam: string[] | null; // null → built-in list
  highRisk: string[] | null;
}

export default registerAs('screening', (): ScreeningConfig => ({
  defaultMode: (process.env.SCREENING_DEFAULT_MODE || 'SMART').toUpperCase(),
  protectionActive: process.env.SCREENING_PROTECTION !== 'false', // default ON
  historyLimit: parseIntAtLeast(process.env.SCREENING_HISTORY_LIMIT, 10, 1),
  threatLimit: parseIntAtLeast(process.env.SCREENING_THREAT_LIMIT, 5, 1),
  resultLimit: parseIntAtLeast(process.env.SCREENING_RESULT_LIMIT, 15, 1),
  initialBlockedCount: parseIntAtLeast(process.env.SCREENING_INITIAL_BLOCKED, 0, 0),
  knownSpam: parseList(process.env.SCREENING_KNOWN_SPAM),
  highRisk: parseList(process.env.SCREENING_HIGH_RISK),
}));
