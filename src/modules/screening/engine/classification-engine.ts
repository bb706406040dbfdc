/**
 * Call Classification Engine
 *
 * classify(number, mode) → Verdict
 *
 * Pure and synchronous: the only inputs are the two arguments and the
 * reference lists captured at construction. Any string is accepted; text
 * without digits simply has an empty digit projection.
 */

import { extractDigits } from './digits';
import { DEFAULT_REFERENCE_LISTS } from './reference-lists';
import { RULE_SETS } from './rules';
import type {
  AnalysisMode,
  ReferenceLists,
  RuleInput,
  ScreeningRule,
  Verdict,
} from './types';

const ALLOW: Verdict = { blocked: false, reason: null };

export interface Evaluation {
  verdict: Verdict;
  rule: string | null;
}

export class ClassificationEngine {
  private readonly knownSpam: ReadonlySet<string>;
  private readonly highRisk: ReadonlySet<string>;

  constructor(lists: ReferenceLists = DEFAULT_REFERENCE_LISTS) {
    this.knownSpam = new Set(lists.knownSpam);
    this.highRisk = new Set(lists.highRisk);
  }

  classify(phoneNumber: string, mode: AnalysisMode): Verdict {
    return this.evaluate(phoneNumber, mode).verdict;
  }

  /** Verdict plus the name of the rule that decided it. */
  evaluate(phoneNumber: string, mode: AnalysisMode): Evaluation {
    const rule = this.match(phoneNumber, mode);
    return rule
      ? { verdict: { blocked: true, reason: rule.reason }, rule: rule.name }
      : { verdict: ALLOW, rule: null };
  }

  /** First rule of `mode` that matches, or null when the call is allowed. */
  match(phoneNumber: string, mode: AnalysisMode): ScreeningRule | null {
    const input: RuleInput = {
      raw: phoneNumber,
      digits: extractDigits(phoneNumber),
      knownSpam: this.knownSpam,
      highRisk: this.highRisk,
    };
    return RULE_SETS[mode].find((rule) => rule.test(input)) ?? null;
  }

  getListSizes(): { knownSpam: number; highRisk: number } {
    return { knownSpam: this.knownSpam.size, highRisk: this.highRisk.size };
  }
}
