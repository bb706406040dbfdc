import type { ReferenceLists } from './types';

export const DEFAULT_KNOWN_SPAM: readonly string[] = [
  '+79991111111',
  '+79031112233',
  '+79051111111',
  '+79998887766',
  '+74951230000',
  '+79001234567',
  '+79069876543',
  '+79025556677',
  '+79034445566',
  '+79017778899',
];

export const DEFAULT_HIGH_RISK: readonly string[] = [
  '+79991111111',
  '+712345',
  '+79031112233',
];

export const DEFAULT_REFERENCE_LISTS: ReferenceLists = {
  knownSpam: DEFAULT_KNOWN_SPAM,
  highRisk: DEFAULT_HIGH_RISK,
};
