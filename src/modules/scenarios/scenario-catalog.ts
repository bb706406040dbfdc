import { BlockReason } from '../screening/engine';
import type { TestScenario } from './scenarios.types';

export const SCENARIO_CATEGORIES = [
  'Normal',
  'Obvious spam',
  'Suspicious',
  'Known spam',
  'Anonymous',
  'International',
  'Pattern',
  'Mass dialing',
] as const;

export type ScenarioCategory = (typeof SCENARIO_CATEGORIES)[number];

// Scripted calls replayed by the scenario runner. `expectedReason: null`
// means the call is expected to go through.
export const SCENARIO_CATALOG: readonly TestScenario[] = [
  { id: 1, phoneNumber: '+79161234567', description: 'Personal number', category: 'Normal', expectedReason: null, details: 'Regular mobile number', difficulty: 1 },
  { id: 2, phoneNumber: '+74957775533', description: 'City landline', category: 'Normal', expectedReason: null, details: 'Moscow landline', difficulty: 1 },
  { id: 3, phoneNumber: '+78002000600', description: 'Support line', category: 'Normal', expectedReason: null, details: 'Toll-free number', difficulty: 1 },
  { id: 4, phoneNumber: '+74952123456', description: 'Business number', category: 'Normal', expectedReason: null, details: 'Corporate number', difficulty: 1 },

  { id: 5, phoneNumber: '+79991111111', description: 'Repeated ones', category: 'Obvious spam', expectedReason: BlockReason.REPEATING_DIGITS, details: 'Seven ones in a row', difficulty: 1 },
  { id: 6, phoneNumber: '+72222222222', description: 'Repeated twos', category: 'Obvious spam', expectedReason: BlockReason.REPEATING_DIGITS, details: 'Nothing but twos', difficulty: 1 },
  { id: 7, phoneNumber: '+712345', description: 'Short number', category: 'Obvious spam', expectedReason: BlockReason.SHORT_NUMBER, details: 'Only six digits', difficulty: 1 },
  { id: 8, phoneNumber: '+74951230000', description: 'Zero pattern', category: 'Obvious spam', expectedReason: BlockReason.SUSPICIOUS_PATTERN, details: 'Ends in 0000', difficulty: 1 },

  { id: 9, phoneNumber: '+74950000000', description: 'Many zeros', category: 'Suspicious', expectedReason: BlockReason.SUSPICIOUS_PATTERN, details: '0000 pattern', difficulty: 2 },
  { id: 10, phoneNumber: '+79161111111', description: 'Many ones', category: 'Suspicious', expectedReason: BlockReason.SUSPICIOUS_PATTERN, details: '1111 pattern', difficulty: 2 },
  { id: 11, phoneNumber: '+79039999999', description: 'Many nines', category: 'Suspicious', expectedReason: BlockReason.SUSPICIOUS_PATTERN, details: '999 pattern', difficulty: 2 },
  { id: 12, phoneNumber: '+79034445566', description: 'Repeated pairs', category: 'Suspicious', expectedReason: BlockReason.SUSPICIOUS_PATTERN, details: 'Digit pairs repeating', difficulty: 2 },

  { id: 13, phoneNumber: '+79031112233', description: 'Blacklisted', category: 'Known spam', expectedReason: BlockReason.KNOWN_SPAM, details: 'On the spam list', difficulty: 2 },
  { id: 14, phoneNumber: '+79051111111', description: 'Bulk sender', category: 'Known spam', expectedReason: BlockReason.KNOWN_SPAM, details: 'Mass messaging source', difficulty: 2 },
  { id: 15, phoneNumber: '+79025556677', description: 'Advertising', category: 'Known spam', expectedReason: BlockReason.KNOWN_SPAM, details: 'Promotional calls', difficulty: 2 },

  { id: 16, phoneNumber: 'unknown', description: 'Hidden number', category: 'Anonymous', expectedReason: BlockReason.PRIVATE_NUMBER, details: 'Caller ID withheld', difficulty: 3 },
  { id: 17, phoneNumber: '#31#+79161234567', description: 'Hidden call', category: 'Anonymous', expectedReason: BlockReason.PRIVATE_NUMBER, details: 'Dialled with #31#', difficulty: 3 },

  { id: 18, phoneNumber: '+15551234567', description: 'US number', category: 'International', expectedReason: null, details: 'Number from the USA', difficulty: 2 },
  { id: 19, phoneNumber: '+15555555555', description: 'Suspicious US', category: 'International', expectedReason: BlockReason.INTERNATIONAL_SCAM, details: 'Suspicious American number', difficulty: 2 },
  { id: 20, phoneNumber: '+441234567890', description: 'United Kingdom', category: 'International', expectedReason: null, details: 'Number from the UK', difficulty: 2 },

  { id: 21, phoneNumber: '+79161234567', description: 'Ascending digits', category: 'Pattern', expectedReason: BlockReason.SEQUENTIAL_NUMBER, details: 'Digits 1234567 in order', difficulty: 3 },
  { id: 22, phoneNumber: '+79169876543', description: 'Descending digits', category: 'Pattern', expectedReason: BlockReason.SEQUENTIAL_NUMBER, details: 'Digits in reverse order', difficulty: 3 },

  { id: 23, phoneNumber: '+79001234567', description: 'Mass dialing range', category: 'Mass dialing', expectedReason: BlockReason.MASS_DIALING, details: 'Range used for campaigns', difficulty: 2 },
  { id: 24, phoneNumber: '+79017778899', description: 'Call centre', category: 'Mass dialing', expectedReason: BlockReason.MASS_DIALING, details: 'Call centre number', difficulty: 2 },
];
