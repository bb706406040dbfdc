import { parseIntAtLeast, parseIntOr, parseList } from './env';

describe('parseIntOr', () => {
  it('parses integers', () => {
    expect(parseIntOr('25', 10)).toBe(25);
  });

  it('falls back on missing, blank or junk values', () => {
    expect(parseIntOr(undefined, 10)).toBe(10);
    expect(parseIntOr('  ', 10)).toBe(10);
    expect(parseIntOr('ten', 10)).toBe(10);
  });
});

describe('parseList', () => {
  it('splits and trims comma-separated values', () => {
    expect(parseList(' +712345, +79031112233 ,,')).toEqual(['+712345', '+79031112233']);
  });

  it('returns null when unset', () => {
    expect(parseList(undefined)).toBeNull();
  });

  it('returns an empty list for an empty value', () => {
    expect(parseList('')).toEqual([]);
  });
});

describe('parseIntAtLeast', () => {
  it('keeps values at or above the minimum', () => {
    expect(parseIntAtLeast('1', 10, 1)).toBe(1);
    expect(parseIntAtLeast('25', 10, 1)).toBe(25);
  });

  it('falls back below the minimum', () => {
    expect(parseIntAtLeast('-1', 10, 1)).toBe(10);
    expect(parseIntAtLeast('0', 10, 1)).toBe(10);
  });
});
