/** Parse an integer env value, keeping the fallback for missing or junk input. */
export function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Comma-separated list; null when the variable is unset so callers keep defaults. */
export function parseList(value: string | undefined): string[] | null {
  if (value === undefined) return null;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Like parseIntOr, but values below `min` also fall back. */
export function parseIntAtLeast(value: string | undefined, fallback: number, min: number): number {
  const parsed = parseIntOr(value, fallback);
  return parsed < min ? fallback : parsed;
}
