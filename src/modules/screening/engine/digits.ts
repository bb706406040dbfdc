/**
 * Digit scanners
 *
 * Linear scans over the digit-only projection of a phone number. Every
 * check looks for a run anywhere inside the digits, not a whole-string
 * match.
 */

export function extractDigits(raw: string): string {
  let digits = '';
  for (const ch of raw) {
    if (ch >= '0' && ch <= '9') digits += ch;
  }
  return digits;
}

/** True if one digit repeats at least `minRun` times in a row. */
export function hasRepeatedDigitRun(digits: string, minRun: number): boolean {
  if (digits.length === 0) return false;
  let run = 1;
  if (run >= minRun) return true;
  for (let i = 1; i < digits.length; i++) {
    run = digits[i] === digits[i - 1] ? run + 1 : 1;
    if (run >= minRun) return true;
  }
  return false;
}

/**
 * True if some two-digit group occurs at least `minRepeats` times back to
 * back ("454545 45" for 4). A group repeated n times spans 2n digits in
 * which every digit equals the one two places before it, so we only track
 * how long that condition has held.
 */
export function hasRepeatedPairRun(digits: string, minRepeats: number): boolean {
  const needed = 2 * (minRepeats - 1);
  if (digits.length < 2 * minRepeats) return false;
  let span = 0;
  for (let i = 2; i < digits.length; i++) {
    span = digits[i] === digits[i - 2] ? span + 1 : 0;
    if (span >= needed) return true;
  }
  return false;
}

/**
 * True if the digits contain a strictly ascending (+1) or strictly
 * descending (-1) run of at least `minRun` digits. 9 → 0 does not wrap.
 */
export function hasSequentialRun(digits: string, minRun: number): boolean {
  if (digits.length < minRun) return false;
  let ascending = 1;
  let descending = 1;
  for (let i = 1; i < digits.length; i++) {
    const step = digits.charCodeAt(i) - digits.charCodeAt(i - 1);
    ascending = step === 1 ? ascending + 1 : 1;
    descending = step === -1 ? descending + 1 : 1;
    if (ascending >= minRun || descending >= minRun) return true;
  }
  return false;
}
