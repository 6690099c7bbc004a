/**
 * Time value helpers. Times are plain numbers of seconds.
 */

/**
 * Render a time value as seconds with millisecond precision, e.g. 2.5 -> "2.500".
 *
 * Exact halfway values round to the even millisecond ("0.0625" -> "0.062").
 * Only odd multiples of 1/16 are exact ties in binary.
 */
export function timeToSsmmm(seconds: number): string {
  const sixteenths = seconds * 16;
  if (!Number.isInteger(sixteenths) || sixteenths % 2 === 0) {
    return seconds.toFixed(3);
  }

  const lower = Math.floor(Math.abs(seconds) * 1000);
  const milliseconds = lower % 2 === 0 ? lower : lower + 1;
  return `${seconds < 0 ? '-' : ''}${(milliseconds / 1000).toFixed(3)}`;
}

/**
 * Parse a time value given as a number or as a numeric string ("1.250", "3").
 * Returns null when the value is not a finite number.
 */
export function parseTimeValue(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const seconds = Number(trimmed);
  return Number.isFinite(seconds) ? seconds : null;
}
