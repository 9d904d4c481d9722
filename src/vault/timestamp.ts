/**
 * Timestamp parsing for provider exports.
 *
 * Exports use epoch seconds, epoch milliseconds, Chromium-style epoch
 * microseconds or ISO-8601 strings. Each parser either claims the value or
 * passes; the first claim wins. Internally every timestamp is epoch
 * milliseconds and `undefined` means "unknown", which sorts as the oldest time.
 */

export type TimestampParser = (value: string) => number | undefined;

const FRACTIONAL_SECONDS_RE = /^(\d{1,11})(?:\.(\d+))?$/;
const DIGITS_RE = /^\d+$/;
const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

export const parseEpochSeconds: TimestampParser = (value) => {
  const match = FRACTIONAL_SECONDS_RE.exec(value);
  if (!match) return undefined;
  return Math.round(Number(value) * 1000);
};

export const parseEpochMillis: TimestampParser = (value) => {
  if (!DIGITS_RE.test(value) || value.length < 12 || value.length > 14) return undefined;
  return Number(value);
};

export const parseEpochMicros: TimestampParser = (value) => {
  if (!DIGITS_RE.test(value) || value.length < 15 || value.length > 17) return undefined;
  return Math.floor(Number(value) / 1000);
};

export const parseIsoDateTime: TimestampParser = (value) => {
  const match = ISO_RE.exec(value);
  if (!match) return undefined;
  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', zone] = match;

  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo) || h > 23 || mi > 59 || s > 59) {
    return undefined;
  }

  const millis = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0;
  const utc = Date.UTC(y, mo - 1, d, h, mi, s, millis);
  return utc - offsetMinutes(zone) * 60_000;
};

/** Ordered parser chain used by `parseTimestamp`. */
export const TIMESTAMP_PARSERS: readonly TimestampParser[] = [
  parseEpochSeconds,
  parseEpochMillis,
  parseEpochMicros,
  parseIsoDateTime,
];

export function parseTimestamp(
  value: string | number | null | undefined,
  parsers: readonly TimestampParser[] = TIMESTAMP_PARSERS,
): number | undefined {
  if (value === null || value === undefined) return undefined;
  const text = String(value).trim();
  if (!text) return undefined;
  for (const parse of parsers) {
    const result = parse(text);
    if (result !== undefined && Number.isFinite(result)) return result;
  }
  return undefined;
}

/** Ordering helper: unknown timestamps compare as the oldest time. */
export function timestampOrder(value: number | undefined): number {
  return value ?? Number.NEGATIVE_INFINITY;
}

export function formatTimestamp(epochMs: number | undefined): string {
  if (epochMs === undefined) return '(unknown)';
  const iso = new Date(epochMs).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}
