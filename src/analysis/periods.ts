// ── Periods ─────────────────────────────────────────────────────────
// Calendar-month buckets. All bucketing happens in UTC.

export interface Period {
  year: number;
  month: number; // 1-12
}

export interface BucketedTimestamp {
  period: Period;
  /** True when the timestamp could not be read and "now" was used instead */
  substituted: boolean;
}

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parse an ISO-8601-like date or date-time.
 *
 * Values without an offset are read as UTC. Returns `null` for anything
 * that is not a real calendar instant.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const ms = frac ? Math.round(Number(frac) * 1000) : 0;
  const instant = utcInstant(year, month, day, hour, minute, second, ms);

  // Reject rollovers such as 2025-02-30
  if (
    instant.getUTCFullYear() !== year ||
    instant.getUTCMonth() !== month - 1 ||
    instant.getUTCDate() !== day
  ) {
    return null;
  }

  let time = instant.getTime();

  if (offset && offset.toUpperCase() !== "Z") {
    const sign = offset.startsWith("-") ? -1 : 1;
    const digits = offset.slice(1).replace(":", "");
    const offHours = Number(digits.slice(0, 2));
    const offMinutes = Number(digits.slice(2, 4));
    if (offHours > 23 || offMinutes > 59) return null;
    time -= sign * (offHours * 60 + offMinutes) * 60_000;
  }

  const parsed = new Date(time);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not.
function utcInstant(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  ms: number,
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, ms);
  return date;
}

/**
 * Map a timestamp to its calendar month. Unreadable timestamps fall back
 * to the month of `now` and are flagged as substituted.
 */
export function periodOf(
  timestamp: string | null | undefined,
  now: Date = new Date(),
): BucketedTimestamp {
  const parsed = parseTimestamp(timestamp);
  const instant = parsed ?? now;
  return {
    period: { year: instant.getUTCFullYear(), month: instant.getUTCMonth() + 1 },
    substituted: parsed === null,
  };
}

export function periodKey(p: Period): string {
  return `${String(p.year).padStart(4, "0")}-${String(p.month).padStart(2, "0")}`;
}

export function parsePeriodKey(key: string): Period | null {
  const match = /^(\d{4})-(\d{2})$/.exec(key);
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return { year: Number(match[1]), month };
}

export function comparePeriods(a: Period, b: Period): number {
  return a.year - b.year || a.month - b.month;
}

export function nextPeriod(p: Period): Period {
  return p.month === 12
    ? { year: p.year + 1, month: 1 }
    : { year: p.year, month: p.month + 1 };
}

/**
 * Zero-fill the months missing between the first and last point of a
 * series sorted by `period` ("YYYY-MM").
 */
export function densifyPeriods<T extends { period: string }>(
  points: readonly T[],
  fill: (period: string) => T,
): T[] {
  if (points.length === 0) return [];

  const first = parsePeriodKey(points[0]!.period);
  const last = parsePeriodKey(points[points.length - 1]!.period);
  if (!first || !last) return [...points];

  const byKey = new Map(points.map((p): [string, T] => [p.period, p]));
  const out: T[] = [];
  for (let p = first; comparePeriods(p, last) <= 0; p = nextPeriod(p)) {
    const key = periodKey(p);
    out.push(byKey.get(key) ?? fill(key));
  }
  return out;
}
