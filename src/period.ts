/** One calendar month. `month` is 1-12. */
export interface Period {
  readonly year: number;
  readonly month: number;
}

const PERIOD_PATTERN = /^(\d{4})-(\d{2})$/;

export function makePeriod(year: number, month: number): Period {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new RangeError(`Invalid period year: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid period month: ${month}`);
  }
  return { year, month };
}

/** Parse "YYYY-MM". */
export function parsePeriod(text: string): Period {
  const match = PERIOD_PATTERN.exec(text.trim());
  if (!match) throw new RangeError(`Invalid period: "${text}" (expected YYYY-MM)`);
  return makePeriod(Number(match[1]), Number(match[2]));
}

export function formatPeriod(period: Period): string {
  return `${String(period.year).padStart(4, "0")}-${String(period.month).padStart(2, "0")}`;
}

export function comparePeriods(a: Period, b: Period): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1;
  if (a.month !== b.month) return a.month < b.month ? -1 : 1;
  return 0;
}

export function nextPeriod(period: Period): Period {
  if (period.month === 12) return makePeriod(period.year + 1, 1);
  return makePeriod(period.year, period.month + 1);
}

/** Signed number of months from `a` to `b`. */
export function monthsBetween(a: Period, b: Period): number {
  return (b.year - a.year) * 12 + (b.month - a.month);
}

/**
 * Periods strictly after `last`, up to and including `through`, oldest first.
 * Empty when `through` is not after `last`.
 */
export function periodsAfter(last: Period, through: Period): Period[] {
  const out: Period[] = [];
  let cursor = last;
  while (comparePeriods(cursor, through) < 0) {
    cursor = nextPeriod(cursor);
    out.push(cursor);
  }
  return out;
}
