import { makePeriod, parsePeriod, type Period } from "./period";

/** Source of the present calendar period. Injected wherever funding needs "now". */
export interface Clock {
  currentPeriod(): Period;
}

export function periodOfDate(date: Date, timeZone = "UTC"): Period {
  const parts = new Intl.DateTimeFormat("en-US", { timeZone, year: "numeric", month: "numeric" }).formatToParts(date);
  const year = parts.find((p) => p.type === "year")?.value;
  const month = parts.find((p) => p.type === "month")?.value;
  if (!year || !month) throw new Error(`Unable to resolve period for ${date.toISOString()} in ${timeZone}`);
  return makePeriod(Number(year), Number(month));
}

export function systemClock(timeZone = "UTC"): Clock {
  return { currentPeriod: () => periodOfDate(new Date(), timeZone) };
}

export function fixedClock(period: Period | string): Clock {
  const fixed = typeof period === "string" ? parsePeriod(period) : period;
  return { currentPeriod: () => fixed };
}
