import { InvalidAmountError } from "./errors";

/** Integer count of minor units (cents). */
export type Cents = number;

const AMOUNT_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;
// Commas are only thousands separators: "1,234.5" but not "1,5".
const GROUPED_PATTERN = /^[+-]?\d{1,3}(?:,\d{3})+(?:\.\d*)?$/;

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Parse a user-supplied decimal amount into cents, rounding half-up (ties
 * away from zero) to two places. Accepts "$1,234.567", "-5", "12.", ".5".
 */
export function parseAmount(raw: string | number): Cents {
  let text = String(raw).trim().replace(/^([+-]?)\$/, "$1");
  if (text.includes(",")) {
    if (!GROUPED_PATTERN.test(text)) throw new InvalidAmountError("Amount must be a number.");
    text = text.replace(/,/g, "");
  }
  const match = AMOUNT_PATTERN.exec(text);
  if (!match) throw new InvalidAmountError("Amount must be a number.");

  const [, sign, whole = "", fraction = ""] = match;
  if (whole.length === 0 && fraction.length === 0) throw new InvalidAmountError("Amount must be a number.");
  const padded = fraction.padEnd(3, "0");
  let cents = Number(whole) * 100 + Number(padded.slice(0, 2));
  if (Number(padded[2]) >= 5) cents += 1;
  if (sign === "-" && cents !== 0) cents = -cents;

  if (!Number.isSafeInteger(cents)) throw new InvalidAmountError("Amount must be a number.");
  return cents;
}

/** True for a strictly positive whole number of cents. */
export function isValidAmount(amount: Cents): boolean {
  return Number.isSafeInteger(amount) && amount > 0;
}

export function addCents(a: Cents, b: Cents): Cents {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) throw new RangeError(`Amount out of range: ${a} + ${b}`);
  return sum;
}

export function subtractCents(a: Cents, b: Cents): Cents {
  const diff = a - b;
  if (!Number.isSafeInteger(diff)) throw new RangeError(`Amount out of range: ${a} - ${b}`);
  return diff;
}

/** Exact decimal rendering, e.g. 1234 -> "12.34", -5 -> "-0.05". */
export function formatAmount(cents: Cents): string {
  const abs = Math.abs(cents);
  const whole = Math.trunc(abs / 100);
  const fraction = String(abs % 100).padStart(2, "0");
  return `${cents < 0 ? "-" : ""}${whole}.${fraction}`;
}

export function formatUSD(cents: Cents): string {
  return usd.format(cents / 100);
}
