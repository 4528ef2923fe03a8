import { randomUUID } from "node:crypto";
import { z } from "zod";
import { InvalidAmountError, InvalidEnvelopeError, OutOfOrderFundingError } from "../errors";
import { addCents, isValidAmount, parseAmount, subtractCents, type Cents } from "../money";
import { comparePeriods, formatPeriod, type Period } from "../period";
import type { Envelope, EnvelopeOutcome } from "./types";

function nowISO() {
  return new Date().toISOString();
}

const EnvelopeCreateSchema = z.object({
  name: z
    .string({ required_error: "Envelope name is required." })
    .trim()
    .min(1, "Envelope name is required.")
    .max(120, "Envelope name must be at most 120 characters."),
  baseAmount: z
    .union([z.string(), z.number()], { errorMap: () => ({ message: "Base amount must be a number." }) })
    .transform((raw, ctx) => {
      let cents: Cents;
      try {
        cents = parseAmount(raw);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
        return z.NEVER;
      }
      if (cents < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Base amount must not be negative." });
        return z.NEVER;
      }
      return cents;
    }),
  mode: z.enum(["reset", "rollover"], { errorMap: () => ({ message: "Envelope mode must be reset or rollover." }) }),
});

/** Raw creation input, as typed by a user or read from a seed file. */
export interface EnvelopeCreate {
  name: string;
  baseAmount: string | number;
  mode: string;
}

/**
 * Build a new, never-funded envelope. The balance starts at zero; the first
 * funding sync funds it for the period it exists in.
 */
export function createEnvelope(input: EnvelopeCreate, opts: { id?: string } = {}): Envelope {
  const result = EnvelopeCreateSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidEnvelopeError(
      result.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    );
  }
  const createdAtISO = nowISO();
  return {
    id: opts.id ?? randomUUID(),
    name: result.data.name,
    fundingMode: result.data.mode,
    baseAmountCents: result.data.baseAmount,
    balanceCents: 0,
    lastFundedPeriod: null,
    active: true,
    version: 0,
    createdAtISO,
    updatedAtISO: createdAtISO,
  };
}

function checkAmount(amount: Cents, verb: "Spend" | "Deposit"): InvalidAmountError | null {
  if (!Number.isSafeInteger(amount)) {
    return new InvalidAmountError(`${verb} amount must be a whole number of cents.`);
  }
  if (!isValidAmount(amount)) return new InvalidAmountError(`${verb} amount must be positive.`);
  return null;
}

/** Draw down the balance. Overspending is allowed and shows up as a negative balance. */
export function spend(envelope: Envelope, amount: Cents): EnvelopeOutcome<InvalidAmountError> {
  const invalid = checkAmount(amount, "Spend");
  if (invalid) return { ok: false, error: invalid };
  try {
    return { ok: true, envelope: { ...envelope, balanceCents: subtractCents(envelope.balanceCents, amount) } };
  } catch (err) {
    if (err instanceof RangeError) return { ok: false, error: new InvalidAmountError(err.message) };
    throw err;
  }
}

export function deposit(envelope: Envelope, amount: Cents): EnvelopeOutcome<InvalidAmountError> {
  const invalid = checkAmount(amount, "Deposit");
  if (invalid) return { ok: false, error: invalid };
  try {
    return { ok: true, envelope: { ...envelope, balanceCents: addCents(envelope.balanceCents, amount) } };
  } catch (err) {
    if (err instanceof RangeError) return { ok: false, error: new InvalidAmountError(err.message) };
    throw err;
  }
}

/**
 * Fund the envelope for one period. `period` must be strictly after
 * `lastFundedPeriod`; anything else is rejected and the envelope is returned
 * untouched.
 */
export function applyFunding(envelope: Envelope, period: Period): EnvelopeOutcome<OutOfOrderFundingError> {
  const last = envelope.lastFundedPeriod;
  if (last && comparePeriods(period, last) <= 0) {
    return {
      ok: false,
      error: new OutOfOrderFundingError(envelope.id, formatPeriod(period), formatPeriod(last)),
    };
  }

  return {
    ok: true,
    envelope: { ...envelope, balanceCents: fundedBalance(envelope), lastFundedPeriod: period },
  };
}

function fundedBalance(envelope: Envelope): Cents {
  switch (envelope.fundingMode) {
    case "reset":
      return envelope.baseAmountCents;
    case "rollover":
      return addCents(envelope.balanceCents, envelope.baseAmountCents);
    default: {
      const unknownMode: never = envelope.fundingMode;
      throw new Error(`Unknown funding mode: ${String(unknownMode)}`);
    }
  }
}
