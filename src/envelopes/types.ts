import { z } from "zod";
import type { BudgetError } from "../errors";
import type { Cents } from "../money";
import type { Period } from "../period";

export const FundingModeSchema = z.enum(["reset", "rollover"]);

/**
 * reset: each funding overwrites the balance with the base amount.
 * rollover: each funding adds the base amount to whatever is left.
 */
export type FundingMode = z.infer<typeof FundingModeSchema>;

export interface Envelope {
  id: string;
  name: string;
  fundingMode: FundingMode;
  baseAmountCents: Cents; // >= 0
  balanceCents: Cents; // may be negative (overspent)
  lastFundedPeriod: Period | null; // null until first funded
  active: boolean;
  version: number;
  createdAtISO: string;
  updatedAtISO: string;
}

export type EnvelopeOutcome<E extends BudgetError = BudgetError> =
  | { ok: true; envelope: Envelope }
  | { ok: false; error: E };

export interface EnvelopeFilter {
  activeOnly?: boolean;
  /** Only envelopes never funded, or last funded before this period. */
  unfundedThrough?: Period;
}

export type SyncStatus = "funded" | "skipped" | "failed";

export interface EnvelopeSyncResult {
  envelopeId: string;
  name: string;
  status: SyncStatus;
  periodsFunded: number;
  fundedPeriods: string[]; // YYYY-MM, oldest first
  balanceCents: Cents;
  lastFundedPeriod: string | null;
  errorCode?: string;
  errorMessage?: string;
}

export interface SyncReport {
  currentPeriod: string;
  results: EnvelopeSyncResult[];
  funded: EnvelopeSyncResult[];
  skipped: EnvelopeSyncResult[];
  failed: EnvelopeSyncResult[];
}
