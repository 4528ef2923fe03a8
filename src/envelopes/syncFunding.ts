import type { Clock } from "../clock";
import { BudgetError } from "../errors";
import { formatPeriod, periodsAfter, type Period } from "../period";
import type { EnvelopeStore } from "../storage/envelopeStore";
import { applyFunding } from "./operations";
import type { Envelope, EnvelopeOutcome, EnvelopeSyncResult, SyncReport } from "./types";

export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Periods the envelope still needs funding for, oldest first. A never-funded
 * envelope gets exactly the current period.
 */
export function planFunding(envelope: Envelope, current: Period): Period[] {
  if (!envelope.lastFundedPeriod) return [current];
  return periodsAfter(envelope.lastFundedPeriod, current);
}

/** Apply one funding event per period, in order, stopping at the first error. */
export function catchUp(envelope: Envelope, periods: readonly Period[]): EnvelopeOutcome {
  let next = envelope;
  for (const period of periods) {
    const outcome = applyFunding(next, period);
    if (!outcome.ok) return outcome;
    next = outcome.envelope;
  }
  return { ok: true, envelope: next };
}

function errorCodeFor(error: unknown): string {
  if (error instanceof BudgetError) return error.code;
  // Cent arithmetic left the safe integer range while catching up.
  if (error instanceof RangeError) return "INVALID_AMOUNT";
  return "PERSISTENCE_FAILURE";
}

function resultFor(
  envelope: Envelope,
  status: EnvelopeSyncResult["status"],
  fundedPeriods: string[],
  error?: unknown
): EnvelopeSyncResult {
  const result: EnvelopeSyncResult = {
    envelopeId: envelope.id,
    name: envelope.name,
    status,
    periodsFunded: fundedPeriods.length,
    fundedPeriods,
    balanceCents: envelope.balanceCents,
    lastFundedPeriod: envelope.lastFundedPeriod ? formatPeriod(envelope.lastFundedPeriod) : null,
  };
  if (error !== undefined) {
    result.errorCode = errorCodeFor(error);
    result.errorMessage = error instanceof Error ? error.message : String(error);
  }
  return result;
}

/**
 * Bring every active envelope up to the clock's current period.
 *
 * Each envelope is loaded, caught up in memory, and committed once against the
 * version it was loaded at. A failure on one envelope is logged and reported;
 * the rest are still processed. Failing to list envelopes aborts the run.
 */
export async function syncFunding(opts: {
  store: EnvelopeStore;
  clock: Clock;
  logger?: Logger;
}): Promise<SyncReport> {
  const { store, clock, logger = console } = opts;
  const current = clock.currentPeriod();
  const currentLabel = formatPeriod(current);

  const envelopes = await store.listEnvelopes({ activeOnly: true });
  const results: EnvelopeSyncResult[] = [];

  for (const envelope of envelopes) {
    const periods = planFunding(envelope, current);
    if (periods.length === 0) {
      results.push(resultFor(envelope, "skipped", []));
      continue;
    }

    try {
      const outcome = catchUp(envelope, periods);
      if (!outcome.ok) throw outcome.error;
      const stored = await store.commitEnvelope(outcome.envelope, envelope.version);
      results.push(resultFor(stored, "funded", periods.map(formatPeriod)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`[sync ${currentLabel}] ${envelope.name} (${envelope.id}): ${message}`);
      results.push(resultFor(envelope, "failed", [], err));
    }
  }

  return {
    currentPeriod: currentLabel,
    results,
    funded: results.filter((r) => r.status === "funded"),
    skipped: results.filter((r) => r.status === "skipped"),
    failed: results.filter((r) => r.status === "failed"),
  };
}
