import type { Envelope } from "./envelopes/types";
import type { Logger } from "./envelopes/syncFunding";
import { parsePeriod } from "./period";

export function makeEnvelope(
  overrides: Partial<Omit<Envelope, "lastFundedPeriod">> & { lastFundedPeriod?: string | null } = {}
): Envelope {
  const { lastFundedPeriod = null, ...rest } = overrides;
  return {
    id: "env-1",
    name: "Dining",
    fundingMode: "reset",
    baseAmountCents: 5000,
    balanceCents: 5000,
    active: true,
    version: 0,
    createdAtISO: "2024-01-01T00:00:00.000Z",
    updatedAtISO: "2024-01-01T00:00:00.000Z",
    ...rest,
    lastFundedPeriod: lastFundedPeriod === null ? null : parsePeriod(lastFundedPeriod),
  };
}

export function captureLogger() {
  const lines: { log: string[]; warn: string[]; error: string[] } = { log: [], warn: [], error: [] };
  const logger: Logger = {
    log: (...args: unknown[]) => lines.log.push(args.map(String).join(" ")),
    warn: (...args: unknown[]) => lines.warn.push(args.map(String).join(" ")),
    error: (...args: unknown[]) => lines.error.push(args.map(String).join(" ")),
  };
  return { lines, logger };
}
