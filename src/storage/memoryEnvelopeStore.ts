import { EnvelopeNotFoundError, StaleEnvelopeError } from "../errors";
import { comparePeriods } from "../period";
import type { Envelope, EnvelopeFilter } from "../envelopes/types";
import type { EnvelopeStore } from "./envelopeStore";

function nowISO() {
  return new Date().toISOString();
}

// Code-unit order, as SQLite's BINARY collation sorts ASCII names.
function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** In-process store. State is lost when the process exits. */
export class MemoryEnvelopeStore implements EnvelopeStore {
  private readonly envelopesById = new Map<string, Envelope>();

  constructor(seed: readonly Envelope[] = []) {
    for (const envelope of seed) this.envelopesById.set(envelope.id, { ...envelope });
  }

  async listEnvelopes(filter: EnvelopeFilter = {}): Promise<Envelope[]> {
    const { activeOnly = false, unfundedThrough } = filter;
    return Array.from(this.envelopesById.values())
      .filter((e) => !activeOnly || e.active)
      .filter(
        (e) => !unfundedThrough || !e.lastFundedPeriod || comparePeriods(e.lastFundedPeriod, unfundedThrough) < 0
      )
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.id, b.id))
      .map((e) => ({ ...e }));
  }

  async getEnvelope(id: string): Promise<Envelope | null> {
    const envelope = this.envelopesById.get(id);
    return envelope ? { ...envelope } : null;
  }

  async insertEnvelope(envelope: Envelope): Promise<void> {
    if (this.envelopesById.has(envelope.id)) throw new Error(`Envelope already exists: ${envelope.id}`);
    this.envelopesById.set(envelope.id, { ...envelope });
  }

  async commitEnvelope(next: Envelope, expectedVersion: number): Promise<Envelope> {
    const current = this.envelopesById.get(next.id);
    if (!current) throw new EnvelopeNotFoundError(next.id);
    if (current.version !== expectedVersion) throw new StaleEnvelopeError(next.id, expectedVersion);

    const stored: Envelope = {
      ...current,
      balanceCents: next.balanceCents,
      lastFundedPeriod: next.lastFundedPeriod,
      active: next.active,
      version: expectedVersion + 1,
      updatedAtISO: nowISO(),
    };
    this.envelopesById.set(stored.id, stored);
    return { ...stored };
  }
}
