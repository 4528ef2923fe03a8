import { EnvelopeNotFoundError, StaleEnvelopeError } from "../errors";
import type { Cents } from "../money";
import type { EnvelopeStore } from "../storage/envelopeStore";
import { createEnvelope, deposit, spend, type EnvelopeCreate } from "./operations";
import type { Envelope, EnvelopeOutcome } from "./types";

const MAX_COMMIT_ATTEMPTS = 3;

export async function addEnvelope(store: EnvelopeStore, input: EnvelopeCreate): Promise<Envelope> {
  const envelope = createEnvelope(input);
  await store.insertEnvelope(envelope);
  return envelope;
}

export async function requireEnvelope(store: EnvelopeStore, id: string): Promise<Envelope> {
  const envelope = await store.getEnvelope(id);
  if (!envelope) throw new EnvelopeNotFoundError(id);
  return envelope;
}

/**
 * Load, apply `operation`, commit. A stale commit means another writer got in
 * first; reload and re-apply against the fresh state.
 */
async function updateEnvelope(
  store: EnvelopeStore,
  id: string,
  operation: (envelope: Envelope) => EnvelopeOutcome
): Promise<Envelope> {
  for (let attempt = 1; ; attempt++) {
    const current = await requireEnvelope(store, id);
    const outcome = operation(current);
    if (!outcome.ok) throw outcome.error;
    try {
      return await store.commitEnvelope(outcome.envelope, current.version);
    } catch (err) {
      if (err instanceof StaleEnvelopeError && attempt < MAX_COMMIT_ATTEMPTS) continue;
      throw err;
    }
  }
}

export async function spendFromEnvelope(store: EnvelopeStore, id: string, amount: Cents): Promise<Envelope> {
  return updateEnvelope(store, id, (envelope) => spend(envelope, amount));
}

export async function depositToEnvelope(store: EnvelopeStore, id: string, amount: Cents): Promise<Envelope> {
  return updateEnvelope(store, id, (envelope) => deposit(envelope, amount));
}

/** Archived envelopes keep their balance but are no longer funded or listed as active. */
export async function archiveEnvelope(store: EnvelopeStore, id: string): Promise<Envelope> {
  return updateEnvelope(store, id, (envelope) => ({ ok: true, envelope: { ...envelope, active: false } }));
}

export async function listActiveEnvelopes(store: EnvelopeStore): Promise<Envelope[]> {
  return store.listEnvelopes({ activeOnly: true });
}
