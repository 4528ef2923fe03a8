import type { Envelope, EnvelopeFilter } from "../envelopes/types";

/**
 * Persistence contract the engine depends on.
 *
 * `commitEnvelope` is the per-envelope serialization point: it writes `next`
 * only if the stored version still equals `expectedVersion`, and fails with
 * StaleEnvelopeError otherwise. Unknown ids fail with EnvelopeNotFoundError.
 */
export interface EnvelopeStore {
  listEnvelopes(filter?: EnvelopeFilter): Promise<Envelope[]>;
  getEnvelope(id: string): Promise<Envelope | null>;
  insertEnvelope(envelope: Envelope): Promise<void>;
  commitEnvelope(next: Envelope, expectedVersion: number): Promise<Envelope>;
}
