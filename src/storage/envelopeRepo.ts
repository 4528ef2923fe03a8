import type { InValue, Row } from "@libsql/client";
import { EnvelopeNotFoundError, StaleEnvelopeError } from "../errors";
import { FundingModeSchema, type Envelope, type EnvelopeFilter } from "../envelopes/types";
import { formatPeriod, parsePeriod } from "../period";
import type { EnvelopeStore } from "./envelopeStore";
import { dbExec, dbGetAll, dbGetOne, type Db } from "./libsqlClient";

function nowISO() {
  return new Date().toISOString();
}

function rowToEnvelope(r: Row): Envelope {
  return {
    id: String(r.id),
    name: String(r.name),
    fundingMode: FundingModeSchema.parse(r.funding_mode),
    baseAmountCents: Number(r.base_amount_cents),
    balanceCents: Number(r.balance_cents),
    lastFundedPeriod: r.last_funded_period == null ? null : parsePeriod(String(r.last_funded_period)),
    active: Boolean(r.active),
    version: Number(r.version),
    createdAtISO: String(r.created_at),
    updatedAtISO: String(r.updated_at),
  };
}

export async function listEnvelopes(db: Db, filter: EnvelopeFilter = {}): Promise<Envelope[]> {
  const where: string[] = [];
  const args: InValue[] = [];
  if (filter.activeOnly) where.push("active = 1");
  if (filter.unfundedThrough) {
    // YYYY-MM sorts chronologically as text.
    where.push("(last_funded_period IS NULL OR last_funded_period < ?)");
    args.push(formatPeriod(filter.unfundedThrough));
  }
  const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  const rows = await dbGetAll(db, `SELECT * FROM envelopes ${clause} ORDER BY name ASC, id ASC;`, args);
  return rows.map(rowToEnvelope);
}

export async function getEnvelope(db: Db, id: string): Promise<Envelope | null> {
  const row = await dbGetOne(db, `SELECT * FROM envelopes WHERE id = ?;`, [id]);
  return row ? rowToEnvelope(row) : null;
}

export async function insertEnvelope(db: Db, envelope: Envelope): Promise<void> {
  await dbExec(
    db,
    `INSERT INTO envelopes(
      id, name, funding_mode, base_amount_cents, balance_cents, last_funded_period, active, version, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?);`,
    [
      envelope.id,
      envelope.name,
      envelope.fundingMode,
      envelope.baseAmountCents,
      envelope.balanceCents,
      envelope.lastFundedPeriod ? formatPeriod(envelope.lastFundedPeriod) : null,
      envelope.active ? 1 : 0,
      envelope.version,
      envelope.createdAtISO,
      envelope.updatedAtISO,
    ]
  );
}

/**
 * Compare-and-swap on `version`: the row is only written when nobody else
 * committed since `expectedVersion` was read. The written row comes back from
 * the UPDATE itself, so a successful commit is never reported as failed.
 */
export async function commitEnvelope(db: Db, next: Envelope, expectedVersion: number): Promise<Envelope> {
  const updatedAtISO = nowISO();
  const res = await dbExec(
    db,
    `UPDATE envelopes
     SET balance_cents = ?,
         last_funded_period = ?,
         active = ?,
         version = version + 1,
         updated_at = ?
     WHERE id = ? AND version = ?
     RETURNING *;`,
    [
      next.balanceCents,
      next.lastFundedPeriod ? formatPeriod(next.lastFundedPeriod) : null,
      next.active ? 1 : 0,
      updatedAtISO,
      next.id,
      expectedVersion,
    ]
  );

  const written = res.rows[0];
  if (written) return rowToEnvelope(written);

  const existing = await getEnvelope(db, next.id);
  if (!existing) throw new EnvelopeNotFoundError(next.id);
  throw new StaleEnvelopeError(next.id, expectedVersion);
}

export function createLibsqlEnvelopeStore(db: Db): EnvelopeStore {
  return {
    listEnvelopes: (filter) => listEnvelopes(db, filter),
    getEnvelope: (id) => getEnvelope(db, id),
    insertEnvelope: (envelope) => insertEnvelope(db, envelope),
    commitEnvelope: (next, expectedVersion) => commitEnvelope(db, next, expectedVersion),
  };
}
