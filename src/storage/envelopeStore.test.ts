import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Client, InStatement, ResultSet } from "@libsql/client";
import { fixedClock } from "../clock";
import { syncFunding } from "../envelopes/syncFunding";
import { EnvelopeNotFoundError, StaleEnvelopeError } from "../errors";
import { parsePeriod } from "../period";
import { captureLogger, makeEnvelope } from "../testSupport";
import { createLibsqlEnvelopeStore } from "./envelopeRepo";
import type { EnvelopeStore } from "./envelopeStore";
import { initDb } from "./initDb";
import { createDb, dbGetAll, type Db } from "./libsqlClient";
import { ensureMigrations } from "./migrations";
import { MemoryEnvelopeStore } from "./memoryEnvelopeStore";

let tmpDir = "";
const clients: Client[] = [];

before(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "envelope-budget-"));
});

after(() => {
  for (const client of clients) client.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

async function freshDb(): Promise<Client> {
  const db = createDb({ url: `file:${path.join(tmpDir, `store-${clients.length}.db`)}` });
  clients.push(db);
  await initDb(db);
  return db;
}

const stores: Array<[label: string, make: () => Promise<EnvelopeStore>]> = [
  ["memory", async () => new MemoryEnvelopeStore()],
  ["libsql", async () => createLibsqlEnvelopeStore(await freshDb())],
];

for (const [label, makeStore] of stores) {
  describe(`${label} envelope store`, () => {
    it("round-trips an inserted envelope", async () => {
      const store = await makeStore();
      const envelope = makeEnvelope({ id: "gifts", name: "Gifts", fundingMode: "rollover", balanceCents: -250, lastFundedPeriod: "2024-03" });

      await store.insertEnvelope(envelope);

      assert.deepEqual(await store.getEnvelope("gifts"), envelope);
      assert.equal(await store.getEnvelope("missing"), null);
    });

    it("rejects a duplicate id", async () => {
      const store = await makeStore();
      await store.insertEnvelope(makeEnvelope());
      await assert.rejects(store.insertEnvelope(makeEnvelope({ name: "Other" })));
    });

    it("filters by active flag and funding state, ordered by name", async () => {
      const store = await makeStore();
      await store.insertEnvelope(makeEnvelope({ id: "d", name: "Delta", lastFundedPeriod: "2024-02" }));
      await store.insertEnvelope(makeEnvelope({ id: "b", name: "Bravo", lastFundedPeriod: "2024-04" }));
      await store.insertEnvelope(makeEnvelope({ id: "c", name: "Charlie", active: false, lastFundedPeriod: "2024-01" }));
      await store.insertEnvelope(makeEnvelope({ id: "a", name: "Alpha" }));

      const all = await store.listEnvelopes();
      assert.deepEqual(
        all.map((e) => e.name),
        ["Alpha", "Bravo", "Charlie", "Delta"]
      );
      const active = await store.listEnvelopes({ activeOnly: true });
      assert.deepEqual(
        active.map((e) => e.id),
        ["a", "b", "d"]
      );
      const due = await store.listEnvelopes({ activeOnly: true, unfundedThrough: parsePeriod("2024-04") });
      assert.deepEqual(
        due.map((e) => e.id),
        ["a", "d"]
      );
    });

    it("orders names by code unit", async () => {
      const store = await makeStore();
      await store.insertEnvelope(makeEnvelope({ id: "x", name: "alpha" }));
      await store.insertEnvelope(makeEnvelope({ id: "y", name: "Bravo" }));

      const all = await store.listEnvelopes();
      assert.deepEqual(
        all.map((e) => e.name),
        ["Bravo", "alpha"]
      );
    });

    it("commits against the expected version", async () => {
      const store = await makeStore();
      await store.insertEnvelope(makeEnvelope({ balanceCents: 5000 }));

      const committed = await store.commitEnvelope(
        makeEnvelope({ balanceCents: 1200, lastFundedPeriod: "2024-05", active: false }),
        0
      );

      assert.equal(committed.version, 1);
      assert.equal(committed.balanceCents, 1200);
      assert.deepEqual(committed.lastFundedPeriod, { year: 2024, month: 5 });
      assert.equal(committed.active, false);
      assert.deepEqual(await store.getEnvelope("env-1"), committed);
    });

    it("keeps name, mode and base amount on commit", async () => {
      const store = await makeStore();
      await store.insertEnvelope(makeEnvelope({ name: "Dining", baseAmountCents: 5000 }));

      const committed = await store.commitEnvelope(makeEnvelope({ name: "Renamed", baseAmountCents: 1, fundingMode: "rollover" }), 0);

      assert.equal(committed.name, "Dining");
      assert.equal(committed.baseAmountCents, 5000);
      assert.equal(committed.fundingMode, "reset");
    });

    it("refuses a stale commit without writing", async () => {
      const store = await makeStore();
      await store.insertEnvelope(makeEnvelope({ balanceCents: 5000 }));
      await store.commitEnvelope(makeEnvelope({ balanceCents: 4000 }), 0);

      await assert.rejects(store.commitEnvelope(makeEnvelope({ balanceCents: 1 }), 0), StaleEnvelopeError);

      const current = await store.getEnvelope("env-1");
      assert.equal(current?.balanceCents, 4000);
      assert.equal(current?.version, 1);
    });

    it("refuses to commit an unknown envelope", async () => {
      const store = await makeStore();
      await assert.rejects(store.commitEnvelope(makeEnvelope({ id: "ghost" }), 0), EnvelopeNotFoundError);
    });

    it("persists a funding sync", async () => {
      const store = await makeStore();
      await store.insertEnvelope(
        makeEnvelope({ id: "gifts", fundingMode: "rollover", baseAmountCents: 5000, balanceCents: 1000, lastFundedPeriod: "2024-01" })
      );
      const { logger } = captureLogger();

      await syncFunding({ store, clock: fixedClock("2024-04"), logger });
      const second = await syncFunding({ store, clock: fixedClock("2024-04"), logger });

      const after = await store.getEnvelope("gifts");
      assert.equal(after?.balanceCents, 16000);
      assert.deepEqual(after?.lastFundedPeriod, { year: 2024, month: 4 });
      assert.equal(second.skipped.length, 1);
    });
  });
}

/** Fails every SELECT issued after the first UPDATE has gone through. */
function failReadsAfterUpdate(db: Client): Db {
  let updated = false;
  return {
    execute: async (stmt: InStatement): Promise<ResultSet> => {
      const sql = typeof stmt === "string" ? stmt : stmt.sql;
      if (updated && /^\s*SELECT/i.test(sql)) throw new Error("connection reset");
      const res = await db.execute(stmt);
      if (/^\s*UPDATE/i.test(sql)) updated = true;
      return res;
    },
  };
}

describe("libsql commit", () => {
  it("reports a committed funding as funded without reading the row back", async () => {
    const db = await freshDb();
    const store = createLibsqlEnvelopeStore(failReadsAfterUpdate(db));
    await store.insertEnvelope(makeEnvelope({ id: "rent", name: "Rent", balanceCents: 0, lastFundedPeriod: "2024-03" }));
    const { lines, logger } = captureLogger();

    const report = await syncFunding({ store, clock: fixedClock("2024-04"), logger });

    assert.equal(report.failed.length, 0);
    assert.equal(report.funded[0].balanceCents, 5000);
    assert.equal(report.funded[0].lastFundedPeriod, "2024-04");
    assert.deepEqual(lines.error, []);
    const persisted = await createLibsqlEnvelopeStore(db).getEnvelope("rent");
    assert.equal(persisted?.balanceCents, 5000);
    assert.equal(persisted?.version, 1);
  });
});

describe("migrations", () => {
  it("applies each migration once", async () => {
    const db = await freshDb();
    await ensureMigrations(db);

    const rows = await dbGetAll(db, `SELECT version, name FROM schema_migrations;`);
    assert.deepEqual(
      rows.map((r) => [Number(r.version), String(r.name)]),
      [[1, "init_envelopes"]]
    );
  });
});
