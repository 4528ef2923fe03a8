import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MemoryEnvelopeStore } from "../storage/memoryEnvelopeStore";
import { captureLogger } from "../testSupport";
import { resolveSeedPath, seedEnvelopes } from "./seed";

let tmpDir = "";

before(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "envelope-seed-"));
});

after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeSeed(name: string, contents: unknown): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, JSON.stringify(contents), "utf8");
  return file;
}

describe("seedEnvelopes", () => {
  it("creates missing envelopes once", async () => {
    const file = writeSeed("envelopes.json", [
      { name: "Groceries", baseAmount: "450.00", mode: "reset" },
      { name: "Gifts", baseAmount: 40, mode: "rollover" },
    ]);
    const store = new MemoryEnvelopeStore();
    const { lines, logger } = captureLogger();

    assert.equal(await seedEnvelopes(file, { store, logger }), 2);
    assert.equal(await seedEnvelopes(file, { store, logger }), 0);

    const envelopes = await store.listEnvelopes();
    assert.deepEqual(
      envelopes.map((e) => [e.name, e.fundingMode, e.baseAmountCents, e.balanceCents, e.lastFundedPeriod]),
      [
        ["Gifts", "rollover", 4000, 0, null],
        ["Groceries", "reset", 45000, 0, null],
      ]
    );
    assert.deepEqual(lines.log, [`Seeded 2 envelope(s) from ${file}`, `Seeded 0 envelope(s) from ${file}`]);
  });

  it("inserts nothing when any entry is invalid", async () => {
    const file = writeSeed("mixed.json", [
      { name: "Groceries", baseAmount: "450.00", mode: "reset" },
      { name: "Gifts", baseAmount: "40", mode: "weekly" },
    ]);
    const store = new MemoryEnvelopeStore();

    await assert.rejects(seedEnvelopes(file, { store, logger: captureLogger().logger }), {
      code: "INVALID_ENVELOPE",
      message: "Envelope is invalid: 1.mode: Envelope mode must be reset or rollover.",
    });
    assert.deepEqual(await store.listEnvelopes(), []);
  });

  it("skips a missing seed file", async () => {
    const file = path.join(tmpDir, "absent.json");
    const { lines, logger } = captureLogger();

    assert.equal(await seedEnvelopes(file, { store: new MemoryEnvelopeStore(), logger }), 0);
    assert.deepEqual(lines.log, [`Envelope seed file not found at ${file} (skipping)`]);
  });

  it("rejects a malformed seed file", async () => {
    const file = writeSeed("bad.json", [{ name: "Groceries", baseAmount: "1" }]);
    await assert.rejects(seedEnvelopes(file, { store: new MemoryEnvelopeStore(), logger: captureLogger().logger }), {
      message: `Invalid seed file ${file}: 0.mode: Required`,
    });
  });

  it("resolves relative paths against the working directory", () => {
    assert.equal(resolveSeedPath("/etc/envelopes.json"), "/etc/envelopes.json");
    assert.equal(resolveSeedPath("seed/envelopes.json"), path.join(process.cwd(), "seed/envelopes.json"));
  });
});
