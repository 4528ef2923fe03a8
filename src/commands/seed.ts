import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { createEnvelope } from "../envelopes/operations";
import type { Logger } from "../envelopes/syncFunding";
import type { Envelope } from "../envelopes/types";
import { InvalidEnvelopeError } from "../errors";
import type { EnvelopeStore } from "../storage/envelopeStore";

export const DEFAULT_SEED_PATH = "seed/envelopes.example.json";

const SeedFileSchema = z.array(
  z.object({
    name: z.string(),
    baseAmount: z.union([z.string(), z.number()]),
    mode: z.string(),
  })
);

function readJson(p: string): unknown {
  const raw = fs.readFileSync(p, "utf8");
  return JSON.parse(raw);
}

export function resolveSeedPath(relOrAbs: string) {
  return path.isAbsolute(relOrAbs) ? relOrAbs : path.join(process.cwd(), relOrAbs);
}

/**
 * Create the envelopes listed in a JSON file whose names do not exist yet.
 * Every entry is validated before anything is inserted. Returns how many were
 * created.
 */
export async function seedEnvelopes(seedPath: string, deps: { store: EnvelopeStore; logger?: Logger }): Promise<number> {
  const { store, logger = console } = deps;

  if (!fs.existsSync(seedPath)) {
    logger.log(`Envelope seed file not found at ${seedPath} (skipping)`);
    return 0;
  }

  const parsed = SeedFileSchema.safeParse(readJson(seedPath));
  if (!parsed.success) {
    throw new Error(`Invalid seed file ${seedPath}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }

  const existingNames = new Set((await store.listEnvelopes()).map((e) => e.name));
  const pending: Envelope[] = [];
  parsed.data.forEach((entry, index) => {
    let envelope: Envelope;
    try {
      envelope = createEnvelope(entry);
    } catch (err) {
      if (err instanceof InvalidEnvelopeError) {
        throw new InvalidEnvelopeError(err.details.map((detail) => `${index}.${detail}`));
      }
      throw err;
    }
    if (existingNames.has(envelope.name)) return;
    existingNames.add(envelope.name);
    pending.push(envelope);
  });

  for (const envelope of pending) {
    await store.insertEnvelope(envelope);
  }

  logger.log(`Seeded ${pending.length} envelope(s) from ${seedPath}`);
  return pending.length;
}
