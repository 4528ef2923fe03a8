import "dotenv/config";
import { DEFAULT_SEED_PATH, resolveSeedPath, seedEnvelopes } from "./commands/seed";
import { loadConfig } from "./config";
import { createLibsqlEnvelopeStore } from "./storage/envelopeRepo";
import { initDb } from "./storage/initDb";
import { getDb } from "./storage/libsqlClient";

async function main() {
  const seedPath = resolveSeedPath(process.argv[2] ?? DEFAULT_SEED_PATH);
  const config = loadConfig();
  const db = getDb(config.database);
  try {
    await initDb(db);
    await seedEnvelopes(seedPath, { store: createLibsqlEnvelopeStore(db) });
  } finally {
    db.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
