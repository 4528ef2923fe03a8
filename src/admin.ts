import "dotenv/config";
import { systemClock } from "./clock";
import { runEnvelopeCommand } from "./commands/envelopes";
import { loadConfig } from "./config";
import { createLibsqlEnvelopeStore } from "./storage/envelopeRepo";
import { initDb } from "./storage/initDb";
import { getDb } from "./storage/libsqlClient";

async function main() {
  const config = loadConfig();
  const db = getDb(config.database);
  try {
    await initDb(db);
    process.exitCode = await runEnvelopeCommand(process.argv.slice(2), {
      store: createLibsqlEnvelopeStore(db),
      clock: systemClock(config.funding.timeZone),
    });
  } finally {
    db.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
