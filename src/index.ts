import "dotenv/config";
import { systemClock } from "./clock";
import { runSyncFunds } from "./commands/syncFunds";
import { loadConfig } from "./config";
import { createSmtpSender } from "./email";
import { createLibsqlEnvelopeStore } from "./storage/envelopeRepo";
import { initDb } from "./storage/initDb";
import { getDb } from "./storage/libsqlClient";

// Funding only ever runs from here (npm run sync-funds), never per request.
async function main() {
  const config = loadConfig();
  const db = getDb(config.database);
  try {
    await initDb(db);
    process.exitCode = await runSyncFunds({
      store: createLibsqlEnvelopeStore(db),
      clock: systemClock(config.funding.timeZone),
      email: config.email,
      sendEmail: createSmtpSender(config.smtp),
    });
  } finally {
    db.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
