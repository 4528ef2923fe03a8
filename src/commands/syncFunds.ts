import type { Clock } from "../clock";
import type { SendEmail } from "../email";
import { syncFunding, type Logger } from "../envelopes/syncFunding";
import type { EnvelopeStore } from "../storage/envelopeStore";
import { bodyFor, resultLineFor, subjectFor } from "../templates";

/**
 * Administrative funding run: sync once, print the per-envelope report, and
 * e-mail it when a recipient is configured. Resolves to the process exit code
 * (1 when any envelope failed).
 */
export async function runSyncFunds(opts: {
  store: EnvelopeStore;
  clock: Clock;
  logger?: Logger;
  email?: { to?: string; from?: string };
  sendEmail?: SendEmail;
}): Promise<number> {
  const { store, clock, logger = console, email = {}, sendEmail } = opts;

  const report = await syncFunding({ store, clock, logger });

  logger.log(`Funding sync for ${report.currentPeriod}:`);
  for (const result of report.results) {
    logger.log(resultLineFor(result));
  }

  if (email.to && email.from && sendEmail) {
    try {
      await sendEmail({ to: email.to, from: email.from, subject: subjectFor(report), text: bodyFor(report) });
      logger.log(`Report emailed to ${email.to}.`);
    } catch (err) {
      // Balances are already committed; a failed notification does not fail the run.
      logger.warn(`Report email failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (report.failed.length > 0) {
    logger.error(`Funding sync finished with ${report.failed.length} failure(s).`);
    return 1;
  }
  logger.log("Funding sync complete.");
  return 0;
}
