import type { Clock } from "../clock";
import { addEnvelope, archiveEnvelope, depositToEnvelope, listActiveEnvelopes, spendFromEnvelope } from "../envelopes/service";
import type { Logger } from "../envelopes/syncFunding";
import type { Envelope } from "../envelopes/types";
import { BudgetError } from "../errors";
import { formatUSD, parseAmount } from "../money";
import { formatPeriod } from "../period";
import type { EnvelopeStore } from "../storage/envelopeStore";

export const USAGE = [
  "Usage: npm run envelopes -- <command>",
  "  list",
  "  due                                   envelopes not yet funded for the current period",
  "  add <name> <baseAmount> <reset|rollover>",
  "  spend <id> <amount>",
  "  deposit <id> <amount>",
  "  archive <id>",
].join("\n");

export function envelopeLine(e: Envelope): string {
  const last = e.lastFundedPeriod ? formatPeriod(e.lastFundedPeriod) : "never";
  return `${e.id}  ${e.name}  [${e.fundingMode}]  balance ${formatUSD(e.balanceCents)}  base ${formatUSD(
    e.baseAmountCents
  )}  funded through ${last}`;
}

/**
 * Envelope administration. Resolves to an exit code: 0 on success, 2 on a
 * usage or validation error. Unexpected errors (database) are thrown.
 */
export async function runEnvelopeCommand(
  argv: readonly string[],
  deps: { store: EnvelopeStore; clock: Clock; logger?: Logger }
): Promise<number> {
  const { store, clock, logger = console } = deps;
  const [command, ...args] = argv;

  try {
    switch (command) {
      case "list": {
        const envelopes = await listActiveEnvelopes(store);
        if (envelopes.length === 0) logger.log("No active envelopes.");
        for (const e of envelopes) logger.log(envelopeLine(e));
        return 0;
      }
      case "due": {
        const current = clock.currentPeriod();
        const envelopes = await store.listEnvelopes({ activeOnly: true, unfundedThrough: current });
        logger.log(`${envelopes.length} envelope(s) need funding through ${formatPeriod(current)}.`);
        for (const e of envelopes) logger.log(envelopeLine(e));
        return 0;
      }
      case "add": {
        if (args.length !== 3) break;
        const [name, baseAmount, mode] = args;
        const envelope = await addEnvelope(store, { name, baseAmount, mode });
        logger.log(`Added ${envelopeLine(envelope)}`);
        return 0;
      }
      case "spend":
      case "deposit": {
        if (args.length !== 2) break;
        const [id, rawAmount] = args;
        const amount = parseAmount(rawAmount);
        const envelope =
          command === "spend" ? await spendFromEnvelope(store, id, amount) : await depositToEnvelope(store, id, amount);
        logger.log(envelopeLine(envelope));
        return 0;
      }
      case "archive": {
        if (args.length !== 1) break;
        const envelope = await archiveEnvelope(store, args[0]);
        logger.log(`Archived ${envelope.name} (${envelope.id}).`);
        return 0;
      }
    }
  } catch (err) {
    if (err instanceof BudgetError) {
      logger.error(err.message);
      return 2;
    }
    throw err;
  }

  logger.error(USAGE);
  return 2;
}
