import type { EnvelopeSyncResult, SyncReport } from "./envelopes/types";
import { formatUSD } from "./money";

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** One line per envelope, as printed by the sync command. */
export function resultLineFor(result: EnvelopeSyncResult): string {
  const last = result.lastFundedPeriod ?? "never";
  if (result.status === "failed") {
    return `FAILED  ${result.name} (${result.envelopeId}): [${result.errorCode ?? "UNKNOWN"}] ${result.errorMessage ?? ""}`.trimEnd();
  }
  if (result.status === "skipped") {
    return `ok      ${result.name}: up to date through ${last}, balance ${formatUSD(result.balanceCents)}`;
  }
  return `funded  ${result.name}: caught up ${plural(result.periodsFunded, "period")} (${result.fundedPeriods.join(", ")}), balance ${formatUSD(
    result.balanceCents
  )}, funded through ${last}`;
}

export function subjectFor(report: SyncReport): string {
  if (report.failed.length > 0) {
    return `Envelope funding ${report.currentPeriod}: ${plural(report.failed.length, "failure")}`;
  }
  if (report.funded.length === 0) return `Envelope funding ${report.currentPeriod}: nothing to do`;
  return `Envelope funding ${report.currentPeriod}: ${plural(report.funded.length, "envelope")} funded`;
}

export function bodyFor(report: SyncReport): string {
  const lines: string[] = [];

  lines.push(`Period: ${report.currentPeriod}`);
  lines.push(
    `Funded: ${report.funded.length}  Up to date: ${report.skipped.length}  Failed: ${report.failed.length}`
  );
  lines.push("");

  if (report.results.length === 0) {
    lines.push("No active envelopes.");
  }
  for (const result of report.results) {
    lines.push(resultLineFor(result));
  }

  if (report.failed.length > 0) {
    lines.push("");
    lines.push("Re-run sync-funds to retry the failed envelopes:");
    for (const failed of report.failed) {
      lines.push(`- ${failed.envelopeId}`);
    }
  }

  return lines.join("\n");
}
