import "./load-env";
import { runInteractiveSync } from "./interactive";
import { runWatch } from "./watch";
import { releaseMapping, resumeAfterAuthFailure, runConfiguredCycle } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import { summarizeReport } from "@/sync/report";

const args = process.argv.slice(2);
const isOnce = args.includes("--once") || args.includes("--auto");
const isWatch = args.includes("--watch");
const isResume = args.includes("--resume");
const recreateIndex = args.indexOf("--recreate");

async function main() {
  if (isResume) {
    const resumed = resumeAfterAuthFailure();
    console.log(resumed ? "Sync resumed." : "Sync was not halted.");
  } else if (recreateIndex >= 0) {
    const portalId = args[recreateIndex + 1];
    if (!portalId) throw new Error("--recreate needs a booking number");
    const released = releaseMapping(portalId);
    console.log(released ? `Booking ${portalId} will be recreated on the next cycle.` : `No mapping for booking ${portalId}.`);
  } else if (isWatch) {
    await runWatch(getEnv().SYNC_INTERVAL_MINUTES);
    return;
  } else if (isOnce) {
    // Headless mode: one cycle, no prompts
    const report = await runConfiguredCycle("cli");
    console.log(summarizeReport(report));
    console.log(JSON.stringify(report, null, 2));
    if (report.status === "aborted" || report.status === "halted") process.exitCode = 1;
  } else {
    // Interactive mode: preview, then confirm
    await runInteractiveSync();
  }
  closeDatabase();
}

main().catch((err: unknown) => {
  console.error("Sync failed:", err instanceof Error ? err.message : String(err));
  closeDatabase();
  process.exit(1);
});
