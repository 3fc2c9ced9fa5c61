import { createChildLogger } from "@/sync/logger";
import type { ReportSink, SyncReport } from "@/sync/types";

const log = createChildLogger("sync-report");

/** One-line outcome, shared by the log sink and the CLI. */
export function summarizeReport(report: SyncReport): string {
  const parts = [
    `${report.created.length} created`,
    `${report.updated.length} updated`,
    `${report.deleted.length} deleted`,
  ];
  if (report.failures.length > 0) parts.push(`${report.failures.length} failed`);
  if (report.conflicts.length > 0) parts.push(`${report.conflicts.length} conflicts`);
  if (report.warnings.length > 0) parts.push(`${report.warnings.length} warnings`);
  return `${report.status}${report.dryRun ? " (dry run)" : ""}: ${parts.join(", ")}`;
}

/** Publishes reports to the application log. */
export class LoggingReportSink implements ReportSink {
  async publish(report: SyncReport): Promise<void> {
    const meta = {
      runId: report.runId,
      trigger: report.trigger,
      planned: report.planned,
      error: report.error,
    };

    switch (report.status) {
      case "completed":
        log.info(summarizeReport(report), meta);
        break;
      case "completed_with_errors":
      case "cancelled":
        log.warn(summarizeReport(report), { ...meta, failures: report.failures });
        break;
      case "aborted":
      case "halted":
        log.error(summarizeReport(report), meta);
        break;
    }

    for (const conflict of report.conflicts) {
      log.warn("Scheduling conflict", { resolution: conflict.resolution, reason: conflict.reason });
    }
  }
}
