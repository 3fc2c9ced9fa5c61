import * as schedule from "node-schedule";
import { requestCycleStop, runConfiguredCycle } from "@/sync";
import { ConfigError, CycleInProgressError } from "@/sync/errors";
import { closeDatabase } from "@/sync/ledger/db";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("sync-watch");

/** Cron rule firing every `minutes` minutes. */
export function watchRule(minutes: number): string {
  if (!Number.isInteger(minutes) || minutes < 1) {
    throw new ConfigError(`SYNC_INTERVAL_MINUTES must be a positive integer, got ${minutes}`);
  }
  if (minutes < 60) return `*/${minutes} * * * *`;
  if (minutes % 60 === 0 && minutes / 60 < 24) return `0 */${minutes / 60} * * *`;
  throw new ConfigError(`SYNC_INTERVAL_MINUTES must be under 60 or a whole number of hours under 24, got ${minutes}`);
}

/** Run a cycle now and then on the interval until SIGINT/SIGTERM. */
export async function runWatch(intervalMinutes: number): Promise<void> {
  const rule = watchRule(intervalMinutes);
  let current: Promise<void> | null = null;
  let stopping = false;

  const tick = async (): Promise<void> => {
    try {
      const report = await runConfiguredCycle("scheduled");
      log.info("Scheduled cycle finished", { runId: report.runId, status: report.status });
    } catch (error) {
      if (error instanceof CycleInProgressError) {
        log.info("Previous cycle still running; skipping this tick", { holder: error.holder });
        return;
      }
      log.error("Scheduled cycle failed", { error: errorMessage(error) });
    }
  };

  const trigger = (): void => {
    if (stopping || current) return;
    current = tick().finally(() => {
      current = null;
    });
  };

  trigger();
  const job = schedule.scheduleJob(rule, trigger);
  log.info("Watching for changes", { rule });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      if (stopping) return;
      stopping = true;
      log.info("Received shutdown signal, stopping after in-flight work", { signal });
      job.cancel();
      if (current) requestCycleStop();
      void (current ?? Promise.resolve()).then(() => {
        closeDatabase();
        resolve();
      });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });
}
