import * as p from "@clack/prompts";
import {
  applyPreparedCycle,
  createCollaborators,
  createCycleLock,
  cycleOptionsFromEnv,
  prepareCycle,
  recordPreparedCycle,
  releaseMapping,
  resumeAfterAuthFailure,
  type CycleDeps,
  type CycleOptions,
  type PreparedCycle,
} from "@/sync";
import { withCycleLease, type CycleLease } from "@/sync/engine/lock";
import { getHaltState } from "@/sync/ledger/repository";
import { errorMessage } from "@/sync/logger";
import { summarizeReport } from "@/sync/report";
import type { PlanAction, SyncPlanItem } from "@/sync/types";

const ACTION_LABELS: Record<Exclude<PlanAction, "SKIP">, string> = {
  CREATE: "new",
  UPDATE: "changed",
  DELETE: "to remove",
};

function describeItem(item: SyncPlanItem): string {
  const record = item.record;
  if (!record) return `${item.portalId} (no longer on Salon Board)`;
  return `${item.portalId}  ${record.customerLabel}  ${record.start} → ${record.end}`;
}

function showPreview(prepared: PreparedCycle): number {
  const actionable = prepared.plan.items.filter((i) => i.action !== "SKIP");

  p.log.info(
    `Salon Board: ${prepared.portal.records.length} bookings, Google Calendar: ${prepared.calendar.records.length} events`,
  );

  for (const action of ["CREATE", "UPDATE", "DELETE"] as const) {
    const items = actionable.filter((i) => i.action === action);
    if (items.length === 0) continue;
    p.log.message(`${items.length} ${ACTION_LABELS[action]}:\n${items.map((i) => `  ${describeItem(i)}`).join("\n")}`);
  }

  for (const conflict of prepared.conflicts) {
    p.log.warn(conflict.reason);
  }
  for (const warning of prepared.warnings) {
    p.log.warn(warning.message);
  }
  return actionable.length;
}

async function offerRecreate(prepared: PreparedCycle): Promise<void> {
  const deleted = prepared.plan.items.filter((i) => i.reason === "externally_deleted");
  if (deleted.length === 0) return;

  const selected = await p.multiselect({
    message: "These events were deleted from Google Calendar. Recreate any on the next sync?",
    options: deleted.map((i) => ({ value: i.portalId, label: describeItem(i) })),
    required: false,
  });
  if (p.isCancel(selected)) return;

  for (const portalId of selected) {
    releaseMapping(portalId);
  }
  if (selected.length > 0) {
    p.log.success(`${selected.length} booking(s) will be recreated on the next sync.`);
  }
}

async function ensureNotHalted(): Promise<boolean> {
  const halt = getHaltState();
  if (!halt) return true;

  p.log.error(`Sync is halted since ${halt.haltedAt}: ${halt.reason}`);
  const resume = await p.confirm({
    message: "Have the Google credentials been refreshed? Resume sync?",
    initialValue: false,
  });
  if (p.isCancel(resume) || !resume) return false;
  resumeAfterAuthFailure();
  return true;
}

interface PreviewOutcome {
  prepared: PreparedCycle;
  closing: string;
}

async function previewAndApply(lease: CycleLease, deps: CycleDeps, options: CycleOptions): Promise<PreviewOutcome | null> {
  const fetchSpinner = p.spinner();
  fetchSpinner.start("Checking Salon Board and Google Calendar...");

  let prepared: PreparedCycle;
  try {
    prepared = await prepareCycle(deps, options);
    fetchSpinner.stop("Data checked.");
  } catch (error) {
    fetchSpinner.stop("Failed to fetch data.");
    p.log.error(errorMessage(error));
    p.outro("Sync could not start. Check your settings and try again.");
    return null;
  }

  const pending = showPreview(prepared);

  if (pending === 0) {
    p.log.success("Everything is up to date!");
    await recordPreparedCycle(prepared, deps, options, { status: "completed" });
    return { prepared, closing: "Nothing to sync." };
  }

  const proceed = await p.confirm({ message: `Apply ${pending} change(s) to Google Calendar?` });
  if (p.isCancel(proceed) || !proceed) {
    await recordPreparedCycle(prepared, deps, options, { status: "cancelled", reason: "Declined by the operator" });
    return { prepared, closing: "Sync cancelled." };
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");
  const report = await applyPreparedCycle(lease, prepared, deps, options);
  syncSpinner.stop("Sync finished.");

  if (report.failures.length > 0) {
    p.log.warn(summarizeReport(report));
    for (const failure of report.failures) {
      p.log.message(`  ${failure.action} ${failure.portalId}: ${failure.error}`);
    }
  } else {
    p.log.success(summarizeReport(report));
  }
  return { prepared, closing: "Done!" };
}

export async function runInteractiveSync(): Promise<void> {
  p.intro("Salon Calendar Sync");

  if (!(await ensureNotHalted())) {
    p.outro("Sync stays halted.");
    return;
  }

  let deps: CycleDeps;
  try {
    deps = createCollaborators();
  } catch (error) {
    p.log.error(errorMessage(error));
    p.outro("Set up your .env.local file and try again.");
    return;
  }

  const options = cycleOptionsFromEnv("cli");
  if (options.dryRun) {
    p.log.warn("Dry run: nothing will be written to Google Calendar.");
  }

  try {
    const outcome = await withCycleLease(createCycleLock(), "cli", (lease) => previewAndApply(lease, deps, options));
    if (outcome) {
      await offerRecreate(outcome.prepared);
      p.outro(outcome.closing);
    }
  } catch (error) {
    p.log.error(errorMessage(error));
    p.outro("Sync did not run.");
  } finally {
    await deps.portal.close?.();
  }
}
