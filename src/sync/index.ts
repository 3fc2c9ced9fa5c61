import { randomUUID } from "crypto";
import { getEnv } from "@/sync/config/env";
import { detectConflicts } from "@/sync/engine/conflicts";
import { executePlan, type ExecutionResult } from "@/sync/engine/executor";
import { CycleLock, withCycleLease, type CycleLease } from "@/sync/engine/lock";
import { matchSnapshots } from "@/sync/engine/matcher";
import { normalizeCalendarEvents, normalizePortalAppointments } from "@/sync/engine/normalizer";
import { buildPlan, type PlanPolicy } from "@/sync/engine/planner";
import { DEFAULT_RETRY_POLICY, readWithRetry, systemClock, type Clock, type RetryPolicy } from "@/sync/engine/retry";
import { daysBefore, syncWindow } from "@/sync/engine/time";
import { AuthError, CalendarFetchError, CallTimeoutError, ConfigError, ScrapeError } from "@/sync/errors";
import { GoogleCalendarClient } from "@/sync/google/client";
import {
  appendConflicts,
  clearHaltState,
  completeRun,
  createRun,
  getHaltState,
  getLatestRun,
  getLease,
  listMappings,
  listRecentConflicts,
  pruneMappingsEndedBefore,
  pruneRuns,
  retireMapping,
  setHaltState,
} from "@/sync/ledger/repository";
import type { HaltState, LeaseRecord, LoggedConflict, SyncRunRecord } from "@/sync/ledger/types";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { LoggingReportSink } from "@/sync/report";
import { SalonBoardClient } from "@/sync/salonboard/client";
import { googleCredentialsSchema, salonBoardCredentialsSchema } from "@/sync/types/api";
import type {
  CalendarGateway,
  ConflictRecord,
  CycleStatus,
  DateRange,
  MatchResult,
  NormalizedSnapshot,
  PortalSource,
  ReportSink,
  SyncPlan,
  SyncReport,
  SyncTrigger,
  SyncWarning,
} from "@/sync/types";

const log = createChildLogger("sync-engine");

export interface CycleDeps {
  portal: PortalSource;
  calendar: CalendarGateway;
  sink?: ReportSink;
  clock?: Clock;
}

export interface CycleOptions {
  trigger: SyncTrigger;
  window: DateRange;
  /** Zone the portal's wall-clock times are in. */
  timeZone: string;
  dryRun?: boolean;
  policy?: Partial<PlanPolicy>;
  retry?: RetryPolicy;
  concurrency?: number;
  callTimeoutMs?: number;
  scrapeTimeoutMs?: number;
  /** Finished runs older than this many days are pruned after each cycle. Unset or 0 keeps them. */
  runRetentionDays?: number;
}

/** Everything a cycle decides before it touches the calendar. */
export interface PreparedCycle {
  window: DateRange;
  portal: NormalizedSnapshot;
  calendar: NormalizedSnapshot;
  matches: MatchResult[];
  conflicts: ConflictRecord[];
  plan: SyncPlan;
  warnings: SyncWarning[];
}

export interface RunHandle {
  runId: string;
  startedAt: string;
}

interface CycleOutcome {
  status: CycleStatus;
  error?: string;
  prepared?: PreparedCycle;
  execution?: ExecutionResult;
}

const DEFAULT_CALL_TIMEOUT_MS = 20_000;
const DEFAULT_SCRAPE_TIMEOUT_MS = 180_000;

function portalFailure(error: unknown): ScrapeError {
  if (error instanceof ScrapeError) return error;
  if (error instanceof CallTimeoutError) return new ScrapeError(error.message, "network");
  return new ScrapeError(errorMessage(error));
}

function calendarFailure(error: unknown): AuthError | CalendarFetchError {
  if (error instanceof AuthError || error instanceof CalendarFetchError) return error;
  return new CalendarFetchError(errorMessage(error));
}

function normalizationWarnings(snapshot: NormalizedSnapshot): SyncWarning[] {
  return snapshot.warnings.map((w): SyncWarning => ({
    code: "NORMALIZATION",
    message: `${w.origin.toLowerCase()} record ${w.sourceId ?? "(no id)"} dropped: ${w.reason}`,
    ...(w.sourceId && w.origin === "PORTAL" ? { portalId: w.sourceId } : {}),
    origin: w.origin,
  }));
}

/**
 * Fetch both snapshots concurrently and run normalize, match, conflict detection
 * and planning. Reads the mapping table but writes nothing.
 */
export async function prepareCycle(deps: CycleDeps, options: CycleOptions): Promise<PreparedCycle> {
  const clock = deps.clock ?? systemClock;
  const policy = options.retry ?? DEFAULT_RETRY_POLICY;
  const { window, timeZone } = options;

  log.info("Fetching snapshots", { from: window.from, to: window.to });
  const [rawPortal, rawCalendar] = await Promise.all([
    // A timed-out scrape may still be driving the browser page, so it gets one attempt.
    readWithRetry(() => deps.portal.fetchPortalAppointments(window), {
      label: "fetchPortalAppointments",
      timeoutMs: options.scrapeTimeoutMs ?? DEFAULT_SCRAPE_TIMEOUT_MS,
      policy: { ...policy, maxAttempts: 1 },
      clock,
    }).catch((error: unknown) => {
      throw portalFailure(error);
    }),
    readWithRetry(() => deps.calendar.listEvents(window), {
      label: "listEvents",
      timeoutMs: options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS,
      policy,
      clock,
    }).catch((error: unknown) => {
      throw calendarFailure(error);
    }),
  ]);

  const portal = normalizePortalAppointments(rawPortal, { timeZone });
  const calendar = normalizeCalendarEvents(rawCalendar, { timeZone });
  const mappings = listMappings();

  const matches = matchSnapshots({ portal: portal.records, calendar: calendar.records, mappings, window });
  const { conflicts, flagged } = detectConflicts({
    matches,
    calendar: calendar.records,
    mappings,
    now: new Date(clock.now()),
  });
  const plan = buildPlan({ matches, flagged, policy: options.policy });

  log.info("Plan ready", {
    portal: portal.records.length,
    calendar: calendar.records.length,
    conflicts: conflicts.length,
    actions: plan.items.filter((i) => i.action !== "SKIP").length,
  });

  return {
    window,
    portal,
    calendar,
    matches,
    conflicts,
    plan,
    warnings: [...normalizationWarnings(portal), ...normalizationWarnings(calendar), ...plan.warnings],
  };
}

function beginRun(options: CycleOptions): RunHandle {
  const run = { runId: randomUUID(), startedAt: new Date().toISOString() };
  createRun(run.runId, options.trigger, options.dryRun ?? false, run.startedAt);
  log.info("Starting sync cycle", { runId: run.runId, trigger: options.trigger, dryRun: options.dryRun ?? false });
  return run;
}

function buildReport(run: RunHandle, options: CycleOptions, outcome: CycleOutcome): SyncReport {
  const items = outcome.prepared?.plan.items ?? [];
  const count = (action: string) => items.filter((i) => i.action === action).length;

  return {
    runId: run.runId,
    trigger: options.trigger,
    dryRun: options.dryRun ?? false,
    startedAt: run.startedAt,
    completedAt: new Date().toISOString(),
    window: options.window,
    status: outcome.status,
    created: outcome.execution?.created ?? [],
    updated: outcome.execution?.updated ?? [],
    deleted: outcome.execution?.deleted ?? [],
    conflicts: outcome.prepared?.conflicts ?? [],
    failures: outcome.execution?.failures ?? [],
    warnings: [...(outcome.prepared?.warnings ?? []), ...(outcome.execution?.warnings ?? [])],
    planned: {
      create: count("CREATE"),
      update: count("UPDATE"),
      delete: count("DELETE"),
      skip: count("SKIP"),
    },
    ...(outcome.error ? { error: outcome.error } : {}),
  };
}

async function finishRun(run: RunHandle, deps: CycleDeps, options: CycleOptions, outcome: CycleOutcome): Promise<SyncReport> {
  const report = buildReport(run, options, outcome);
  completeRun(report);

  if (options.runRetentionDays) {
    const pruned = pruneRuns(daysBefore(new Date(), options.runRetentionDays));
    if (pruned > 0) log.info("Old sync runs pruned", { count: pruned, retentionDays: options.runRetentionDays });
  }

  const sink = deps.sink ?? new LoggingReportSink();
  try {
    await sink.publish(report);
  } catch (error) {
    log.error("Report sink failed", { runId: run.runId, error: errorMessage(error) });
  }
  return report;
}

function haltOn(error: AuthError): CycleOutcome {
  const state = setHaltState(error.message);
  log.error("Calendar credentials rejected; cycles halted until resumed", { haltedAt: state.haltedAt });
  return { status: "halted", error: error.message };
}

function logConflicts(run: RunHandle, prepared: PreparedCycle): void {
  const logged = appendConflicts(run.runId, prepared.conflicts);
  if (logged > 0) log.warn("New scheduling conflicts logged", { count: logged });
}

/** Bookings that ended before the window can no longer change; forget their mappings. */
function retirePastMappings(prepared: PreparedCycle): void {
  const retired = pruneMappingsEndedBefore(prepared.window.from);
  if (retired > 0) log.info("Mappings for past bookings retired", { count: retired, before: prepared.window.from });
}

export interface RecordedOutcome {
  status: "completed" | "cancelled";
  reason?: string;
}

/**
 * Record a prepared cycle that will not be executed: the plan was empty, or the
 * operator declined it. Conflicts are logged unless this is a dry run; the
 * calendar is not touched.
 */
export async function recordPreparedCycle(
  prepared: PreparedCycle,
  deps: CycleDeps,
  options: CycleOptions,
  outcome: RecordedOutcome,
  run: RunHandle = beginRun(options),
): Promise<SyncReport> {
  if (!options.dryRun) {
    logConflicts(run, prepared);
    if (outcome.status === "completed") retirePastMappings(prepared);
  }
  return finishRun(run, deps, options, {
    status: outcome.status,
    prepared,
    ...(outcome.reason ? { error: outcome.reason } : {}),
  });
}

/**
 * Execute an already-prepared plan under `lease` and publish the report.
 * With `dryRun` nothing is written: no calendar calls, no conflict log rows.
 */
export async function applyPreparedCycle(
  lease: CycleLease,
  prepared: PreparedCycle,
  deps: CycleDeps,
  options: CycleOptions,
  run: RunHandle = beginRun(options),
): Promise<SyncReport> {
  if (options.dryRun) {
    return recordPreparedCycle(prepared, deps, options, { status: "completed" }, run);
  }

  logConflicts(run, prepared);

  if (!lease.renew()) {
    return finishRun(run, deps, options, { status: "cancelled", error: "Cycle lease was lost before execution", prepared });
  }

  const execution = await executePlan(prepared.plan, {
    calendar: deps.calendar,
    retry: options.retry,
    concurrency: options.concurrency,
    callTimeoutMs: options.callTimeoutMs,
    clock: deps.clock,
    shouldStop: () => lease.isStopRequested(),
    renewLease: () => lease.renew(),
  });

  if (execution.halted) {
    return finishRun(run, deps, options, { ...haltOn(execution.halted), prepared, execution });
  }
  if (execution.leaseLost) {
    return finishRun(run, deps, options, { status: "cancelled", error: "Cycle lease was lost during execution", prepared, execution });
  }
  if (!execution.cancelled) retirePastMappings(prepared);

  const status: CycleStatus = execution.cancelled
    ? "cancelled"
    : execution.failures.length > 0
      ? "completed_with_errors"
      : "completed";
  return finishRun(run, deps, options, { status, prepared, execution });
}

/** One full cycle: halt check, fetch, plan, execute, report. Never throws for cycle-level failures. */
export async function runCycle(lease: CycleLease, deps: CycleDeps, options: CycleOptions): Promise<SyncReport> {
  const run = beginRun(options);

  const halt = getHaltState();
  if (halt) {
    log.warn("Sync is halted; skipping cycle", { since: halt.haltedAt, reason: halt.reason });
    return finishRun(run, deps, options, { status: "halted", error: `Halted since ${halt.haltedAt}: ${halt.reason}` });
  }

  let prepared: PreparedCycle;
  try {
    prepared = await prepareCycle(deps, options);
  } catch (error) {
    if (error instanceof AuthError) {
      return finishRun(run, deps, options, haltOn(error));
    }
    log.error("Cycle aborted before any change", { runId: run.runId, error: errorMessage(error) });
    return finishRun(run, deps, options, { status: "aborted", error: errorMessage(error) });
  }

  return applyPreparedCycle(lease, prepared, deps, options, run);
}

// --- Environment wiring ---

export interface CycleOverrides {
  dryRun?: boolean;
  window?: Partial<DateRange>;
}

export function cycleOptionsFromEnv(trigger: SyncTrigger, overrides: CycleOverrides = {}): CycleOptions {
  const env = getEnv();
  const defaults = syncWindow(new Date(), env.SYNC_WINDOW_DAYS);

  return {
    trigger,
    window: {
      from: overrides.window?.from ?? defaults.from,
      to: overrides.window?.to ?? defaults.to,
    },
    timeZone: env.SALON_TIMEZONE,
    dryRun: overrides.dryRun ?? env.SYNC_DRY_RUN,
    policy: { recreateExternallyDeleted: env.SYNC_RECREATE_EXTERNALLY_DELETED },
    retry: {
      maxAttempts: env.SYNC_MAX_ATTEMPTS,
      baseDelayMs: env.SYNC_RETRY_BASE_MS,
      maxDelayMs: env.SYNC_RETRY_MAX_MS,
    },
    concurrency: env.SYNC_CONCURRENCY,
    callTimeoutMs: env.SYNC_CALL_TIMEOUT_MS,
    scrapeTimeoutMs: env.SYNC_SCRAPE_TIMEOUT_MS,
    runRetentionDays: env.SYNC_RUN_RETENTION_DAYS,
  };
}

/** Salon Board and Google Calendar collaborators built from the environment. */
export function createCollaborators(): CycleDeps {
  const env = getEnv();

  const salonBoard = salonBoardCredentialsSchema.safeParse({
    url: env.SALON_BOARD_URL,
    username: env.SALON_BOARD_USERNAME,
    password: env.SALON_BOARD_PASSWORD,
  });
  if (!salonBoard.success) {
    throw new ConfigError(`Salon Board settings: ${salonBoard.error.issues.map((i) => i.message).join("; ")}`);
  }

  const google = googleCredentialsSchema.safeParse({
    clientId: env.GOOGLE_CLIENT_ID,
    clientSecret: env.GOOGLE_CLIENT_SECRET,
    refreshToken: env.GOOGLE_REFRESH_TOKEN,
    calendarId: env.GOOGLE_CALENDAR_ID,
  });
  if (!google.success) {
    throw new ConfigError(`Google Calendar settings: ${google.error.issues.map((i) => i.message).join("; ")}`);
  }

  return {
    portal: new SalonBoardClient(salonBoard.data, { timeZone: env.SALON_TIMEZONE }),
    calendar: GoogleCalendarClient.fromCredentials(google.data),
    sink: new LoggingReportSink(),
  };
}

export function createCycleLock(): CycleLock {
  return new CycleLock(getEnv().SYNC_LEASE_TTL_MINUTES * 60_000);
}

/**
 * Acquire the lease and run one cycle with env-configured collaborators.
 * Throws CycleInProgressError when another cycle holds the lease.
 */
export async function runConfiguredCycle(trigger: SyncTrigger, overrides: CycleOverrides = {}): Promise<SyncReport> {
  const options = cycleOptionsFromEnv(trigger, overrides);
  const deps = createCollaborators();
  try {
    return await withCycleLease(createCycleLock(), trigger, (lease) => runCycle(lease, deps, options));
  } finally {
    await deps.portal.close?.();
  }
}

// --- Operator controls ---

export interface SyncStatus {
  latestRun: SyncRunRecord | null;
  lease: LeaseRecord | null;
  halt: HaltState | null;
  recentConflicts: LoggedConflict[];
}

export function getSyncStatus(conflictLimit = 20): SyncStatus {
  return {
    latestRun: getLatestRun() ?? null,
    lease: getLease() ?? null,
    halt: getHaltState() ?? null,
    recentConflicts: listRecentConflicts(conflictLimit),
  };
}

/** Ask the running cycle to stop at the next plan-item boundary. False if none is running. */
export function requestCycleStop(): boolean {
  const requested = createCycleLock().requestStop();
  log.info(requested ? "Stop requested for running cycle" : "No cycle running; nothing to stop");
  return requested;
}

/** Clear the halt left by rejected calendar credentials. */
export function resumeAfterAuthFailure(): boolean {
  const cleared = clearHaltState();
  log.info(cleared ? "Sync resumed" : "Sync was not halted");
  return cleared;
}

/**
 * Forget the mapping for a booking, so the next cycle creates a fresh event for it.
 * This is how an operator confirms recreating an externally deleted event.
 */
export function releaseMapping(portalId: string): boolean {
  const released = retireMapping(portalId);
  if (released) {
    log.info("Mapping released; booking will be recreated next cycle", { portalId });
  } else {
    log.warn("No mapping found to release", { portalId });
  }
  return released;
}
