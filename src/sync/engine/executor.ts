import { randomUUID } from "crypto";
import { AuthError, NotFoundError, isTransient } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { confirmMapping, findMapping, refreshFingerprint, reserveMapping, retireMapping } from "@/sync/ledger/repository";
import { backoffDelay, systemClock, withTimeout, DEFAULT_RETRY_POLICY, type Clock, type RetryPolicy } from "./retry";
import type {
  AppliedChange,
  AppointmentRecord,
  CalendarEventFields,
  CalendarGateway,
  PlanAction,
  SyncFailure,
  SyncPlan,
  SyncPlanItem,
  SyncWarning,
} from "@/sync/types";

const log = createChildLogger("sync-executor");

export type TaskState = "PENDING" | "IN_FLIGHT" | "RETRY_WAIT" | "FAILED" | "DONE";

export interface PlanTask {
  item: SyncPlanItem;
  state: TaskState;
  attempts: number;
  /** Clock time at which a RETRY_WAIT task becomes runnable again. */
  readyAt: number;
  lastError: string | null;
  result: AppliedChange | null;
}

export interface ExecuteOptions {
  calendar: CalendarGateway;
  retry?: RetryPolicy;
  concurrency?: number;
  callTimeoutMs?: number;
  clock?: Clock;
  /** Polled between tasks; in-flight remote calls are allowed to finish. */
  shouldStop?: () => boolean;
  /** Called at each phase boundary and before a backoff wait. False ends execution as cancelled. */
  renewLease?: () => boolean;
}

export interface ExecutionResult {
  created: AppliedChange[];
  updated: AppliedChange[];
  deleted: AppliedChange[];
  failures: SyncFailure[];
  warnings: SyncWarning[];
  tasks: PlanTask[];
  halted: AuthError | null;
  cancelled: boolean;
  leaseLost: boolean;
}

const PHASES: PlanAction[] = ["DELETE", "UPDATE", "CREATE"];

export function eventFieldsFor(record: AppointmentRecord): CalendarEventFields {
  return {
    summary: record.customerLabel,
    description: record.description,
    start: record.start,
    end: record.end,
    portalId: record.sourceId,
  };
}

/** Items touching the same calendar event (or booking) must never run concurrently. */
function laneKey(item: SyncPlanItem): string {
  return item.calendarEventId ? `event:${item.calendarEventId}` : `portal:${item.portalId}`;
}

function requireRecord(item: SyncPlanItem): AppointmentRecord {
  if (!item.record) {
    throw new Error(`${item.action} for ${item.portalId} has no portal record`);
  }
  return item.record;
}

export class PlanExecutor {
  private readonly calendar: CalendarGateway;
  private readonly retry: RetryPolicy;
  private readonly concurrency: number;
  private readonly callTimeoutMs: number;
  private readonly clock: Clock;
  private readonly shouldStop: () => boolean;
  private readonly renewLease: () => boolean;

  private halted: AuthError | null = null;
  private cancelled = false;
  private leaseLost = false;
  private readonly warnings: SyncWarning[] = [];

  constructor(options: ExecuteOptions) {
    this.calendar = options.calendar;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.callTimeoutMs = options.callTimeoutMs ?? 20_000;
    this.clock = options.clock ?? systemClock;
    this.shouldStop = options.shouldStop ?? (() => false);
    this.renewLease = options.renewLease ?? (() => true);
  }

  async execute(plan: SyncPlan): Promise<ExecutionResult> {
    const tasks: PlanTask[] = plan.items
      .filter((item) => item.action !== "SKIP")
      .map((item): PlanTask => ({ item, state: "PENDING", attempts: 0, readyAt: 0, lastError: null, result: null }));

    let started = false;
    for (const phase of PHASES) {
      if (this.halted || this.cancelled) break;
      const phaseTasks = tasks.filter((t) => t.item.action === phase);
      if (phaseTasks.length === 0) continue;
      if (started && !this.keepLease()) break;
      started = true;
      await this.runPhase(phaseTasks);
    }

    return this.collect(tasks);
  }

  private keepLease(): boolean {
    if (this.renewLease()) return true;
    this.cancelled = true;
    this.leaseLost = true;
    log.warn("Cycle lease lost during execution; not starting further work");
    return false;
  }

  /**
   * Scheduler loop for one phase. Starts runnable lane heads up to the concurrency
   * bound, parks failed-transient tasks in RETRY_WAIT, and only waits on the clock
   * when nothing is runnable and nothing is in flight.
   */
  private async runPhase(tasks: PlanTask[]): Promise<void> {
    const lanes = new Map<string, PlanTask[]>();
    for (const task of tasks) {
      const key = laneKey(task.item);
      const lane = lanes.get(key) ?? [];
      lane.push(task);
      lanes.set(key, lane);
    }

    const busy = new Set<string>();
    const inFlight = new Map<string, Promise<void>>();

    const head = (lane: PlanTask[]) => lane.find((t) => t.state !== "DONE" && t.state !== "FAILED");

    for (;;) {
      if (!this.halted && !this.cancelled && this.shouldStop()) {
        this.cancelled = true;
        log.warn("Stop requested; finishing in-flight tasks only", { inFlight: inFlight.size });
      }

      if (!this.halted && !this.cancelled) {
        const now = this.clock.now();
        for (const [key, lane] of lanes) {
          if (inFlight.size >= this.concurrency) break;
          if (busy.has(key)) continue;
          const task = head(lane);
          if (!task) continue;
          if (task.state === "RETRY_WAIT" && task.readyAt > now) continue;

          busy.add(key);
          inFlight.set(
            key,
            this.attempt(task).finally(() => {
              busy.delete(key);
              inFlight.delete(key);
            }),
          );
        }
      }

      if (inFlight.size > 0) {
        await Promise.race(inFlight.values());
        continue;
      }

      if (this.halted || this.cancelled) return;

      const waiting = [...lanes.values()]
        .map(head)
        .filter((t): t is PlanTask => t !== undefined && t.state === "RETRY_WAIT");
      if (waiting.length === 0) return;

      if (!this.keepLease()) return;
      const earliest = Math.min(...waiting.map((t) => t.readyAt));
      await this.clock.wait(Math.max(0, earliest - this.clock.now()));
    }
  }

  private async attempt(task: PlanTask): Promise<void> {
    task.state = "IN_FLIGHT";
    task.attempts += 1;

    try {
      task.result = await this.apply(task);
      task.state = "DONE";
      log.info("Plan item applied", {
        action: task.item.action,
        portalId: task.item.portalId,
        eventId: task.result?.calendarEventId,
        attempts: task.attempts,
      });
    } catch (error) {
      task.lastError = errorMessage(error);

      if (error instanceof AuthError) {
        task.state = "FAILED";
        this.halted = error;
        log.error("Calendar rejected credentials; halting execution", { portalId: task.item.portalId, error: task.lastError });
        return;
      }

      if (isTransient(error) && task.attempts < this.retry.maxAttempts) {
        const delay = backoffDelay(this.retry, task.attempts);
        task.state = "RETRY_WAIT";
        task.readyAt = this.clock.now() + delay;
        log.warn("Transient failure; will retry", {
          action: task.item.action,
          portalId: task.item.portalId,
          attempt: task.attempts,
          delayMs: delay,
          error: task.lastError,
        });
        return;
      }

      task.state = "FAILED";
      log.error("Plan item failed", {
        action: task.item.action,
        portalId: task.item.portalId,
        attempts: task.attempts,
        error: task.lastError,
      });
    }
  }

  private call<T>(label: string, action: () => Promise<T>): Promise<T> {
    return withTimeout(action, this.callTimeoutMs, label);
  }

  /** Resolves to null when the item turned out to need no change. */
  private async apply(task: PlanTask): Promise<AppliedChange | null> {
    const { item } = task;
    switch (item.action) {
      case "CREATE":
        return this.applyCreate(item, task.attempts);
      case "UPDATE":
        return this.applyUpdate(item, task.attempts);
      case "DELETE":
        return this.applyDelete(item, task.attempts);
      case "SKIP":
        throw new Error(`SKIP item for ${item.portalId} reached the executor`);
    }
  }

  private async applyCreate(item: SyncPlanItem, attempts: number): Promise<AppliedChange> {
    const record = requireRecord(item);

    // Reuse the token of a create that was never acknowledged (an earlier attempt in
    // this run, or a previous cycle); anything else is a fresh event and gets a fresh token.
    const current = findMapping(item.portalId);
    const token = current && current.calendarEventId === null ? current.idempotencyToken : randomUUID();
    reserveMapping(item.portalId, token, { start: record.start, end: record.end });

    const eventId = await this.call(`createEvent ${item.portalId}`, () =>
      this.calendar.createEvent(eventFieldsFor(record), token),
    );
    confirmMapping(item.portalId, token, eventId, record.fingerprint);

    return { portalId: item.portalId, calendarEventId: eventId, attempts };
  }

  private async applyUpdate(item: SyncPlanItem, attempts: number): Promise<AppliedChange | null> {
    const record = requireRecord(item);
    const eventId = item.calendarEventId;
    if (!eventId) {
      throw new Error(`UPDATE for ${item.portalId} has no calendar event`);
    }

    try {
      await this.call(`updateEvent ${eventId}`, () => this.calendar.updateEvent(eventId, eventFieldsFor(record)));
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      // Left for the next cycle to classify as EXTERNALLY_DELETED.
      this.warnings.push({
        code: "EXTERNALLY_DELETED",
        message: `Calendar event ${eventId} for booking ${item.portalId} disappeared before it could be updated`,
        portalId: item.portalId,
        origin: "CALENDAR",
      });
      return null;
    }
    refreshFingerprint(item.portalId, record.fingerprint, { start: record.start, end: record.end });

    return { portalId: item.portalId, calendarEventId: eventId, attempts };
  }

  private async applyDelete(item: SyncPlanItem, attempts: number): Promise<AppliedChange> {
    const eventId = item.calendarEventId;
    if (eventId) {
      try {
        await this.call(`deleteEvent ${eventId}`, () => this.calendar.deleteEvent(eventId));
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        log.info("Event already gone; retiring mapping", { portalId: item.portalId, eventId });
      }
    }
    retireMapping(item.portalId);

    return { portalId: item.portalId, calendarEventId: eventId, attempts };
  }

  private collect(tasks: PlanTask[]): ExecutionResult {
    const done = (action: PlanAction) =>
      tasks.flatMap((t) => (t.item.action === action && t.state === "DONE" && t.result ? [t.result] : []));

    const failures: SyncFailure[] = [];
    const warnings = [...this.warnings];

    for (const task of tasks) {
      if (task.state === "FAILED" || (task.state === "RETRY_WAIT" && this.halted)) {
        failures.push({
          portalId: task.item.portalId,
          action: task.item.action,
          error: task.lastError ?? "unknown error",
          attempts: task.attempts,
        });
      } else if (task.state === "PENDING" || task.state === "RETRY_WAIT") {
        warnings.push({
          code: "NOT_ATTEMPTED",
          message: `${task.item.action} for booking ${task.item.portalId} was not applied (${this.halted ? "sync halted" : "sync stopped"})`,
          portalId: task.item.portalId,
        });
      }
    }

    return {
      created: done("CREATE"),
      updated: done("UPDATE"),
      deleted: done("DELETE"),
      failures,
      warnings,
      tasks,
      halted: this.halted,
      cancelled: this.cancelled,
      leaseLost: this.leaseLost,
    };
  }
}

export function executePlan(plan: SyncPlan, options: ExecuteOptions): Promise<ExecutionResult> {
  return new PlanExecutor(options).execute(plan);
}
