import { getDatabase } from "./db";
import type { ConflictRecord, CycleStatus, DateRange, MappingStatus, SyncMapping, SyncReport, SyncTrigger } from "@/sync/types";
import type { HaltState, LeaseRecord, LoggedConflict, SyncRunRecord } from "./types";

/** Start and end of the booking a mapping tracks. */
export interface MappingSlot {
  start: string;
  end: string;
}

export interface MappingFilter {
  /** Bookings starting at or after this instant. */
  from?: string;
  /** Bookings starting before this instant. */
  to?: string;
  status?: MappingStatus;
  limit?: number;
}

export interface RunFilter {
  from?: string;
  to?: string;
  status?: CycleStatus | "running";
  limit?: number;
}

function whereClause(conditions: string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
}

// --- Mappings ---

export function findMapping(portalId: string): SyncMapping | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM sync_mappings WHERE portal_id = ?")
    .get(portalId) as RawMappingRow | undefined;
  return row ? toMapping(row) : undefined;
}

export function findMappingByEventId(calendarEventId: string): SyncMapping | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM sync_mappings WHERE calendar_event_id = ?")
    .get(calendarEventId) as RawMappingRow | undefined;
  return row ? toMapping(row) : undefined;
}

export function listMappings(filter: MappingFilter = {}): SyncMapping[] {
  const db = getDatabase();
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (filter.from) {
    conditions.push("appointment_start >= ?");
    params.push(filter.from);
  }
  if (filter.to) {
    conditions.push("appointment_start < ?");
    params.push(filter.to);
  }
  if (filter.status) {
    conditions.push("sync_status = ?");
    params.push(filter.status);
  }
  const limit = filter.limit === undefined ? "" : " LIMIT ?";
  if (filter.limit !== undefined) params.push(filter.limit);

  const rows = db
    .prepare(`SELECT * FROM sync_mappings ${whereClause(conditions)} ORDER BY portal_id${limit}`)
    .all(...params) as RawMappingRow[];
  return rows.map(toMapping);
}

/**
 * Record the intent to create an event before the remote write happens.
 * Any previous event reference for the booking is dropped: the row now waits
 * for the event created under `idempotencyToken`.
 */
export function reserveMapping(portalId: string, idempotencyToken: string, slot?: MappingSlot): SyncMapping {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO sync_mappings (portal_id, calendar_event_id, idempotency_token, last_fingerprint, sync_status, last_synced_at, appointment_start, appointment_end, created_at, updated_at)
    VALUES (?, NULL, ?, NULL, 'pending', NULL, ?, ?, ?, ?)
    ON CONFLICT(portal_id) DO UPDATE SET
      calendar_event_id = CASE WHEN sync_mappings.idempotency_token = excluded.idempotency_token THEN sync_mappings.calendar_event_id ELSE NULL END,
      idempotency_token = excluded.idempotency_token,
      sync_status = CASE WHEN sync_mappings.idempotency_token = excluded.idempotency_token THEN sync_mappings.sync_status ELSE 'pending' END,
      appointment_start = COALESCE(excluded.appointment_start, sync_mappings.appointment_start),
      appointment_end = COALESCE(excluded.appointment_end, sync_mappings.appointment_end),
      updated_at = excluded.updated_at
  `).run(portalId, idempotencyToken, slot?.start ?? null, slot?.end ?? null, now, now);

  const mapping = findMapping(portalId);
  if (!mapping) {
    throw new Error(`Mapping for ${portalId} vanished after reserve`);
  }
  return mapping;
}

/** Attach the acknowledged event to a reserved mapping. */
export function confirmMapping(
  portalId: string,
  idempotencyToken: string,
  calendarEventId: string,
  lastFingerprint: string,
): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  const confirm = db.transaction(() => {
    const result = db.prepare(`
      UPDATE sync_mappings
      SET calendar_event_id = ?, last_fingerprint = ?, sync_status = 'synced', last_synced_at = ?, updated_at = ?
      WHERE portal_id = ? AND idempotency_token = ?
    `).run(calendarEventId, lastFingerprint, now, now, portalId, idempotencyToken);

    if (result.changes !== 1) {
      throw new Error(`No reserved mapping for ${portalId} with the expected idempotency token`);
    }
  });
  confirm();
}

export function refreshFingerprint(portalId: string, lastFingerprint: string, slot?: MappingSlot): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    UPDATE sync_mappings
    SET last_fingerprint = ?, sync_status = 'synced', last_synced_at = ?,
      appointment_start = COALESCE(?, appointment_start),
      appointment_end = COALESCE(?, appointment_end),
      updated_at = ?
    WHERE portal_id = ?
  `).run(lastFingerprint, now, slot?.start ?? null, slot?.end ?? null, now, portalId);
}

/** Remove the mapping. Returns false when there was nothing to remove. */
export function retireMapping(portalId: string): boolean {
  const db = getDatabase();
  const result = db.prepare("DELETE FROM sync_mappings WHERE portal_id = ?").run(portalId);
  return result.changes > 0;
}

/**
 * Drop mappings for bookings that ended before `cutoff`. Their events are left on
 * the calendar as history. Mappings without a recorded end are kept.
 */
export function pruneMappingsEndedBefore(cutoff: string): number {
  const db = getDatabase();
  return db
    .prepare("DELETE FROM sync_mappings WHERE appointment_end IS NOT NULL AND appointment_end <= ?")
    .run(cutoff).changes;
}

// --- Conflict log ---

/** Append conflicts not seen before. Returns how many were new. */
export function appendConflicts(runId: string, conflicts: ConflictRecord[]): number {
  const db = getDatabase();
  const insert = db.prepare(`
    INSERT OR IGNORE INTO conflict_log (conflict_key, run_id, kind, resolution, reason, records_json, detected_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const appendAll = db.transaction((items: ConflictRecord[]) => {
    let inserted = 0;
    for (const c of items) {
      inserted += insert.run(c.key, runId, c.kind, c.resolution, c.reason, JSON.stringify(c.records), c.detectedAt).changes;
    }
    return inserted;
  });
  return appendAll(conflicts);
}

export function listRecentConflicts(limit = 50): LoggedConflict[] {
  const db = getDatabase();
  const rows = db
    .prepare("SELECT * FROM conflict_log ORDER BY detected_at DESC, id DESC LIMIT ?")
    .all(limit) as RawConflictRow[];
  return rows.map(toLoggedConflict);
}

// --- Sync Runs ---

export function createRun(runId: string, trigger: SyncTrigger, dryRun: boolean, startedAt: string): void {
  const db = getDatabase();

  db.prepare(`
    INSERT INTO sync_runs (run_id, started_at, trigger, dry_run, status)
    VALUES (?, ?, ?, ?, 'running')
  `).run(runId, startedAt, trigger, dryRun ? 1 : 0);
}

export function completeRun(report: SyncReport): void {
  const db = getDatabase();

  db.prepare(`
    UPDATE sync_runs
    SET completed_at = ?, report_json = ?, status = ?
    WHERE run_id = ?
  `).run(report.completedAt, JSON.stringify(report), report.status, report.runId);
}

export function getLatestRun(): SyncRunRecord | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM sync_runs ORDER BY id DESC LIMIT 1")
    .get() as RawRunRow | undefined;
  return row ? toRunRecord(row) : undefined;
}

export function listRuns(filter: RunFilter = {}): SyncRunRecord[] {
  const db = getDatabase();
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (filter.from) {
    conditions.push("started_at >= ?");
    params.push(filter.from);
  }
  if (filter.to) {
    conditions.push("started_at < ?");
    params.push(filter.to);
  }
  if (filter.status) {
    conditions.push("status = ?");
    params.push(filter.status);
  }
  params.push(filter.limit ?? 50);

  const rows = db
    .prepare(`SELECT * FROM sync_runs ${whereClause(conditions)} ORDER BY id DESC LIMIT ?`)
    .all(...params) as RawRunRow[];
  return rows.map(toRunRecord);
}

/** Delete finished runs that started before `cutoff`. Running rows are kept. */
export function pruneRuns(cutoff: string): number {
  const db = getDatabase();
  return db
    .prepare("DELETE FROM sync_runs WHERE started_at < ? AND status != 'running'")
    .run(cutoff).changes;
}

// --- Cycle lease ---

export type LeaseAttempt =
  | { acquired: true; lease: LeaseRecord }
  | { acquired: false; current: LeaseRecord };

export function tryAcquireLease(holder: string, trigger: SyncTrigger, now: Date, ttlMs: number): LeaseAttempt {
  const db = getDatabase();

  const acquire = db.transaction((): LeaseAttempt => {
    const row = db.prepare("SELECT * FROM sync_lease WHERE id = 1").get() as RawLeaseRow | undefined;
    if (row && Date.parse(row.expires_at) > now.getTime()) {
      return { acquired: false, current: toLease(row) };
    }

    const acquiredAt = now.toISOString();
    const expiresAt = new Date(now.getTime() + ttlMs).toISOString();
    db.prepare(`
      INSERT INTO sync_lease (id, holder, trigger, acquired_at, expires_at, cancel_requested)
      VALUES (1, ?, ?, ?, ?, 0)
      ON CONFLICT(id) DO UPDATE SET
        holder = excluded.holder,
        trigger = excluded.trigger,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        cancel_requested = 0
    `).run(holder, trigger, acquiredAt, expiresAt);

    return {
      acquired: true,
      lease: { holder, trigger, acquiredAt, expiresAt, cancelRequested: false },
    };
  });
  return acquire.immediate();
}

export function renewLease(holder: string, now: Date, ttlMs: number): boolean {
  const db = getDatabase();
  const expiresAt = new Date(now.getTime() + ttlMs).toISOString();
  const result = db
    .prepare("UPDATE sync_lease SET expires_at = ? WHERE id = 1 AND holder = ?")
    .run(expiresAt, holder);
  return result.changes === 1;
}

export function releaseLease(holder: string): void {
  const db = getDatabase();
  db.prepare("DELETE FROM sync_lease WHERE id = 1 AND holder = ?").run(holder);
}

export function getLease(): LeaseRecord | undefined {
  const db = getDatabase();
  const row = db.prepare("SELECT * FROM sync_lease WHERE id = 1").get() as RawLeaseRow | undefined;
  return row ? toLease(row) : undefined;
}

/** Flag the running cycle for cancellation. Returns false when no cycle holds the lease. */
export function requestLeaseCancel(): boolean {
  const db = getDatabase();
  const result = db.prepare("UPDATE sync_lease SET cancel_requested = 1 WHERE id = 1").run();
  return result.changes === 1;
}

// --- Halt state ---

const HALT_KEY = "auth_halt";

export function getHaltState(): HaltState | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT value FROM sync_state WHERE key = ?")
    .get(HALT_KEY) as { value: string } | undefined;
  return row ? (JSON.parse(row.value) as HaltState) : undefined;
}

export function setHaltState(reason: string): HaltState {
  const db = getDatabase();
  const state: HaltState = { reason, haltedAt: new Date().toISOString() };
  db.prepare(`
    INSERT INTO sync_state (key, value, updated_at) VALUES (?, ?, ?)
    ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
  `).run(HALT_KEY, JSON.stringify(state), state.haltedAt);
  return state;
}

export function clearHaltState(): boolean {
  const db = getDatabase();
  return db.prepare("DELETE FROM sync_state WHERE key = ?").run(HALT_KEY).changes > 0;
}

// --- Internal helpers ---

interface RawMappingRow {
  portal_id: string;
  calendar_event_id: string | null;
  idempotency_token: string;
  last_fingerprint: string | null;
  sync_status: string;
  last_synced_at: string | null;
  appointment_start: string | null;
  appointment_end: string | null;
  created_at: string;
  updated_at: string;
}

interface RawConflictRow {
  id: number;
  conflict_key: string;
  run_id: string;
  kind: string;
  resolution: string;
  reason: string;
  records_json: string;
  detected_at: string;
}

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  trigger: string;
  dry_run: number;
  report_json: string | null;
  status: string;
}

interface RawLeaseRow {
  id: number;
  holder: string;
  trigger: string;
  acquired_at: string;
  expires_at: string;
  cancel_requested: number;
}

function toMapping(row: RawMappingRow): SyncMapping {
  return {
    portalId: row.portal_id,
    calendarEventId: row.calendar_event_id,
    idempotencyToken: row.idempotency_token,
    lastFingerprint: row.last_fingerprint,
    syncStatus: row.sync_status === "synced" ? "synced" : "pending",
    lastSyncedAt: row.last_synced_at,
    appointmentStart: row.appointment_start,
    appointmentEnd: row.appointment_end,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toLoggedConflict(row: RawConflictRow): LoggedConflict {
  return {
    key: row.conflict_key,
    runId: row.run_id,
    kind: row.kind as ConflictRecord["kind"],
    resolution: row.resolution as ConflictRecord["resolution"],
    reason: row.reason,
    records: JSON.parse(row.records_json) as ConflictRecord["records"],
    detectedAt: row.detected_at,
  };
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    trigger: row.trigger as SyncTrigger,
    dryRun: row.dry_run === 1,
    status: row.status as CycleStatus | "running",
    report: row.report_json ? (JSON.parse(row.report_json) as SyncReport) : null,
  };
}

function toLease(row: RawLeaseRow): LeaseRecord {
  return {
    holder: row.holder,
    trigger: row.trigger as SyncTrigger,
    acquiredAt: row.acquired_at,
    expiresAt: row.expires_at,
    cancelRequested: row.cancel_requested === 1,
  };
}
