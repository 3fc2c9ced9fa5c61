export type Origin = "PORTAL" | "CALENDAR";

export type AppointmentStatus = "CONFIRMED" | "CANCELLED";

/** Half-open time window `[from, to)`, ISO-8601 UTC. */
export interface DateRange {
  from: string;
  to: string;
}

/**
 * A reservation row as scraped from Salon Board. Every field is whatever text the
 * page gave us; nothing here is trusted until the normalizer has seen it.
 */
export interface PortalAppointment {
  bookingId?: string | null;
  customerName?: string | null;
  serviceName?: string | null;
  staffName?: string | null;
  startTime?: string | null;
  endTime?: string | null;
  status?: string | null;
  customerPhone?: string | null;
  customerEmail?: string | null;
}

/** A calendar event as returned by the calendar collaborator. */
export interface CalendarEvent {
  id: string;
  summary?: string | null;
  description?: string | null;
  start?: string | null;
  end?: string | null;
  allDay?: boolean;
  status?: string | null;
  /** Portal booking number written onto events this system created. */
  portalId?: string | null;
  idempotencyToken?: string | null;
}

/** Fields the sync engine writes onto a calendar event. */
export interface CalendarEventFields {
  summary: string;
  description: string;
  start: string;
  end: string;
  portalId: string;
}

export interface AppointmentRecord {
  sourceId: string;
  origin: Origin;
  start: string;
  end: string;
  customerLabel: string;
  description: string;
  status: AppointmentStatus;
  portalId: string | null;
  fingerprint: string;
}

export interface NormalizationWarning {
  origin: Origin;
  sourceId: string | null;
  reason: string;
}

export interface NormalizedSnapshot {
  records: AppointmentRecord[];
  warnings: NormalizationWarning[];
}

export type MappingStatus = "pending" | "synced";

export interface SyncMapping {
  portalId: string;
  calendarEventId: string | null;
  idempotencyToken: string;
  lastFingerprint: string | null;
  syncStatus: MappingStatus;
  lastSyncedAt: string | null;
  /** Slot of the booking as last written; null for rows that predate it. */
  appointmentStart: string | null;
  appointmentEnd: string | null;
  createdAt: string;
  updatedAt: string;
}

export type MatchKind = "NEW" | "UNCHANGED" | "MODIFIED" | "REMOVED" | "EXTERNALLY_DELETED";

export interface MatchResult {
  kind: MatchKind;
  portalId: string;
  /** Null when the booking vanished from the portal snapshot. */
  record: AppointmentRecord | null;
  mapping: SyncMapping | null;
  calendarRecord: AppointmentRecord | null;
}

export type PlanAction = "CREATE" | "UPDATE" | "DELETE" | "SKIP";

export type SkipReason = "unchanged" | "externally_deleted" | "conflict";

export interface SyncPlanItem {
  action: PlanAction;
  portalId: string;
  mapping: SyncMapping | null;
  record: AppointmentRecord | null;
  calendarEventId: string | null;
  reason?: SkipReason;
}

export interface SyncPlan {
  items: SyncPlanItem[];
  warnings: SyncWarning[];
}

export type ConflictKind = "PORTAL_PORTAL" | "PORTAL_CALENDAR";

export type ConflictResolution = "MANUAL_REVIEW_REQUIRED" | "PORTAL_WINS";

export interface ConflictRecord {
  key: string;
  kind: ConflictKind;
  resolution: ConflictResolution;
  reason: string;
  records: [AppointmentRecord, AppointmentRecord];
  detectedAt: string;
}

export type WarningCode =
  | "NORMALIZATION"
  | "EXTERNALLY_DELETED"
  | "CONFLICT_SKIPPED"
  | "DUPLICATE_BOOKING"
  | "NOT_ATTEMPTED";

export interface SyncWarning {
  code: WarningCode;
  message: string;
  portalId?: string;
  origin?: Origin;
}

export interface AppliedChange {
  portalId: string;
  /** Null for a retired mapping whose event was never created. */
  calendarEventId: string | null;
  attempts: number;
}

export interface SyncFailure {
  portalId: string;
  action: PlanAction;
  error: string;
  attempts: number;
}

export type SyncTrigger = "scheduled" | "manual" | "cli";

export type CycleStatus = "completed" | "completed_with_errors" | "aborted" | "halted" | "cancelled";

export interface SyncReport {
  runId: string;
  trigger: SyncTrigger;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  window: DateRange;
  status: CycleStatus;
  created: AppliedChange[];
  updated: AppliedChange[];
  deleted: AppliedChange[];
  conflicts: ConflictRecord[];
  failures: SyncFailure[];
  warnings: SyncWarning[];
  planned: {
    create: number;
    update: number;
    delete: number;
    skip: number;
  };
  error?: string;
}

/** Portal collaborator. */
export interface PortalSource {
  fetchPortalAppointments(range: DateRange): Promise<PortalAppointment[]>;
  close?(): Promise<void>;
}

/** Calendar collaborator. */
export interface CalendarGateway {
  listEvents(range: DateRange): Promise<CalendarEvent[]>;
  createEvent(fields: CalendarEventFields, idempotencyToken: string): Promise<string>;
  updateEvent(eventId: string, fields: CalendarEventFields): Promise<void>;
  deleteEvent(eventId: string): Promise<void>;
}

/** Dashboard/notification collaborator. */
export interface ReportSink {
  publish(report: SyncReport): Promise<void>;
}
