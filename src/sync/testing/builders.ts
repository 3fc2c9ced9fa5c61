import { fingerprint } from "@/sync/ledger/hash";
import type { AppointmentRecord, AppointmentStatus, SyncMapping } from "@/sync/types";

export const WINDOW = { from: "2026-10-19T00:00:00.000Z", to: "2026-11-18T00:00:00.000Z" };

interface RecordOptions {
  label?: string;
  status?: AppointmentStatus;
  portalId?: string | null;
}

function build(origin: AppointmentRecord["origin"], id: string, start: string, end: string, options: RecordOptions, portalId: string | null): AppointmentRecord {
  const customerLabel = options.label ?? "Sato - Cut";
  const status = options.status ?? "CONFIRMED";
  return {
    sourceId: id,
    origin,
    start,
    end,
    customerLabel,
    description: "",
    status,
    portalId,
    fingerprint: fingerprint({ start, end, customerLabel, status }),
  };
}

export function portalRecord(id: string, start: string, end: string, options: RecordOptions = {}): AppointmentRecord {
  return build("PORTAL", id, start, end, options, id);
}

export function calendarRecord(id: string, start: string, end: string, options: RecordOptions = {}): AppointmentRecord {
  return build("CALENDAR", id, start, end, options, options.portalId ?? null);
}

export function mappingFor(
  portalId: string,
  calendarEventId: string | null,
  lastFingerprint: string | null,
  idempotencyToken = `token-${portalId}`,
): SyncMapping {
  return {
    portalId,
    calendarEventId,
    idempotencyToken,
    lastFingerprint,
    syncStatus: calendarEventId ? "synced" : "pending",
    lastSyncedAt: calendarEventId ? "2026-10-18T00:00:00.000Z" : null,
    appointmentStart: null,
    appointmentEnd: null,
    createdAt: "2026-10-18T00:00:00.000Z",
    updatedAt: "2026-10-18T00:00:00.000Z",
  };
}
