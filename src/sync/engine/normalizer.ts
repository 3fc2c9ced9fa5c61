import { z } from "zod";
import { fingerprint } from "@/sync/ledger/hash";
import { parseTimestamp } from "./time";
import type {
  AppointmentRecord,
  AppointmentStatus,
  CalendarEvent,
  NormalizationWarning,
  NormalizedSnapshot,
  Origin,
  PortalAppointment,
} from "@/sync/types";

export interface NormalizeOptions {
  /** IANA zone the salon's wall-clock times are expressed in. */
  timeZone: string;
}

const text = z
  .string()
  .nullish()
  .transform((v) => v?.replace(/\s+/g, " ").trim() ?? "");

const portalRowSchema = z.object({
  bookingId: text.refine((v) => v.length > 0, "missing booking number"),
  customerName: text,
  serviceName: text,
  staffName: text,
  startTime: text,
  endTime: text,
  status: text,
  customerPhone: text,
  customerEmail: text,
});

const CANCELLED_MARKERS = ["cancel", "キャンセル", "取消"];

function portalStatus(raw: string): AppointmentStatus {
  const lowered = raw.toLowerCase();
  return CANCELLED_MARKERS.some((m) => lowered.includes(m)) ? "CANCELLED" : "CONFIRMED";
}

function warning(origin: Origin, sourceId: string | null, reason: string): NormalizationWarning {
  return { origin, sourceId, reason };
}

type Interval = { start: string; end: string } | { problem: string };

function resolveInterval(
  rawStart: string | null | undefined,
  rawEnd: string | null | undefined,
  timeZone: string,
): Interval {
  const start = parseTimestamp(rawStart, timeZone);
  if (!start) return { problem: `unresolvable start "${rawStart ?? ""}"` };
  const end = parseTimestamp(rawEnd, timeZone);
  if (!end) return { problem: `unresolvable end "${rawEnd ?? ""}"` };
  if (start.getTime() >= end.getTime()) {
    return { problem: `start ${start.toISOString()} is not before end ${end.toISOString()}` };
  }
  return { start: start.toISOString(), end: end.toISOString() };
}

export function customerLabelFor(customerName: string, serviceName: string): string {
  const name = customerName || "Walk-in";
  return serviceName ? `${name} - ${serviceName}` : name;
}

export function normalizePortalAppointments(
  raw: PortalAppointment[],
  options: NormalizeOptions,
): NormalizedSnapshot {
  const records: AppointmentRecord[] = [];
  const warnings: NormalizationWarning[] = [];

  for (const row of raw) {
    const parsed = portalRowSchema.safeParse(row);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => i.message).join("; ");
      warnings.push(warning("PORTAL", row.bookingId?.trim() || null, reason));
      continue;
    }

    const appt = parsed.data;
    const interval = resolveInterval(appt.startTime, appt.endTime, options.timeZone);
    if ("problem" in interval) {
      warnings.push(warning("PORTAL", appt.bookingId, interval.problem));
      continue;
    }

    const customerLabel = customerLabelFor(appt.customerName, appt.serviceName);
    const status = portalStatus(appt.status);
    const description = [
      `Customer: ${appt.customerName || "-"}`,
      appt.serviceName && `Service: ${appt.serviceName}`,
      appt.staffName && `Staff: ${appt.staffName}`,
      appt.customerPhone && `Phone: ${appt.customerPhone}`,
      appt.customerEmail && `Email: ${appt.customerEmail}`,
      `Booking: ${appt.bookingId}`,
    ]
      .filter(Boolean)
      .join("\n");

    records.push({
      sourceId: appt.bookingId,
      origin: "PORTAL",
      start: interval.start,
      end: interval.end,
      customerLabel,
      description,
      status,
      portalId: appt.bookingId,
      fingerprint: fingerprint({ start: interval.start, end: interval.end, customerLabel, status }),
    });
  }

  return { records, warnings };
}

export function normalizeCalendarEvents(
  raw: CalendarEvent[],
  options: NormalizeOptions,
): NormalizedSnapshot {
  const records: AppointmentRecord[] = [];
  const warnings: NormalizationWarning[] = [];

  for (const event of raw) {
    const id = event.id.trim();
    if (!id) {
      warnings.push(warning("CALENDAR", null, "missing event id"));
      continue;
    }

    const interval = resolveInterval(event.start, event.end, options.timeZone);
    if ("problem" in interval) {
      warnings.push(warning("CALENDAR", id, interval.problem));
      continue;
    }

    const customerLabel = event.summary?.trim() ?? "";
    const status: AppointmentStatus = event.status === "cancelled" ? "CANCELLED" : "CONFIRMED";

    records.push({
      sourceId: id,
      origin: "CALENDAR",
      start: interval.start,
      end: interval.end,
      customerLabel,
      description: event.description ?? "",
      status,
      portalId: event.portalId?.trim() || null,
      fingerprint: fingerprint({ start: interval.start, end: interval.end, customerLabel, status }),
    });
  }

  return { records, warnings };
}
