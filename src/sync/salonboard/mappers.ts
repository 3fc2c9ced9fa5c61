import { parseTimestamp } from "@/sync/engine/time";
import type { DateRange, PortalAppointment } from "@/sync/types";
import type { ReservationRow } from "./types";

export function mapReservation(row: ReservationRow): PortalAppointment {
  return {
    bookingId: row.bookingId,
    customerName: row.customerName,
    serviceName: row.serviceName,
    staffName: row.staffName,
    startTime: row.startTime,
    endTime: row.endTime,
    status: row.status,
    customerPhone: row.customerPhone,
    customerEmail: row.customerEmail,
  };
}

/**
 * Keep reservations starting inside `range`. Rows whose start cannot be read are
 * kept so the normalizer reports them.
 */
export function withinRange(appointments: PortalAppointment[], range: DateRange, timeZone: string): PortalAppointment[] {
  const from = Date.parse(range.from);
  const to = Date.parse(range.to);
  return appointments.filter((appt) => {
    const start = parseTimestamp(appt.startTime, timeZone);
    if (!start) return true;
    return start.getTime() >= from && start.getTime() < to;
  });
}
