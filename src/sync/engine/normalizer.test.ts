import { describe, expect, it } from "vitest";
import { fingerprint } from "@/sync/ledger/hash";
import { customerLabelFor, normalizeCalendarEvents, normalizePortalAppointments } from "./normalizer";

const tz = { timeZone: "Asia/Tokyo" };

describe("normalizePortalAppointments", () => {
  it("converts a scraped row into an appointment record", () => {
    const { records, warnings } = normalizePortalAppointments(
      [
        {
          bookingId: " BK001 ",
          customerName: "Sato  Hanako",
          serviceName: "Cut",
          staffName: "Mori",
          startTime: "2026-10-20 10:00",
          endTime: "2026-10-20 11:00",
          status: "Confirmed",
          customerPhone: "090-0000-0000",
          customerEmail: null,
        },
      ],
      tz,
    );

    expect(warnings).toEqual([]);
    expect(records).toEqual([
      {
        sourceId: "BK001",
        origin: "PORTAL",
        start: "2026-10-20T01:00:00.000Z",
        end: "2026-10-20T02:00:00.000Z",
        customerLabel: "Sato Hanako - Cut",
        description: "Customer: Sato Hanako\nService: Cut\nStaff: Mori\nPhone: 090-0000-0000\nBooking: BK001",
        status: "CONFIRMED",
        portalId: "BK001",
        fingerprint: fingerprint({
          start: "2026-10-20T01:00:00.000Z",
          end: "2026-10-20T02:00:00.000Z",
          customerLabel: "Sato Hanako - Cut",
          status: "CONFIRMED",
        }),
      },
    ]);
  });

  it("recognizes cancelled bookings in English and Japanese", () => {
    const row = { customerName: "Ito", startTime: "2026-10-20 10:00", endTime: "2026-10-20 11:00" };
    const { records } = normalizePortalAppointments(
      [
        { ...row, bookingId: "A", status: "キャンセル済み" },
        { ...row, bookingId: "B", status: "Cancelled by customer" },
        { ...row, bookingId: "C", status: "受付済み" },
      ],
      tz,
    );
    expect(records.map((r) => r.status)).toEqual(["CANCELLED", "CANCELLED", "CONFIRMED"]);
  });

  it("drops unusable rows with a warning instead of failing", () => {
    const { records, warnings } = normalizePortalAppointments(
      [
        { customerName: "No Id", startTime: "2026-10-20 10:00", endTime: "2026-10-20 11:00" },
        { bookingId: "BK2", startTime: "sometime", endTime: "2026-10-20 11:00" },
        { bookingId: "BK3", startTime: "2026-10-20 11:00", endTime: "2026-10-20 10:00" },
        { bookingId: "BK4", startTime: "2026-10-20 10:00", endTime: "2026-10-20 10:30" },
      ],
      tz,
    );

    expect(records.map((r) => r.sourceId)).toEqual(["BK4"]);
    expect(warnings).toEqual([
      { origin: "PORTAL", sourceId: null, reason: "missing booking number" },
      { origin: "PORTAL", sourceId: "BK2", reason: 'unresolvable start "sometime"' },
      {
        origin: "PORTAL",
        sourceId: "BK3",
        reason: "start 2026-10-20T02:00:00.000Z is not before end 2026-10-20T01:00:00.000Z",
      },
    ]);
  });

  it("labels bookings without a customer name as walk-ins", () => {
    const { records } = normalizePortalAppointments(
      [{ bookingId: "W1", serviceName: "Cut", startTime: "2026-10-20 10:00", endTime: "2026-10-20 10:30" }],
      tz,
    );
    expect(records[0].customerLabel).toBe("Walk-in - Cut");
    expect(records[0].description).toBe("Customer: -\nService: Cut\nBooking: W1");
  });
});

describe("customerLabelFor", () => {
  it("omits the service when there is none", () => {
    expect(customerLabelFor("Sato", "")).toBe("Sato");
  });
});

describe("normalizeCalendarEvents", () => {
  it("gives an unchanged synced event the same fingerprint as its booking", () => {
    const portal = normalizePortalAppointments(
      [{ bookingId: "BK001", customerName: "Sato Hanako", serviceName: "Cut", startTime: "2026-10-20 10:00", endTime: "2026-10-20 11:00" }],
      tz,
    );
    const calendar = normalizeCalendarEvents(
      [
        {
          id: "evt-1",
          summary: " Sato Hanako - Cut ",
          start: "2026-10-20T10:00:00+09:00",
          end: "2026-10-20T02:00:00Z",
          status: "confirmed",
          portalId: "BK001",
        },
      ],
      tz,
    );

    expect(calendar.records[0]).toMatchObject({
      sourceId: "evt-1",
      origin: "CALENDAR",
      customerLabel: "Sato Hanako - Cut",
      status: "CONFIRMED",
      portalId: "BK001",
    });
    expect(calendar.records[0].fingerprint).toBe(portal.records[0].fingerprint);
  });

  it("maps cancelled events, manual entries, all-day events and missing ids", () => {
    const { records, warnings } = normalizeCalendarEvents(
      [
        { id: "evt-2", summary: "Gone", start: "2026-10-20T01:00:00Z", end: "2026-10-20T02:00:00Z", status: "cancelled" },
        { id: "day-1", summary: "Closed", start: "2026-10-20", end: "2026-10-21", allDay: true, portalId: "  " },
        { id: " ", summary: "Broken", start: "2026-10-20T01:00:00Z", end: "2026-10-20T02:00:00Z" },
      ],
      tz,
    );

    expect(records.map((r) => [r.sourceId, r.status, r.portalId, r.start, r.end])).toEqual([
      ["evt-2", "CANCELLED", null, "2026-10-20T01:00:00.000Z", "2026-10-20T02:00:00.000Z"],
      ["day-1", "CONFIRMED", null, "2026-10-19T15:00:00.000Z", "2026-10-20T15:00:00.000Z"],
    ]);
    expect(warnings).toEqual([{ origin: "CALENDAR", sourceId: null, reason: "missing event id" }]);
  });
});
