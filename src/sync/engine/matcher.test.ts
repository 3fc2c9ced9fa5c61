import { describe, expect, it } from "vitest";
import { calendarRecord, mappingFor, portalRecord, WINDOW } from "@/sync/testing/builders";
import { matchSnapshots } from "./matcher";

const T10 = "2026-10-20T01:00:00.000Z";
const T11 = "2026-10-20T02:00:00.000Z";
const T1030 = "2026-10-20T01:30:00.000Z";
const T1130 = "2026-10-20T02:30:00.000Z";

function kinds(results: ReturnType<typeof matchSnapshots>) {
  return results.map((r) => [r.portalId, r.kind]);
}

describe("matchSnapshots", () => {
  it("classifies a booking without a mapping as NEW", () => {
    const results = matchSnapshots({ portal: [portalRecord("P1", T10, T11)], calendar: [], mappings: [], window: WINDOW });
    expect(kinds(results)).toEqual([["P1", "NEW"]]);
    expect(results[0].mapping).toBeNull();
  });

  it("classifies an in-sync pair as UNCHANGED", () => {
    const booking = portalRecord("P1", T10, T11);
    const event = calendarRecord("e1", T10, T11, { portalId: "P1" });
    const results = matchSnapshots({
      portal: [booking],
      calendar: [event],
      mappings: [mappingFor("P1", "e1", booking.fingerprint)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P1", "UNCHANGED"]]);
    expect(results[0].calendarRecord).toBe(event);
  });

  it("classifies a rescheduled booking as MODIFIED", () => {
    const before = portalRecord("P1", T10, T11);
    const results = matchSnapshots({
      portal: [portalRecord("P1", T1030, T1130)],
      calendar: [calendarRecord("e1", T10, T11, { portalId: "P1" })],
      mappings: [mappingFor("P1", "e1", before.fingerprint)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P1", "MODIFIED"]]);
  });

  it("classifies an event edited by hand as MODIFIED so the booking wins", () => {
    const booking = portalRecord("P1", T10, T11);
    const results = matchSnapshots({
      portal: [booking],
      calendar: [calendarRecord("e1", T10, T11, { portalId: "P1", label: "Renamed" })],
      mappings: [mappingFor("P1", "e1", booking.fingerprint)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P1", "MODIFIED"]]);
  });

  it("classifies cancelled bookings as REMOVED only when something was synced", () => {
    const cancelled = portalRecord("P1", T10, T11, { status: "CANCELLED" });
    const neverSynced = portalRecord("P2", T10, T11, { status: "CANCELLED" });
    const results = matchSnapshots({
      portal: [neverSynced, cancelled],
      calendar: [calendarRecord("e1", T10, T11, { portalId: "P1" })],
      mappings: [mappingFor("P1", "e1", portalRecord("P1", T10, T11).fingerprint)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([
      ["P1", "REMOVED"],
      ["P2", "UNCHANGED"],
    ]);
  });

  it("classifies a mapped event that is missing or cancelled as EXTERNALLY_DELETED", () => {
    const p1 = portalRecord("P1", T10, T11);
    const p2 = portalRecord("P2", T1130, "2026-10-20T03:30:00.000Z");
    const results = matchSnapshots({
      portal: [p1, p2],
      calendar: [calendarRecord("e2", p2.start, p2.end, { portalId: "P2", status: "CANCELLED" })],
      mappings: [mappingFor("P1", "e1", p1.fingerprint), mappingFor("P2", "e2", p2.fingerprint)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([
      ["P1", "EXTERNALLY_DELETED"],
      ["P2", "EXTERNALLY_DELETED"],
    ]);
  });

  it("retries an unacknowledged create as NEW and keeps its mapping", () => {
    const pending = mappingFor("P1", null, null, "token-kept");
    const results = matchSnapshots({
      portal: [portalRecord("P1", T10, T11)],
      calendar: [],
      mappings: [pending],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P1", "NEW"]]);
    expect(results[0].mapping).toBe(pending);
  });

  it("classifies a booking that vanished from the portal as REMOVED when its event is in the window", () => {
    const event = calendarRecord("e9", T10, T11, { portalId: "P9" });
    const results = matchSnapshots({
      portal: [],
      calendar: [event],
      mappings: [mappingFor("P9", "e9", event.fingerprint), mappingFor("P8", "e8", "old")],
      window: WINDOW,
    });
    expect(results).toEqual([
      { kind: "REMOVED", portalId: "P9", record: null, mapping: mappingFor("P9", "e9", event.fingerprint), calendarRecord: event },
    ]);
  });

  it("finds the event of an unacknowledged create when the booking is cancelled", () => {
    const landed = calendarRecord("e1", T10, T11, { portalId: "P1" });
    const results = matchSnapshots({
      portal: [portalRecord("P1", T10, T11, { status: "CANCELLED" })],
      calendar: [landed],
      mappings: [mappingFor("P1", null, null)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P1", "REMOVED"]]);
    expect(results[0].calendarRecord).toBe(landed);
  });

  it("removes the landed event of a pending booking that vanished from the portal", () => {
    const landed = calendarRecord("e1", T10, T11, { portalId: "P1" });
    const results = matchSnapshots({
      portal: [],
      calendar: [landed],
      mappings: [mappingFor("P1", null, null), mappingFor("P2", null, null)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P1", "REMOVED"]]);
    expect(results[0].calendarRecord).toBe(landed);
  });

  it("does not hand an event that another mapping owns to a pending booking", () => {
    const owned = calendarRecord("e1", T10, T11, { portalId: "P1" });
    const results = matchSnapshots({
      portal: [],
      calendar: [owned],
      mappings: [mappingFor("P1", null, null), mappingFor("P9", "e1", owned.fingerprint)],
      window: WINDOW,
    });
    expect(kinds(results)).toEqual([["P9", "REMOVED"]]);
  });

  it("is deterministic and ordered by portal id", () => {
    const records = [portalRecord("P3", T10, T11), portalRecord("P1", T10, T11), portalRecord("P2", T10, T11)];
    const first = matchSnapshots({ portal: records, calendar: [], mappings: [], window: WINDOW });
    const second = matchSnapshots({ portal: [...records].reverse(), calendar: [], mappings: [], window: WINDOW });
    expect(kinds(first)).toEqual([
      ["P1", "NEW"],
      ["P2", "NEW"],
      ["P3", "NEW"],
    ]);
    expect(second).toEqual(first);
  });
});
