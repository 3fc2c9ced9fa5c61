import { startsWithin } from "./time";
import type { AppointmentRecord, DateRange, MatchResult, SyncMapping } from "@/sync/types";

export interface MatchInput {
  portal: AppointmentRecord[];
  calendar: AppointmentRecord[];
  mappings: SyncMapping[];
  /** Window both snapshots were fetched for. */
  window: DateRange;
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Classify every portal booking (and every mapped booking that vanished from the
 * portal) against the calendar snapshot and the mapping table.
 *
 * Pure: the output depends only on the arguments and is sorted by portal id.
 * If the portal snapshot holds the same booking twice, each copy is classified;
 * the planner keeps the first.
 */
export function matchSnapshots(input: MatchInput): MatchResult[] {
  const mappingsByPortal = new Map(input.mappings.map((m) => [m.portalId, m]));
  const eventsById = new Map(input.calendar.map((r) => [r.sourceId, r]));
  const mappedEventIds = new Set(input.mappings.flatMap((m) => (m.calendarEventId ? [m.calendarEventId] : [])));
  // Events this system wrote whose create was never acknowledged, by booking.
  const unclaimedByPortal = new Map(
    input.calendar
      .filter((r) => r.portalId !== null && !mappedEventIds.has(r.sourceId))
      .map((r) => [r.portalId, r]),
  );
  const results: MatchResult[] = [];
  const seen = new Set<string>();

  const eventFor = (mapping: SyncMapping | null): AppointmentRecord | null => {
    if (!mapping) return null;
    if (mapping.calendarEventId) return eventsById.get(mapping.calendarEventId) ?? null;
    return unclaimedByPortal.get(mapping.portalId) ?? null;
  };

  const portal = [...input.portal].sort((a, b) => compareIds(a.sourceId, b.sourceId));

  for (const record of portal) {
    const portalId = record.sourceId;
    seen.add(portalId);
    const mapping = mappingsByPortal.get(portalId) ?? null;
    const calendarRecord = eventFor(mapping);

    results.push({ kind: classify(record, mapping, calendarRecord), portalId, record, mapping, calendarRecord });
  }

  // Bookings that disappeared from the portal while their event is still inside the window.
  for (const mapping of input.mappings) {
    if (seen.has(mapping.portalId)) continue;
    const calendarRecord = eventFor(mapping);
    if (!calendarRecord || !startsWithin(calendarRecord.start, input.window)) continue;

    results.push({ kind: "REMOVED", portalId: mapping.portalId, record: null, mapping, calendarRecord });
  }

  return results.sort((a, b) => compareIds(a.portalId, b.portalId));
}

function classify(
  record: AppointmentRecord,
  mapping: SyncMapping | null,
  calendarRecord: AppointmentRecord | null,
): MatchResult["kind"] {
  if (record.status === "CANCELLED") {
    return mapping ? "REMOVED" : "UNCHANGED";
  }

  // A reserved mapping whose create was never acknowledged is retried as NEW
  // under the same idempotency token.
  if (!mapping || !mapping.calendarEventId) return "NEW";

  if (!calendarRecord || calendarRecord.status === "CANCELLED") return "EXTERNALLY_DELETED";

  const portalChanged = record.fingerprint !== mapping.lastFingerprint;
  const eventDrifted = calendarRecord.fingerprint !== mapping.lastFingerprint;
  return portalChanged || eventDrifted ? "MODIFIED" : "UNCHANGED";
}
