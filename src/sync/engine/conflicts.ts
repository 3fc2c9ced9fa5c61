import { compositeKey } from "@/sync/ledger/hash";
import { compareIds } from "./matcher";
import type { AppointmentRecord, ConflictRecord, MatchResult, SyncMapping } from "@/sync/types";

export interface ConflictInput {
  matches: MatchResult[];
  calendar: AppointmentRecord[];
  mappings: SyncMapping[];
  now: Date;
}

export interface ConflictOutcome {
  conflicts: ConflictRecord[];
  /** Portal bookings held back from the plan until a human resolves the overlap. */
  flagged: Set<string>;
}

const SURVIVING = new Set<MatchResult["kind"]>(["NEW", "MODIFIED", "UNCHANGED"]);

interface Candidate {
  record: AppointmentRecord;
  startMs: number;
  endMs: number;
}

function candidate(record: AppointmentRecord): Candidate {
  return { record, startMs: Date.parse(record.start), endMs: Date.parse(record.end) };
}

/**
 * Everything CONFIRMED that will be on the schedule once this cycle's plan has run:
 * surviving portal bookings, plus calendar entries nobody maps to (added by hand).
 */
function collectCandidates(input: ConflictInput): Candidate[] {
  const portal = input.matches
    .filter((m) => SURVIVING.has(m.kind) && m.record?.status === "CONFIRMED")
    .flatMap((m) => (m.record ? [m.record] : []));

  const mappedEventIds = new Set(
    input.mappings.flatMap((m) => (m.calendarEventId ? [m.calendarEventId] : [])),
  );
  const manual = input.calendar.filter(
    (r) => r.status === "CONFIRMED" && r.portalId === null && !mappedEventIds.has(r.sourceId),
  );

  return [...portal, ...manual].map(candidate).sort(
    (a, b) =>
      a.startMs - b.startMs ||
      compareIds(a.record.origin, b.record.origin) ||
      compareIds(a.record.sourceId, b.record.sourceId),
  );
}

function identity(record: AppointmentRecord): string {
  return `${record.origin}:${record.sourceId}@${record.fingerprint}`;
}

function describe(record: AppointmentRecord): string {
  return `${record.origin.toLowerCase()} ${record.sourceId} (${record.start} - ${record.end})`;
}

/**
 * Find double bookings among the records that will exist after this cycle.
 * Intervals are half-open, so an appointment ending at 11:00 does not clash with
 * one starting at 11:00.
 */
export function detectConflicts(input: ConflictInput): ConflictOutcome {
  const candidates = collectCandidates(input);
  const detectedAt = input.now.toISOString();
  const conflicts: ConflictRecord[] = [];
  const flagged = new Set<string>();

  for (let i = 0; i < candidates.length; i++) {
    const a = candidates[i];
    for (let j = i + 1; j < candidates.length && candidates[j].startMs < a.endMs; j++) {
      const b = candidates[j];
      if (a.record.origin === "CALENDAR" && b.record.origin === "CALENDAR") continue;
      if (a.record.portalId !== null && a.record.portalId === b.record.portalId) continue;

      const pair: [AppointmentRecord, AppointmentRecord] = [a.record, b.record];
      const key = compositeKey(pair.map(identity));

      if (a.record.origin === "PORTAL" && b.record.origin === "PORTAL") {
        flagged.add(a.record.sourceId);
        flagged.add(b.record.sourceId);
        conflicts.push({
          key,
          kind: "PORTAL_PORTAL",
          resolution: "MANUAL_REVIEW_REQUIRED",
          reason: `Portal bookings overlap: ${describe(a.record)} and ${describe(b.record)}`,
          records: pair,
          detectedAt,
        });
      } else {
        const [portal, manual] = a.record.origin === "PORTAL" ? pair : [b.record, a.record];
        conflicts.push({
          key,
          kind: "PORTAL_CALENDAR",
          resolution: "PORTAL_WINS",
          reason: `Portal booking ${describe(portal)} overlaps manual calendar entry ${describe(manual)}`,
          records: [portal, manual],
          detectedAt,
        });
      }
    }
  }

  return { conflicts, flagged };
}
