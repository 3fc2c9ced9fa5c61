import { describe, expect, it } from "vitest";
import { calendarRecord, mappingFor, portalRecord } from "@/sync/testing/builders";
import type { MatchKind, MatchResult } from "@/sync/types";
import { buildPlan, executableItems } from "./planner";

const T10 = "2026-10-20T01:00:00.000Z";
const T11 = "2026-10-20T02:00:00.000Z";

function match(kind: MatchKind, portalId: string, eventId: string | null = null): MatchResult {
  return {
    kind,
    portalId,
    record: kind === "REMOVED" && eventId ? null : portalRecord(portalId, T10, T11),
    mapping: eventId ? mappingFor(portalId, eventId, "fp") : null,
    calendarRecord: null,
  };
}

describe("buildPlan", () => {
  it("maps each classification to one action, deletes first", () => {
    const plan = buildPlan({
      matches: [match("NEW", "A"), match("MODIFIED", "B", "e-b"), match("REMOVED", "C", "e-c"), match("UNCHANGED", "D", "e-d")],
      flagged: new Set(),
    });

    expect(plan.items.map((i) => [i.action, i.portalId, i.calendarEventId, i.reason])).toEqual([
      ["DELETE", "C", "e-c", undefined],
      ["UPDATE", "B", "e-b", undefined],
      ["CREATE", "A", null, undefined],
      ["SKIP", "D", "e-d", "unchanged"],
    ]);
    expect(plan.warnings).toEqual([]);
    expect(executableItems(plan).map((i) => i.portalId)).toEqual(["C", "B", "A"]);
  });

  it("deletes the event found for a pending mapping", () => {
    const plan = buildPlan({
      matches: [
        {
          kind: "REMOVED",
          portalId: "P1",
          record: null,
          mapping: mappingFor("P1", null, null),
          calendarRecord: calendarRecord("e-landed", T10, T11, { portalId: "P1" }),
        },
      ],
      flagged: new Set(),
    });

    expect(plan.items).toMatchObject([{ action: "DELETE", portalId: "P1", calendarEventId: "e-landed" }]);
  });

  it("orders items of the same action by portal id", () => {
    const plan = buildPlan({ matches: [match("NEW", "Z"), match("NEW", "M"), match("NEW", "A")], flagged: new Set() });
    expect(plan.items.map((i) => i.portalId)).toEqual(["A", "M", "Z"]);
  });

  it("holds back flagged bookings but still lets removals through", () => {
    const plan = buildPlan({
      matches: [match("NEW", "A"), match("MODIFIED", "B", "e-b"), match("REMOVED", "C", "e-c")],
      flagged: new Set(["A", "B", "C"]),
    });

    expect(plan.items.map((i) => [i.action, i.portalId, i.reason])).toEqual([
      ["DELETE", "C", undefined],
      ["SKIP", "A", "conflict"],
      ["SKIP", "B", "conflict"],
    ]);
    expect(plan.warnings.map((w) => [w.code, w.portalId])).toEqual([
      ["CONFLICT_SKIPPED", "A"],
      ["CONFLICT_SKIPPED", "B"],
    ]);
  });

  it("does not recreate externally deleted events unless the policy allows it", () => {
    const matches = [match("EXTERNALLY_DELETED", "A", "e-a")];

    const cautious = buildPlan({ matches, flagged: new Set() });
    expect(cautious.items).toMatchObject([{ action: "SKIP", reason: "externally_deleted", calendarEventId: "e-a" }]);
    expect(cautious.warnings).toEqual([
      {
        code: "EXTERNALLY_DELETED",
        message: "Calendar event e-a for booking A was removed outside the sync; not recreating without confirmation",
        portalId: "A",
        origin: "CALENDAR",
      },
    ]);

    const recreating = buildPlan({ matches, flagged: new Set(), policy: { recreateExternallyDeleted: true } });
    expect(recreating.items).toMatchObject([{ action: "CREATE", portalId: "A", calendarEventId: null }]);
    expect(recreating.warnings).toEqual([]);
  });

  it("keeps only the first plan item per booking", () => {
    const plan = buildPlan({ matches: [match("NEW", "A"), match("NEW", "A")], flagged: new Set() });
    expect(plan.items).toHaveLength(1);
    expect(plan.warnings).toMatchObject([{ code: "DUPLICATE_BOOKING", portalId: "A" }]);
  });
});
