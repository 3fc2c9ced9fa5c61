import { compareIds } from "./matcher";
import type { MatchResult, PlanAction, SyncPlan, SyncPlanItem, SyncWarning } from "@/sync/types";

export interface PlanPolicy {
  /** Recreate events someone deleted from the calendar by hand. Off by default. */
  recreateExternallyDeleted: boolean;
}

export interface PlanInput {
  matches: MatchResult[];
  flagged: Set<string>;
  policy?: Partial<PlanPolicy>;
}

const ACTION_ORDER: Record<PlanAction, number> = {
  DELETE: 0,
  UPDATE: 1,
  CREATE: 2,
  SKIP: 3,
};

function toItem(match: MatchResult, flagged: Set<string>, policy: PlanPolicy, warnings: SyncWarning[]): SyncPlanItem {
  const base = {
    portalId: match.portalId,
    mapping: match.mapping,
    record: match.record,
    // A pending mapping has no event id; its event, if it landed, was found by booking.
    calendarEventId: match.mapping?.calendarEventId ?? match.calendarRecord?.sourceId ?? null,
  };

  // Removals free a slot; they are never held back by an overlap.
  if (flagged.has(match.portalId) && match.kind !== "REMOVED") {
    warnings.push({
      code: "CONFLICT_SKIPPED",
      message: `Booking ${match.portalId} overlaps another portal booking and needs manual review`,
      portalId: match.portalId,
      origin: "PORTAL",
    });
    return { ...base, action: "SKIP", reason: "conflict" };
  }

  switch (match.kind) {
    case "NEW":
      return { ...base, action: "CREATE" };
    case "MODIFIED":
      return { ...base, action: "UPDATE" };
    case "REMOVED":
      return { ...base, action: "DELETE" };
    case "UNCHANGED":
      return { ...base, action: "SKIP", reason: "unchanged" };
    case "EXTERNALLY_DELETED":
      if (policy.recreateExternallyDeleted) {
        return { ...base, action: "CREATE", calendarEventId: null };
      }
      warnings.push({
        code: "EXTERNALLY_DELETED",
        message: `Calendar event ${base.calendarEventId ?? "?"} for booking ${match.portalId} was removed outside the sync; not recreating without confirmation`,
        portalId: match.portalId,
        origin: "CALENDAR",
      });
      return { ...base, action: "SKIP", reason: "externally_deleted" };
  }
}

/**
 * Turn classifications into at most one mutation per portal booking, ordered so
 * deletions free calendar slots before updates and creations fill them.
 */
export function buildPlan(input: PlanInput): SyncPlan {
  const policy: PlanPolicy = { recreateExternallyDeleted: false, ...input.policy };
  const warnings: SyncWarning[] = [];
  const items: SyncPlanItem[] = [];
  const planned = new Set<string>();

  for (const match of input.matches) {
    if (planned.has(match.portalId)) {
      warnings.push({
        code: "DUPLICATE_BOOKING",
        message: `Booking ${match.portalId} appeared more than once in the portal snapshot; later copies ignored`,
        portalId: match.portalId,
        origin: "PORTAL",
      });
      continue;
    }
    planned.add(match.portalId);
    items.push(toItem(match, input.flagged, policy, warnings));
  }

  items.sort((a, b) => ACTION_ORDER[a.action] - ACTION_ORDER[b.action] || compareIds(a.portalId, b.portalId));
  return { items, warnings };
}

export function executableItems(plan: SyncPlan): SyncPlanItem[] {
  return plan.items.filter((item) => item.action !== "SKIP");
}
