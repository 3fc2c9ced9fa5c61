import { DateTime } from "luxon";
import type { DateRange } from "@/sync/types";

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

// Tried in order after `/` is folded to `-` and `T` to a space.
const WALL_FORMATS = ["yyyy-M-d H:mm:ss", "yyyy-M-d H:mm", "yyyy-M-d"];

/** Interpret a wall-clock time in `timeZone` and return the UTC instant. */
export function wallTimeToUtc(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timeZone: string,
): Date {
  return DateTime.fromObject({ year, month, day, hour, minute }, { zone: timeZone }).toJSDate();
}

/**
 * Parse a timestamp from either origin. Accepts ISO-8601 with an offset, or a
 * salon wall-clock time (`YYYY-MM-DD HH:mm`, `YYYY/MM/DD HH:mm`, or a bare date
 * meaning midnight). Returns null for anything else.
 */
export function parseTimestamp(value: string | null | undefined, timeZone: string): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  if (trimmed.includes("T") && HAS_OFFSET.test(trimmed)) {
    const parsed = DateTime.fromISO(trimmed, { setZone: true });
    return parsed.isValid ? parsed.toJSDate() : null;
  }

  const wall = trimmed.replace(/\//g, "-").replace("T", " ");
  for (const format of WALL_FORMATS) {
    const parsed = DateTime.fromFormat(wall, format, { zone: timeZone });
    if (parsed.isValid) return parsed.toJSDate();
  }
  return null;
}

/** The window a cycle covers: from `now` through `days` days ahead. */
export function syncWindow(now: Date, days: number): DateRange {
  const from = DateTime.fromJSDate(now, { zone: "utc" });
  return {
    from: now.toISOString(),
    to: from.plus({ days }).toJSDate().toISOString(),
  };
}

export function startsWithin(startIso: string, range: DateRange): boolean {
  const start = Date.parse(startIso);
  return start >= Date.parse(range.from) && start < Date.parse(range.to);
}

/** `days` days before `now`, as an ISO timestamp. */
export function daysBefore(now: Date, days: number): string {
  return DateTime.fromJSDate(now, { zone: "utc" }).minus({ days }).toJSDate().toISOString();
}
