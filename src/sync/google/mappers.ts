import type { calendar_v3 } from "googleapis";
import type { CalendarEvent, CalendarEventFields } from "@/sync/types";

export const PORTAL_ID_PROPERTY = "salonBoardBookingId";
export const TOKEN_PROPERTY = "syncIdempotencyToken";

export function mapEvent(raw: calendar_v3.Schema$Event): CalendarEvent {
  const privateProps = raw.extendedProperties?.private ?? {};
  const allDay = !raw.start?.dateTime && !!raw.start?.date;

  return {
    id: raw.id ?? "",
    summary: raw.summary ?? null,
    description: raw.description ?? null,
    start: raw.start?.dateTime ?? raw.start?.date ?? null,
    end: raw.end?.dateTime ?? raw.end?.date ?? null,
    allDay,
    status: raw.status ?? null,
    portalId: privateProps[PORTAL_ID_PROPERTY] ?? null,
    idempotencyToken: privateProps[TOKEN_PROPERTY] ?? null,
  };
}

/** Body for insert (with the derived id and token) or for a patch of an existing event. */
export function toRequestBody(
  fields: CalendarEventFields,
  extra?: { id: string; idempotencyToken: string },
): calendar_v3.Schema$Event {
  const privateProps: Record<string, string> = { [PORTAL_ID_PROPERTY]: fields.portalId };
  if (extra) privateProps[TOKEN_PROPERTY] = extra.idempotencyToken;

  return {
    ...(extra ? { id: extra.id } : {}),
    summary: fields.summary,
    description: fields.description,
    start: { dateTime: fields.start, timeZone: "UTC" },
    end: { dateTime: fields.end, timeZone: "UTC" },
    extendedProperties: { private: privateProps },
  };
}
