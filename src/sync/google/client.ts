import { createHash } from "crypto";
import { google } from "googleapis";
import type { calendar_v3 } from "googleapis";
import {
  AuthError,
  CalendarWriteError,
  NotFoundError,
  RateLimitError,
  SyncError,
  TransientWriteError,
} from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";
import type { GoogleCredentials } from "@/sync/types/api";
import type { CalendarEvent, CalendarEventFields, CalendarGateway, DateRange } from "@/sync/types";
import { mapEvent, toRequestBody } from "./mappers";

const log = createChildLogger("google-calendar");

const PAGE_SIZE = 250;

/** The slice of `calendar.events` this client calls. Tests pass a fake. */
export interface EventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<calendar_v3.Schema$Events>;
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<calendar_v3.Schema$Event>;
  patch(params: calendar_v3.Params$Resource$Events$Patch): Promise<calendar_v3.Schema$Event>;
  delete(params: calendar_v3.Params$Resource$Events$Delete): Promise<void>;
}

/** Events API bound to an OAuth2 client that refreshes its own access tokens. */
export function createEventsApi(credentials: GoogleCredentials): EventsApi {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({ refresh_token: credentials.refreshToken });
  const calendar = google.calendar({ version: "v3", auth });

  return {
    list: async (params) => (await calendar.events.list(params)).data,
    insert: async (params) => (await calendar.events.insert(params)).data,
    patch: async (params) => (await calendar.events.patch(params)).data,
    delete: async (params) => {
      await calendar.events.delete(params);
    },
  };
}

/**
 * Google event ids allow lowercase base32hex, which covers hex digits. Deriving the
 * id from the token makes a repeated insert collide (409) instead of duplicating.
 */
export function eventIdForToken(idempotencyToken: string): string {
  return createHash("sha256").update(idempotencyToken).digest("hex").slice(0, 32);
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const candidate = error as { status?: unknown; code?: unknown; response?: { status?: unknown } };
  for (const value of [candidate.response?.status, candidate.status, candidate.code]) {
    if (typeof value === "number") return value;
  }
  return undefined;
}

/** Translate a googleapis/gaxios failure into the sync error taxonomy. */
export function toSyncError(error: unknown, operation: string): SyncError {
  if (error instanceof SyncError) return error;

  const status = httpStatus(error);
  const message = `${operation}: ${errorMessage(error)}`;

  if (message.includes("invalid_grant")) return new AuthError(message);
  if (status === undefined) return new TransientWriteError(message);
  if (status === 401) return new AuthError(message);
  if (status === 403) {
    return /rate ?limit/i.test(message) ? new RateLimitError(message) : new AuthError(message);
  }
  if (status === 404 || status === 410) return new NotFoundError(message);
  if (status === 429) return new RateLimitError(message);
  if (status >= 500) return new TransientWriteError(message);
  return new CalendarWriteError(message, status);
}

export class GoogleCalendarClient implements CalendarGateway {
  private readonly api: EventsApi;
  private readonly calendarId: string;

  constructor(api: EventsApi, calendarId = "primary") {
    this.api = api;
    this.calendarId = calendarId;
  }

  static fromCredentials(credentials: GoogleCredentials): GoogleCalendarClient {
    return new GoogleCalendarClient(createEventsApi(credentials), credentials.calendarId);
  }

  async listEvents(range: DateRange): Promise<CalendarEvent[]> {
    const events: CalendarEvent[] = [];
    let pageToken: string | undefined;

    do {
      let page: calendar_v3.Schema$Events;
      try {
        page = await this.api.list({
          calendarId: this.calendarId,
          timeMin: range.from,
          timeMax: range.to,
          singleEvents: true,
          orderBy: "startTime",
          maxResults: PAGE_SIZE,
          pageToken,
        });
      } catch (error) {
        throw toSyncError(error, "events.list");
      }

      events.push(...(page.items ?? []).map(mapEvent));
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken);

    log.debug("Listed calendar events", { calendarId: this.calendarId, count: events.length });
    return events;
  }

  async createEvent(fields: CalendarEventFields, idempotencyToken: string): Promise<string> {
    const id = eventIdForToken(idempotencyToken);
    try {
      const created = await this.api.insert({
        calendarId: this.calendarId,
        requestBody: toRequestBody(fields, { id, idempotencyToken }),
      });
      return created.id ?? id;
    } catch (error) {
      if (httpStatus(error) === 409) {
        log.info("Event for idempotency token already exists", { portalId: fields.portalId, eventId: id });
        return id;
      }
      throw toSyncError(error, "events.insert");
    }
  }

  async updateEvent(eventId: string, fields: CalendarEventFields): Promise<void> {
    try {
      await this.api.patch({
        calendarId: this.calendarId,
        eventId,
        requestBody: toRequestBody(fields),
      });
    } catch (error) {
      throw toSyncError(error, "events.patch");
    }
  }

  async deleteEvent(eventId: string): Promise<void> {
    try {
      await this.api.delete({ calendarId: this.calendarId, eventId });
    } catch (error) {
      throw toSyncError(error, "events.delete");
    }
  }
}
