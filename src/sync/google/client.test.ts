import { describe, expect, it } from "vitest";
import type { calendar_v3 } from "googleapis";
import {
  AuthError,
  CalendarWriteError,
  NotFoundError,
  RateLimitError,
  TransientWriteError,
} from "@/sync/errors";
import type { CalendarEventFields } from "@/sync/types";
import { eventIdForToken, GoogleCalendarClient, toSyncError, type EventsApi } from "./client";
import { mapEvent } from "./mappers";

function httpError(status: number, message = `Request failed with status ${status}`): Error {
  return Object.assign(new Error(message), { response: { status } });
}

class FakeEventsApi implements EventsApi {
  readonly listed: calendar_v3.Params$Resource$Events$List[] = [];
  readonly inserted: calendar_v3.Params$Resource$Events$Insert[] = [];
  pages: calendar_v3.Schema$Events[] = [];
  insertError: Error | null = null;
  deleteError: Error | null = null;

  async list(params: calendar_v3.Params$Resource$Events$List): Promise<calendar_v3.Schema$Events> {
    this.listed.push(params);
    return this.pages.shift() ?? {};
  }

  async insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<calendar_v3.Schema$Event> {
    this.inserted.push(params);
    if (this.insertError) throw this.insertError;
    return { id: params.requestBody?.id };
  }

  async patch(params: calendar_v3.Params$Resource$Events$Patch): Promise<calendar_v3.Schema$Event> {
    return { id: params.eventId };
  }

  async delete(): Promise<void> {
    if (this.deleteError) throw this.deleteError;
  }
}

const fields: CalendarEventFields = {
  summary: "Sato - Cut",
  description: "Booking: P1",
  start: "2026-10-20T01:00:00.000Z",
  end: "2026-10-20T02:00:00.000Z",
  portalId: "P1",
};

describe("GoogleCalendarClient", () => {
  it("follows page tokens until the listing is complete", async () => {
    const api = new FakeEventsApi();
    api.pages = [
      { items: [{ id: "a", start: { dateTime: "2026-10-20T10:00:00+09:00" } }], nextPageToken: "page-2" },
      { items: [{ id: "b", start: { date: "2026-10-21" }, end: { date: "2026-10-22" } }] },
    ];
    const client = new GoogleCalendarClient(api, "salon@example.com");

    const events = await client.listEvents({ from: "2026-10-19T00:00:00.000Z", to: "2026-11-18T00:00:00.000Z" });

    expect(events.map((e) => e.id)).toEqual(["a", "b"]);
    expect(events[1].allDay).toBe(true);
    expect(api.listed.map((p) => p.pageToken)).toEqual([undefined, "page-2"]);
    expect(api.listed[0]).toMatchObject({
      calendarId: "salon@example.com",
      timeMin: "2026-10-19T00:00:00.000Z",
      timeMax: "2026-11-18T00:00:00.000Z",
      singleEvents: true,
      orderBy: "startTime",
      maxResults: 250,
    });
  });

  it("creates events under an id derived from the idempotency token", async () => {
    const api = new FakeEventsApi();
    const client = new GoogleCalendarClient(api);

    const id = await client.createEvent(fields, "test-token");

    expect(id).toBe(eventIdForToken("test-token"));
    expect(id).toMatch(/^[0-9a-f]{32}$/);
    expect(api.inserted[0].requestBody).toEqual({
      id,
      summary: "Sato - Cut",
      description: "Booking: P1",
      start: { dateTime: "2026-10-20T01:00:00.000Z", timeZone: "UTC" },
      end: { dateTime: "2026-10-20T02:00:00.000Z", timeZone: "UTC" },
      extendedProperties: { private: { salonBoardBookingId: "P1", syncIdempotencyToken: "test-token" } },
    });
  });

  it("resolves a repeated create to the event that already exists", async () => {
    const api = new FakeEventsApi();
    api.insertError = httpError(409, "The requested identifier already exists.");

    await expect(new GoogleCalendarClient(api).createEvent(fields, "test-token")).resolves.toBe(
      eventIdForToken("test-token"),
    );
  });

  it("reports a missing event on delete as NotFoundError", async () => {
    const api = new FakeEventsApi();
    api.deleteError = httpError(410, "Resource has been deleted");

    await expect(new GoogleCalendarClient(api).deleteEvent("evt-1")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("toSyncError", () => {
  it.each([
    [httpError(401), AuthError],
    [httpError(403, "Insufficient Permission"), AuthError],
    [httpError(403, "Rate Limit Exceeded"), RateLimitError],
    [httpError(404), NotFoundError],
    [httpError(429), RateLimitError],
    [httpError(503), TransientWriteError],
    [httpError(400, "Bad Request"), CalendarWriteError],
    [new Error("socket hang up"), TransientWriteError],
    [new Error("invalid_grant"), AuthError],
  ])("maps %s", (error, expected) => {
    expect(toSyncError(error, "events.insert")).toBeInstanceOf(expected);
  });

  it("prefixes the message with the operation", () => {
    const error = toSyncError(httpError(400, "Bad Request"), "events.patch");
    expect(error.message).toBe("events.patch: Bad Request");
    expect(error).toMatchObject({ statusCode: 400 });
  });
});

describe("mapEvent", () => {
  it("reads the booking number and token from private properties", () => {
    expect(
      mapEvent({
        id: "abc",
        summary: "Sato - Cut",
        status: "confirmed",
        start: { dateTime: "2026-10-20T01:00:00Z" },
        end: { dateTime: "2026-10-20T02:00:00Z" },
        extendedProperties: { private: { salonBoardBookingId: "P1", syncIdempotencyToken: "test-token" } },
      }),
    ).toEqual({
      id: "abc",
      summary: "Sato - Cut",
      description: null,
      start: "2026-10-20T01:00:00Z",
      end: "2026-10-20T02:00:00Z",
      allDay: false,
      status: "confirmed",
      portalId: "P1",
      idempotencyToken: "test-token",
    });
  });
});
