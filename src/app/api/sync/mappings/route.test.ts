import { afterEach, describe, expect, it } from "vitest";
import { NextRequest } from "next/server";
import { closeDatabase } from "@/sync/ledger/db";
import { confirmMapping, reserveMapping } from "@/sync/ledger/repository";
import { GET } from "./route";

afterEach(() => {
  closeDatabase();
});

function get(query: string) {
  return GET(new NextRequest(`http://localhost/api/sync/mappings${query}`));
}

describe("GET /api/sync/mappings", () => {
  it("filters mappings by booking start and status", async () => {
    reserveMapping("P1", "tok-1", { start: "2026-10-20T01:00:00.000Z", end: "2026-10-20T02:00:00.000Z" });
    reserveMapping("P2", "tok-2", { start: "2026-10-25T01:00:00.000Z", end: "2026-10-25T02:00:00.000Z" });
    confirmMapping("P2", "tok-2", "evt-2", "fp");

    const response = await get("?from=2026-10-21&status=synced");
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.mappings).toHaveLength(1);
    expect(body.mappings[0]).toMatchObject({
      portalId: "P2",
      calendarEventId: "evt-2",
      syncStatus: "synced",
      appointmentStart: "2026-10-25T01:00:00.000Z",
    });
  });

  it("rejects a limit out of range", async () => {
    const response = await get("?limit=0");

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe("Invalid query");
  });
});
