import { afterEach, describe, expect, it } from "vitest";
import { NextRequest } from "next/server";
import { closeDatabase } from "@/sync/ledger/db";
import { createRun, setHaltState } from "@/sync/ledger/repository";
import { GET } from "./route";

afterEach(() => {
  closeDatabase();
});

describe("GET /api/sync/status", () => {
  it("returns the latest run and the halt state", async () => {
    createRun("run-1", "scheduled", false, "2026-10-19T09:00:00.000Z");
    setHaltState("invalid_grant");

    const response = await GET(new NextRequest("http://localhost/api/sync/status?conflicts=5"));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      latestRun: { runId: "run-1", status: "running", report: null },
      lease: null,
      halt: { reason: "invalid_grant" },
      recentConflicts: [],
    });
  });
});
