import { describe, expect, it } from "vitest";
import { ScrapeError } from "@/sync/errors";
import { SalonBoardClient } from "./client";

const credentials = { url: "https://salonboard.example.com", username: "owner", password: "test-secret" };
const range = { from: "2026-10-19T00:00:00.000Z", to: "2026-11-18T00:00:00.000Z" };

function failingClient(error: Error): SalonBoardClient {
  return new SalonBoardClient(credentials, {
    timeZone: "Asia/Tokyo",
    openSession: async () => {
      throw error;
    },
  });
}

describe("SalonBoardClient", () => {
  it("reports an unreachable browser as a network failure", async () => {
    const client = failingClient(new Error("net::ERR_NAME_NOT_RESOLVED"));

    const error = await client.fetchPortalAppointments(range).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScrapeError);
    expect(error).toMatchObject({ reason: "network", message: "net::ERR_NAME_NOT_RESOLVED" });
  });

  it("reports a selector timeout as a layout change", async () => {
    const timeout = Object.assign(new Error("waiting for selector"), { name: "TimeoutError" });

    await expect(failingClient(timeout).fetchPortalAppointments(range)).rejects.toMatchObject({
      reason: "layout_changed",
    });
  });

  it("passes scrape errors through unchanged", async () => {
    const expired = new ScrapeError("login required", "session_expired");
    await expect(failingClient(expired).fetchPortalAppointments(range)).rejects.toBe(expired);
  });

  it("closes cleanly when no session was opened", async () => {
    await expect(failingClient(new Error("unused")).close()).resolves.toBeUndefined();
  });
});
