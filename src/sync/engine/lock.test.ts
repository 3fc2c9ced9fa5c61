import { afterEach, describe, expect, it } from "vitest";
import { CycleInProgressError } from "@/sync/errors";
import { closeDatabase } from "@/sync/ledger/db";
import { getLease } from "@/sync/ledger/repository";
import { CycleLock, withCycleLease } from "./lock";

afterEach(() => {
  closeDatabase();
});

describe("CycleLock", () => {
  const now = new Date("2026-10-19T09:00:00.000Z");

  it("refuses a second cycle while the lease is live", () => {
    const lock = new CycleLock(60_000);
    const lease = lock.acquire("scheduled", now);

    expect(() => lock.acquire("manual", now)).toThrow(CycleInProgressError);
    try {
      lock.acquire("manual", now);
    } catch (error) {
      expect(error).toMatchObject({ holder: lease.holder, expiresAt: "2026-10-19T09:01:00.000Z" });
    }
  });

  it("takes over a lease its holder never released", () => {
    const lock = new CycleLock(60_000);
    const stale = lock.acquire("scheduled", now);
    const fresh = lock.acquire("manual", new Date(now.getTime() + 61_000));

    expect(fresh.holder).toMatch(/^manual-/);
    expect(stale.isStopRequested()).toBe(true);
    expect(stale.renew()).toBe(false);
    expect(fresh.isStopRequested()).toBe(false);
  });

  it("passes stop requests to the holder", () => {
    const lock = new CycleLock(60_000);
    expect(lock.requestStop()).toBe(false);

    const lease = lock.acquire("cli");
    expect(lock.requestStop()).toBe(true);
    expect(lease.isStopRequested()).toBe(true);
  });
});

describe("withCycleLease", () => {
  it("releases the lease when the cycle throws", async () => {
    const lock = new CycleLock(60_000);

    await expect(
      withCycleLease(lock, "manual", async () => {
        expect(getLease()?.trigger).toBe("manual");
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(getLease()).toBeUndefined();
    await expect(withCycleLease(lock, "scheduled", async (lease) => lease.trigger)).resolves.toBe("scheduled");
  });
});
