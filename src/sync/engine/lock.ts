import { randomUUID } from "crypto";
import { CycleInProgressError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { getLease, releaseLease, renewLease, requestLeaseCancel, tryAcquireLease } from "@/sync/ledger/repository";
import type { SyncTrigger } from "@/sync/types";

const log = createChildLogger("cycle-lock");

/**
 * The right to run one sync cycle. Obtained from {@link CycleLock.acquire} and
 * handed to the cycle entry point, which uses it to renew the lease and to see
 * stop requests.
 */
export class CycleLease {
  private released = false;

  constructor(
    readonly holder: string,
    readonly trigger: SyncTrigger,
    private readonly ttlMs: number,
  ) {}

  /** Push the expiry forward. Returns false if the lease was lost (expired and taken over). */
  renew(now = new Date()): boolean {
    if (this.released) return false;
    const renewed = renewLease(this.holder, now, this.ttlMs);
    if (!renewed) log.warn("Cycle lease was lost", { holder: this.holder });
    return renewed;
  }

  isStopRequested(): boolean {
    const lease = getLease();
    return !lease || lease.holder !== this.holder || lease.cancelRequested;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    releaseLease(this.holder);
    log.debug("Cycle lease released", { holder: this.holder });
  }
}

export class CycleLock {
  constructor(private readonly ttlMs: number) {}

  /** Take the lease or throw CycleInProgressError. Expired leases are reclaimed. */
  acquire(trigger: SyncTrigger, now = new Date()): CycleLease {
    const holder = `${trigger}-${randomUUID()}`;
    const attempt = tryAcquireLease(holder, trigger, now, this.ttlMs);
    if (!attempt.acquired) {
      throw new CycleInProgressError(attempt.current.holder, attempt.current.expiresAt);
    }
    log.debug("Cycle lease acquired", { holder, expiresAt: attempt.lease.expiresAt });
    return new CycleLease(holder, trigger, this.ttlMs);
  }

  /** Ask whichever cycle holds the lease to stop at the next plan-item boundary. */
  requestStop(): boolean {
    return requestLeaseCancel();
  }
}

/** Run `fn` under a freshly acquired lease, releasing it on every exit path. */
export async function withCycleLease<T>(
  lock: CycleLock,
  trigger: SyncTrigger,
  fn: (lease: CycleLease) => Promise<T>,
): Promise<T> {
  const lease = lock.acquire(trigger);
  try {
    return await fn(lease);
  } finally {
    lease.release();
  }
}
