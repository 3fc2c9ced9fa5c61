import { createHash } from "crypto";
import type { AppointmentStatus } from "@/sync/types";

export interface FingerprintFields {
  start: string;
  end: string;
  customerLabel: string;
  status: AppointmentStatus;
}

/**
 * Hash the fields whose change requires a calendar update.
 * Keys are sorted so the hash is stable regardless of property order.
 */
export function fingerprint(fields: FingerprintFields): string {
  const { start, end, customerLabel, status } = fields;
  const sorted = stableSortKeys({ start, end, customerLabel, status });
  return createHash("sha256").update(JSON.stringify(sorted)).digest("hex");
}

/** Short, order-independent key for a set of identity strings. */
export function compositeKey(parts: string[]): string {
  return createHash("sha256").update([...parts].sort().join("|")).digest("hex").slice(0, 32);
}

function stableSortKeys(obj: Record<string, unknown>): Record<string, unknown> {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(obj).sort()) {
    const val = obj[key];
    sorted[key] = val ?? null;
  }
  return sorted;
}
