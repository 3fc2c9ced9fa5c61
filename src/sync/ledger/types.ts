import type { ConflictRecord, CycleStatus, SyncReport, SyncTrigger } from "@/sync/types";

export interface SyncRunRecord {
  runId: string;
  startedAt: string;
  completedAt: string | null;
  trigger: SyncTrigger;
  dryRun: boolean;
  status: CycleStatus | "running";
  report: SyncReport | null;
}

export interface LeaseRecord {
  holder: string;
  trigger: SyncTrigger;
  acquiredAt: string;
  expiresAt: string;
  cancelRequested: boolean;
}

export interface LoggedConflict extends ConflictRecord {
  runId: string;
}

export interface HaltState {
  reason: string;
  haltedAt: string;
}
