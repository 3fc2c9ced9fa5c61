// Error taxonomy shared by the collaborators and the sync engine.

export class SyncError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "SyncError";
    this.code = code;
  }
}

export type ScrapeFailureReason = "session_expired" | "layout_changed" | "network" | "unknown";

/** Portal snapshot could not be read. The cycle is aborted, state is kept. */
export class ScrapeError extends SyncError {
  readonly reason: ScrapeFailureReason;

  constructor(message: string, reason: ScrapeFailureReason = "unknown") {
    super(message, "SCRAPE_FAILED");
    this.name = "ScrapeError";
    this.reason = reason;
  }
}

/** Calendar snapshot could not be read. The cycle is aborted, state is kept. */
export class CalendarFetchError extends SyncError {
  constructor(message: string) {
    super(message, "CALENDAR_FETCH_FAILED");
    this.name = "CalendarFetchError";
  }
}

/** Retryable write failure (network, 5xx). */
export class TransientWriteError extends SyncError {
  constructor(message: string, code = "TRANSIENT_WRITE") {
    super(message, code);
    this.name = "TransientWriteError";
  }
}

/** 429 from the calendar. Retryable. */
export class RateLimitError extends TransientWriteError {
  constructor(message = "Rate limited by calendar API") {
    super(message, "RATE_LIMITED");
    this.name = "RateLimitError";
  }
}

/** A remote call exceeded its per-call timeout. Retryable. */
export class CallTimeoutError extends TransientWriteError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, "CALL_TIMEOUT");
    this.name = "CallTimeoutError";
  }
}

/** Non-retryable write rejection (validation, permission on a single event). */
export class CalendarWriteError extends SyncError {
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number) {
    super(message, "CALENDAR_WRITE_REJECTED");
    this.name = "CalendarWriteError";
    this.statusCode = statusCode;
  }
}

/** The calendar event no longer exists. */
export class NotFoundError extends SyncError {
  constructor(message = "Calendar event not found") {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** Credentials rejected. Halts all cycles until an operator resumes. */
export class AuthError extends SyncError {
  constructor(message = "Calendar credentials were rejected") {
    super(message, "AUTH_FAILED");
    this.name = "AuthError";
  }
}

/** Required settings are missing or malformed. */
export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export class CycleInProgressError extends SyncError {
  readonly holder: string;
  readonly expiresAt: string;

  constructor(holder: string, expiresAt: string) {
    super(`A sync cycle is already running (${holder}, lease until ${expiresAt})`, "CYCLE_IN_PROGRESS");
    this.name = "CycleInProgressError";
    this.holder = holder;
    this.expiresAt = expiresAt;
  }
}

export function isTransient(error: unknown): boolean {
  return error instanceof TransientWriteError;
}
