import { NextRequest, NextResponse } from "next/server";
import { runConfiguredCycle } from "@/sync";
import { ConfigError, CycleInProgressError } from "@/sync/errors";
import { getHaltState } from "@/sync/ledger/repository";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { runRequestSchema } from "@/sync/types/api";

const log = createChildLogger("api-run");

// Allow up to 5 minutes for the Browserbase scrape plus calendar writes
export const maxDuration = 300;

/**
 * POST /api/sync/run: run one cycle with env-configured credentials.
 *
 * Body (optional):
 *   dryRun?: boolean
 *   from?: ISO-8601, to?: ISO-8601 (override the default window)
 */
export async function POST(request: NextRequest) {
  let body: unknown = {};
  const text = await request.text();
  if (text.trim()) {
    try {
      body = JSON.parse(text);
    } catch {
      return NextResponse.json({ error: "Invalid JSON in request body" }, { status: 400 });
    }
  }

  const parsed = runRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid request", details: parsed.error.issues },
      { status: 400 },
    );
  }

  const halt = getHaltState();
  if (halt) {
    return NextResponse.json(
      { error: "Sync is halted until credentials are refreshed and sync is resumed", halt },
      { status: 423 },
    );
  }

  const { dryRun, from, to } = parsed.data;
  log.info("Sync cycle triggered via API", { dryRun, from, to });

  try {
    const report = await runConfiguredCycle("manual", { dryRun, window: { from, to } });
    return NextResponse.json({ status: report.status, report });
  } catch (error) {
    if (error instanceof CycleInProgressError) {
      return NextResponse.json(
        { error: "A sync cycle is already running", holder: error.holder, expiresAt: error.expiresAt },
        { status: 409 },
      );
    }
    const message = errorMessage(error);
    if (error instanceof ConfigError) {
      log.error("Sync is not configured", { error: message });
      return NextResponse.json({ error: "Sync is not configured", message }, { status: 500 });
    }
    log.error("Sync cycle failed via API", { error: message });
    return NextResponse.json({ error: "Sync failed", message }, { status: 500 });
  }
}
