import { NextRequest, NextResponse } from "next/server";
import { listRuns } from "@/sync/ledger/repository";
import { runsQuerySchema } from "@/sync/types/api";

export const dynamic = "force-dynamic";

/**
 * GET /api/sync/runs: run history, newest first.
 *
 * Query (all optional):
 *   from, to: ISO-8601 bounds on the run start
 *   status: cycle status, or "running"
 *   limit: 1-200, default 50
 */
export async function GET(request: NextRequest) {
  const parsed = runsQuerySchema.safeParse(Object.fromEntries(request.nextUrl.searchParams));
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid query", details: parsed.error.issues },
      { status: 400 },
    );
  }

  return NextResponse.json({ runs: listRuns(parsed.data) });
}
