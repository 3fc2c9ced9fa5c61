import { NextRequest, NextResponse } from "next/server";
import { getSyncStatus } from "@/sync";

export const dynamic = "force-dynamic";

/** GET /api/sync/status?conflicts=N: latest report, open lease, halt state, recent conflicts. */
export async function GET(request: NextRequest) {
  const limit = Number(request.nextUrl.searchParams.get("conflicts") ?? "20");
  const status = getSyncStatus(Number.isInteger(limit) && limit >= 0 ? Math.min(limit, 200) : 20);
  return NextResponse.json(status);
}
