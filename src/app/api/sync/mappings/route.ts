import { NextRequest, NextResponse } from "next/server";
import { listMappings } from "@/sync/ledger/repository";
import { mappingsQuerySchema } from "@/sync/types/api";

export const dynamic = "force-dynamic";

/** GET /api/sync/mappings?from&to&status&limit: booking to event mappings, by booking start. */
export async function GET(request: NextRequest) {
  const parsed = mappingsQuerySchema.safeParse(Object.fromEntries(request.nextUrl.searchParams));
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid query", details: parsed.error.issues },
      { status: 400 },
    );
  }

  return NextResponse.json({ mappings: listMappings(parsed.data) });
}
