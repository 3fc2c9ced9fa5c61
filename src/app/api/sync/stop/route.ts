import { NextResponse } from "next/server";
import { requestCycleStop } from "@/sync";

/** POST /api/sync/stop: stop the running cycle after its in-flight calls finish. */
export async function POST() {
  const requested = requestCycleStop();
  return NextResponse.json({ requested }, { status: requested ? 202 : 404 });
}
