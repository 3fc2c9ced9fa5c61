import { NextResponse } from "next/server";
import { resumeAfterAuthFailure } from "@/sync";

/** POST /api/sync/resume: clear the halt after calendar credentials were refreshed. */
export async function POST() {
  const resumed = resumeAfterAuthFailure();
  return NextResponse.json({ resumed });
}
