/**
 * POST /api/interview — Start an interview for a level.
 */

import { NextRequest, NextResponse } from "next/server";
import { startInterview } from "@/lib/interview/handlers";
import { getRuntime } from "@/lib/interview/runtime";
import { StartInterviewSchema } from "@/lib/interview/validation";

export async function POST(request: NextRequest) {
  const body = await request.json().catch(() => null);
  const parsed = StartInterviewSchema.safeParse(body);

  if (!parsed.success) {
    return NextResponse.json(
      { error: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }

  const result = await startInterview(parsed.data, await getRuntime());
  return NextResponse.json(result, { status: 201 });
}
