/**
 * GET /api/personas — The interviewer panel.
 */

import { NextResponse } from "next/server";
import { listPersonas } from "@/lib/interview/personas";

export async function GET() {
  return NextResponse.json({ personas: listPersonas() });
}
