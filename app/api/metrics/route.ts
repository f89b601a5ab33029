/**
 * GET /api/metrics — Scoring signals and penalty weights per level.
 */

import { NextResponse } from "next/server";
import { DEFAULT_PENALTY_WEIGHTS } from "@/lib/interview/config";
import { METRIC_DESCRIPTIONS } from "@/lib/interview/metrics";

export async function GET() {
  return NextResponse.json({
    metrics: METRIC_DESCRIPTIONS,
    penaltyWeights: DEFAULT_PENALTY_WEIGHTS,
  });
}
