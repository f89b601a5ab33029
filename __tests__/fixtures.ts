/**
 * Shared builders for interview tests.
 */

import { MemoryCatalog } from "@/lib/catalog/memory";
import { createSession } from "@/lib/interview/session";
import type { InterviewSession, Level } from "@/lib/interview/types";

export const START = new Date("2025-01-15T10:00:00.000Z");

/** Always picks the first candidate. */
export function seededCatalog(): MemoryCatalog {
  return MemoryCatalog.fromSeed(undefined, () => 0);
}

export async function makeSession(
  level: Level = "junior",
  catalog: MemoryCatalog = seededCatalog()
): Promise<InterviewSession> {
  return createSession({
    id: "test-session",
    candidateName: "Test Candidate",
    level,
    codingTasks: await catalog.listTasks(level, 3),
    theoryQuestions: await catalog.listQuestions(level, 2),
    now: START,
  });
}

export function minutesAfter(start: Date, minutes: number): Date {
  return new Date(start.getTime() + minutes * 60_000);
}
