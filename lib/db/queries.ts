/**
 * Database repository functions.
 *
 * All database access goes through this module. DbCatalog implements the
 * TaskCatalog contract on top of Drizzle; the catalog tables are seeded
 * from data/catalog.json the first time they are read while empty.
 */

import { and, asc, between, eq, inArray, notInArray, sql } from "drizzle-orm";
import { difficultyBand } from "@/lib/catalog/adaptive";
import { loadCatalogSeed } from "@/lib/catalog/memory";
import type {
  CatalogSeed,
  CodingTask,
  TaskCatalog,
  TheoryQuestion,
} from "@/lib/catalog/types";
import type { InterviewSession, Level } from "@/lib/interview/types";
import { db } from "./index";
import {
  codingTasks,
  interviewSessions,
  taskTests,
  theoryQuestions,
} from "./schema";

type TaskRow = typeof codingTasks.$inferSelect;

// ---------------------------------------------------------------------------
// Seeding
// ---------------------------------------------------------------------------

export async function seedCatalog(data: CatalogSeed): Promise<void> {
  await db.transaction(async (tx) => {
    for (const task of data.tasks) {
      const { tests, ...fields } = task;
      const [row] = await tx
        .insert(codingTasks)
        .values(fields)
        .returning({ id: codingTasks.id });
      if (tests.length > 0) {
        await tx.insert(taskTests).values(
          tests.map((test, position) => ({
            taskId: row.id,
            position,
            input: test.input,
            expected: test.expected,
            hidden: test.hidden,
          }))
        );
      }
    }
    if (data.questions.length > 0) {
      await tx.insert(theoryQuestions).values(data.questions);
    }
  });
}

let seeding: Promise<void> | null = null;

/** Seed the catalog once per process when the task table is empty. */
export function ensureSeeded(): Promise<void> {
  if (!seeding) {
    seeding = (async () => {
      const [{ count }] = await db
        .select({ count: sql<number>`count(*)::int` })
        .from(codingTasks);
      if (count === 0) {
        console.info("[db] Catalog is empty, seeding from data/catalog.json");
        await seedCatalog(loadCatalogSeed());
      }
    })().catch((error: unknown) => {
      seeding = null;
      throw error;
    });
  }
  return seeding;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

async function attachTests(rows: TaskRow[]): Promise<CodingTask[]> {
  if (rows.length === 0) return [];
  const tests = await db
    .select()
    .from(taskTests)
    .where(
      inArray(
        taskTests.taskId,
        rows.map((row) => row.id)
      )
    )
    .orderBy(asc(taskTests.taskId), asc(taskTests.position));

  return rows.map((row) => ({
    ...row,
    tests: tests
      .filter((test) => test.taskId === row.id)
      .map((test) => ({
        input: test.input,
        expected: test.expected,
        hidden: test.hidden,
      })),
  }));
}

export class DbCatalog implements TaskCatalog {
  async listTasks(level: Level, limit: number): Promise<CodingTask[]> {
    await ensureSeeded();
    const rows = await db
      .select()
      .from(codingTasks)
      .where(eq(codingTasks.level, level))
      .orderBy(asc(codingTasks.difficulty), asc(codingTasks.id))
      .limit(limit);
    return attachTests(rows);
  }

  async listQuestions(level: Level, limit: number): Promise<TheoryQuestion[]> {
    await ensureSeeded();
    return db
      .select()
      .from(theoryQuestions)
      .where(eq(theoryQuestions.level, level))
      .orderBy(asc(theoryQuestions.difficulty), asc(theoryQuestions.id))
      .limit(limit);
  }

  async pickAdaptiveTask(
    level: Level,
    score: number,
    excludeIds: number[]
  ): Promise<CodingTask | null> {
    await ensureSeeded();
    const band = difficultyBand(score);
    const unused = and(
      eq(codingTasks.level, level),
      excludeIds.length > 0 ? notInArray(codingTasks.id, excludeIds) : undefined
    );

    let [row] = await db
      .select()
      .from(codingTasks)
      .where(and(unused, between(codingTasks.difficulty, band.min, band.max)))
      .orderBy(sql`random()`)
      .limit(1);
    if (!row) {
      [row] = await db
        .select()
        .from(codingTasks)
        .where(unused)
        .orderBy(sql`random()`)
        .limit(1);
    }
    if (!row) return null;

    const [task] = await attachTests([row]);
    return task ?? null;
  }
}

// ---------------------------------------------------------------------------
// Interview archive
// ---------------------------------------------------------------------------

export async function saveInterviewReport(session: InterviewSession): Promise<void> {
  if (!session.report) return;
  await db
    .insert(interviewSessions)
    .values({
      id: session.id,
      candidateName: session.candidateName,
      level: session.level,
      finalScore: session.report.finalScore,
      verdict: session.report.verdict,
      report: session.report,
      startedAt: session.startedAt,
    })
    .onConflictDoNothing();
}
