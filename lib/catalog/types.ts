/**
 * Task/question catalog contract.
 *
 * The catalog is read-only from the interview engine's point of view. Two
 * implementations exist: the in-memory catalog seeded from data/catalog.json
 * and the Postgres-backed one in lib/db/queries.ts.
 */

import { z } from "zod";
import { LEVELS, type Level } from "@/lib/interview/types";

export interface TestVector {
  input: unknown[];
  expected: unknown;
  hidden: boolean;
}

export interface CodingTask {
  id: number;
  level: Level;
  difficulty: number; // 1..10
  title: string;
  description: string;
  examples: string;
  starterCode: string;
  hints: string[];
  tags: string[];
  timeLimit: number; // minutes
  tests: TestVector[];
}

export interface TheoryQuestion {
  id: number;
  level: Level;
  difficulty: number;
  category: string;
  question: string;
  expectedTopics: string[];
  followUp: string[];
  tags: string[];
  timeLimit: number; // minutes
}

export interface TaskCatalog {
  /** Tasks for a level ordered by difficulty. */
  listTasks(level: Level, limit: number): Promise<CodingTask[]>;
  /** Questions for a level ordered by difficulty. */
  listQuestions(level: Level, limit: number): Promise<TheoryQuestion[]>;
  /**
   * A random unused task whose difficulty sits in the band for `score`,
   * else any unused task at the level, else null.
   */
  pickAdaptiveTask(
    level: Level,
    score: number,
    excludeIds: number[]
  ): Promise<CodingTask | null>;
}

// ---------------------------------------------------------------------------
// Seed file schema (data/catalog.json)
// ---------------------------------------------------------------------------

const LevelSchema = z.enum(LEVELS);

export const SeedTaskSchema = z.object({
  level: LevelSchema,
  difficulty: z.number().int().min(1).max(10),
  title: z.string().min(1),
  description: z.string(),
  examples: z.string(),
  starterCode: z.string(),
  hints: z.array(z.string()),
  tags: z.array(z.string()),
  timeLimit: z.number().int().positive(),
  tests: z.array(
    z.object({
      input: z.array(z.unknown()),
      expected: z.unknown(),
      hidden: z.boolean().default(false),
    })
  ),
});

export const SeedQuestionSchema = z.object({
  level: LevelSchema,
  difficulty: z.number().int().min(1).max(10),
  category: z.string(),
  question: z.string().min(1),
  expectedTopics: z.array(z.string()),
  followUp: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  timeLimit: z.number().int().positive().default(5),
});

export const CatalogSeedSchema = z.object({
  tasks: z.array(SeedTaskSchema),
  questions: z.array(SeedQuestionSchema),
});

export type SeedTask = z.infer<typeof SeedTaskSchema>;
export type SeedQuestion = z.infer<typeof SeedQuestionSchema>;
export type CatalogSeed = z.infer<typeof CatalogSeedSchema>;
