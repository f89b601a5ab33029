/**
 * In-memory catalog seeded from data/catalog.json.
 *
 * Used when no database is configured, and in tests.
 */

import seed from "@/data/catalog.json";
import type { Level } from "@/lib/interview/types";
import { difficultyBand, inBand, pickRandom } from "./adaptive";
import {
  CatalogSeedSchema,
  type CatalogSeed,
  type CodingTask,
  type TaskCatalog,
  type TheoryQuestion,
} from "./types";

export function loadCatalogSeed(raw: unknown = seed): CatalogSeed {
  return CatalogSeedSchema.parse(raw);
}

/** Assign ids in file order, starting at 1, as a fresh database would. */
export function materializeSeed(data: CatalogSeed): {
  tasks: CodingTask[];
  questions: TheoryQuestion[];
} {
  return {
    tasks: data.tasks.map((task, index) => ({
      id: index + 1,
      ...task,
      tests: task.tests.map((test) => ({
        input: test.input,
        expected: test.expected,
        hidden: test.hidden,
      })),
    })),
    questions: data.questions.map((question, index) => ({
      id: index + 1,
      ...question,
    })),
  };
}

function byDifficulty<T extends { difficulty: number; id: number }>(a: T, b: T): number {
  return a.difficulty - b.difficulty || a.id - b.id;
}

export class MemoryCatalog implements TaskCatalog {
  private readonly tasks: CodingTask[];
  private readonly questions: TheoryQuestion[];

  constructor(
    data: { tasks: CodingTask[]; questions: TheoryQuestion[] },
    private readonly random: () => number = Math.random
  ) {
    this.tasks = [...data.tasks].sort(byDifficulty);
    this.questions = [...data.questions].sort(byDifficulty);
  }

  static fromSeed(raw: unknown = seed, random?: () => number): MemoryCatalog {
    return new MemoryCatalog(materializeSeed(loadCatalogSeed(raw)), random);
  }

  async listTasks(level: Level, limit: number): Promise<CodingTask[]> {
    return this.tasks.filter((task) => task.level === level).slice(0, limit);
  }

  async listQuestions(level: Level, limit: number): Promise<TheoryQuestion[]> {
    return this.questions
      .filter((question) => question.level === level)
      .slice(0, limit);
  }

  async pickAdaptiveTask(
    level: Level,
    score: number,
    excludeIds: number[]
  ): Promise<CodingTask | null> {
    const excluded = new Set(excludeIds);
    const unused = this.tasks.filter(
      (task) => task.level === level && !excluded.has(task.id)
    );
    const band = difficultyBand(score);

    return (
      pickRandom(
        unused.filter((task) => inBand(task.difficulty, band)),
        this.random
      ) ?? pickRandom(unused, this.random)
    );
  }
}
