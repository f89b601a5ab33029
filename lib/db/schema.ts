/**
 * Drizzle ORM schema: task catalog and archived interviews.
 *
 * coding_tasks and theory_questions hold the catalog; task_tests holds the
 * test vectors of each task. interview_sessions stores the committee report
 * of every finished interview.
 */

import {
  pgTable,
  text,
  timestamp,
  integer,
  serial,
  jsonb,
  boolean,
  real,
  index,
} from "drizzle-orm/pg-core";
import { LEVELS, type CommitteeReport } from "../interview/types";

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const codingTasks = pgTable(
  "coding_tasks",
  {
    id: serial("id").primaryKey(),
    level: text("level", { enum: LEVELS }).notNull(),
    difficulty: integer("difficulty").notNull(),
    title: text("title").notNull(),
    description: text("description").notNull(),
    examples: text("examples").notNull().default(""),
    starterCode: text("starter_code").notNull().default(""),
    hints: jsonb("hints").notNull().$type<string[]>(),
    tags: jsonb("tags").notNull().$type<string[]>(),
    timeLimit: integer("time_limit").notNull().default(15),
  },
  (t) => [index("coding_tasks_level_idx").on(t.level, t.difficulty)]
);

export const taskTests = pgTable("task_tests", {
  id: serial("id").primaryKey(),
  taskId: integer("task_id")
    .notNull()
    .references(() => codingTasks.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  input: jsonb("input").notNull().$type<unknown[]>(),
  expected: jsonb("expected").$type<unknown>(),
  hidden: boolean("hidden").default(false).notNull(),
});

export const theoryQuestions = pgTable(
  "theory_questions",
  {
    id: serial("id").primaryKey(),
    level: text("level", { enum: LEVELS }).notNull(),
    difficulty: integer("difficulty").notNull(),
    category: text("category").notNull(),
    question: text("question").notNull(),
    expectedTopics: jsonb("expected_topics").notNull().$type<string[]>(),
    followUp: jsonb("follow_up").notNull().$type<string[]>(),
    tags: jsonb("tags").notNull().$type<string[]>(),
    timeLimit: integer("time_limit").notNull().default(5),
  },
  (t) => [index("theory_questions_level_idx").on(t.level, t.difficulty)]
);

// ---------------------------------------------------------------------------
// Archive
// ---------------------------------------------------------------------------

export const interviewSessions = pgTable("interview_sessions", {
  id: text("id").primaryKey(),
  candidateName: text("candidate_name").notNull(),
  level: text("level", { enum: LEVELS }).notNull(),
  finalScore: real("final_score").notNull(),
  verdict: text("verdict").notNull(),
  report: jsonb("report").notNull().$type<CommitteeReport>(),
  startedAt: timestamp("started_at", { mode: "date" }).notNull(),
  finishedAt: timestamp("finished_at", { mode: "date" }).defaultNow().notNull(),
});
