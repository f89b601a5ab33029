/**
 * Interview scoring configuration.
 *
 * Penalty weights are per level: the same lapse costs a senior candidate
 * more than a junior one. Everything here is a plain typed constant so the
 * numbers are reviewable in one place; only deployment settings come from
 * the environment.
 */

import { z } from "zod";
import type {
  ConflictSeverity,
  FeedbackType,
  Level,
  Opinion,
  Severity,
} from "./types";
import { isLevel } from "./types";

// ---------------------------------------------------------------------------
// Penalty weights
// ---------------------------------------------------------------------------

export type WeightedPenaltyKind =
  | "hint_used"
  | "multiple_attempts"
  | "poor_communication"
  | "slow_feedback_response"
  | "context_switching"
  | "poor_code_readability"
  | "incorrect_answer"
  | "tab_switch"
  | "copy_paste"
  | "devtools_open";

export type PenaltyWeights = Record<WeightedPenaltyKind, number>;

export const DEFAULT_PENALTY_WEIGHTS: Record<Level, PenaltyWeights> = {
  junior: {
    hint_used: 3,
    multiple_attempts: 2,
    poor_communication: 3,
    slow_feedback_response: 2,
    context_switching: 2,
    poor_code_readability: 2,
    incorrect_answer: 3,
    tab_switch: 5,
    copy_paste: 8,
    devtools_open: 10,
  },
  middle: {
    hint_used: 5,
    multiple_attempts: 3,
    poor_communication: 5,
    slow_feedback_response: 3,
    context_switching: 3,
    poor_code_readability: 3,
    incorrect_answer: 5,
    tab_switch: 7,
    copy_paste: 10,
    devtools_open: 12,
  },
  senior: {
    hint_used: 7,
    multiple_attempts: 5,
    poor_communication: 7,
    slow_feedback_response: 5,
    context_switching: 5,
    poor_code_readability: 5,
    incorrect_answer: 8,
    tab_switch: 10,
    copy_paste: 15,
    devtools_open: 15,
  },
};

/** Level-independent fallbacks for penalty kinds the weight table lacks. */
export const DEFAULT_PENALTY_TYPES: Readonly<Record<string, number>> = {
  timeout: 3,
  conflict_behavior: 7,
  wrong_approach: 4,
  off_topic: 3,
};

export const FALLBACK_PENALTY_POINTS = 5;
export const FALLBACK_ANTICHEAT_POINTS = 10;

// ---------------------------------------------------------------------------
// Severity tables
// ---------------------------------------------------------------------------

export const READABILITY_SEVERITY_WEIGHTS: Record<
  Exclude<Severity, "none">,
  Record<Level, number>
> = {
  minor: { junior: 0.2, middle: 0.5, senior: 1.0 },
  moderate: { junior: 0.5, middle: 1.0, senior: 2.0 },
  severe: { junior: 1.0, middle: 2.0, senior: 3.0 },
};

export const CONTEXT_SWITCH_MULTIPLIERS: Record<Severity, number> = {
  none: 0,
  minor: 0.5,
  moderate: 1.0,
  severe: 1.5,
};

export const CONFLICT_BASE_PENALTIES: Record<ConflictSeverity, number> = {
  none: 0,
  minor: 3,
  moderate: 7,
  severe: 15,
  critical: 25,
};

export const CONFLICT_LEVEL_MULTIPLIERS: Record<Level, number> = {
  junior: 0.8,
  middle: 1.0,
  senior: 1.3,
};

// ---------------------------------------------------------------------------
// Feedback timing
// ---------------------------------------------------------------------------

/** Minutes a candidate has to react to interviewer feedback. */
export const DEFAULT_FEEDBACK_TIME_LIMITS: Record<
  FeedbackType,
  Record<Level, number>
> = {
  theory: { junior: 3, middle: 2, senior: 1.5 },
  coding: { junior: 15, middle: 10, senior: 8 },
};

export const DEFAULT_FEEDBACK_TIME_LIMIT_MINUTES = 5;

export function feedbackTimeLimitMinutes(
  type: FeedbackType,
  level: string
): number {
  return isLevel(level)
    ? DEFAULT_FEEDBACK_TIME_LIMITS[type][level]
    : DEFAULT_FEEDBACK_TIME_LIMIT_MINUTES;
}

/** Substrings that mark an interviewer reply as critique. */
export const DEFAULT_FEEDBACK_KEYWORDS: readonly string[] = [
  "mistake",
  "error",
  "problem",
  "improve",
  "incorrect",
  "wrong",
  "advice",
  "recommend",
  "suggest",
  "consider",
  "better",
  "try",
  "pay attention",
];

// ---------------------------------------------------------------------------
// Bonuses and committee
// ---------------------------------------------------------------------------

export const CLARIFICATION_CONFIDENCE_THRESHOLD = 0.7;
export const CLARIFICATION_FIRST_BONUS = 3.0;
export const CLARIFICATION_REPEAT_BONUS = 1.0;

export interface CommitteeConfig {
  codingWeight: number;
  theoryWeight: number;
  baseline: number;
  learningAgilityThreshold: number;
  learningAgilityBonusCap: number;
  clarificationNoteThreshold: number;
  opinionScores: Record<Opinion, number>;
}

export const DEFAULT_COMMITTEE_CONFIG: CommitteeConfig = {
  codingWeight: 0.5,
  theoryWeight: 0.3,
  baseline: 0.2,
  learningAgilityThreshold: 0.7,
  learningAgilityBonusCap: 10,
  clarificationNoteThreshold: 0.8,
  opinionScores: {
    strong_hire: 95,
    hire: 80,
    maybe: 60,
    no_hire: 30,
  },
};

export const INITIAL_TASK_COUNT = 3;
export const INITIAL_QUESTION_COUNT = 2;

/** Sessions kept in memory before the oldest is evicted. */
export const MAX_LIVE_SESSIONS = 100;

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().min(1).optional(),
  INTERVIEW_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  POSTGRES_URL: z.string().min(1).optional(),
  PYTHON_BIN: z.string().min(1).default("python3"),
  SANDBOX_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
});

export type InterviewEnv = z.infer<typeof EnvSchema>;

/**
 * Read deployment settings. Invalid values fall back to their defaults
 * with a warning.
 */
export function loadEnv(
  source: Record<string, string | undefined> = process.env
): InterviewEnv {
  const parsed = EnvSchema.safeParse(source);
  if (parsed.success) return parsed.data;

  const invalidKeys = new Set(
    parsed.error.issues.map((issue) => String(issue.path[0]))
  );
  console.warn(
    "[config] Ignoring invalid environment values:",
    parsed.error.flatten().fieldErrors
  );

  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(source)) {
    if (!invalidKeys.has(key)) cleaned[key] = value;
  }
  return EnvSchema.parse(cleaned);
}
