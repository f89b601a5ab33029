/**
 * Interview session state.
 *
 * A session is a plain object owned by the registry and passed explicitly
 * to every operation. All collections exist from creation.
 */

import type { CodingTask, TheoryQuestion } from "@/lib/catalog/types";
import { MAX_LIVE_SESSIONS } from "./config";
import type {
  CurrentContext,
  InterviewSession,
  Level,
} from "./types";

export interface CreateSessionInput {
  id?: string;
  candidateName: string;
  level: Level;
  codingTasks: CodingTask[];
  theoryQuestions: TheoryQuestion[];
  now?: Date;
}

export function createSession(input: CreateSessionInput): InterviewSession {
  const now = input.now ?? new Date();
  return {
    id: input.id ?? crypto.randomUUID(),
    candidateName: input.candidateName,
    level: input.level,
    currentPersona: "hr_manager",
    phase: "intro",

    codingTasks: [...input.codingTasks],
    theoryQuestions: [...input.theoryQuestions],
    currentTaskIdx: 0,
    currentTheoryIdx: 0,
    usedTaskIds: input.codingTasks.map((task) => task.id),

    codingScores: {},
    theoryScores: {},
    adrScores: {},
    attempts: {},

    penalties: [],
    personaNotes: { hr_manager: [], tech_lead: [], senior_dev: [] },

    startedAt: now,
    phaseStartedAt: now,
    chatHistory: [],
    feedbackTiming: {
      lastFeedbackAt: null,
      lastFeedbackType: null,
      deadline: null,
      penaltyApplied: false,
    },

    previousAnswers: {},
    feedbackReceived: {},
    learningAgilityScores: {},

    clarificationRequests: {},
    clarificationBonuses: {},
    clarificationHistory: [],

    contextSwitchViolations: [],
    readabilityReports: {},
    conflictViolations: [],
    anticheatViolations: [],

    finishRequested: false,
    report: null,
  };
}

export function currentTask(session: InterviewSession): CodingTask | null {
  return session.codingTasks[session.currentTaskIdx] ?? null;
}

export function currentQuestion(session: InterviewSession): TheoryQuestion | null {
  return session.theoryQuestions[session.currentTheoryIdx] ?? null;
}

/**
 * What the candidate is currently working on, used to scope analyzers and
 * clarification bonuses.
 */
export function resolveCurrentContext(session: InterviewSession): CurrentContext {
  if (session.phase === "theory") {
    const question = currentQuestion(session);
    if (question) {
      return {
        type: "theory",
        id: String(question.id),
        description: `Theory question on ${question.category}: ${question.question}`,
      };
    }
  }

  if (session.phase === "coding") {
    const task = currentTask(session);
    if (task) {
      return {
        type: "coding",
        id: String(task.id),
        description: `Coding task: ${task.title} - ${task.description}`,
      };
    }
  }

  return { type: "intro", id: "intro", description: "Interview introduction" };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Live sessions by id. Holds at most `capacity` sessions; adding past that
 * evicts the oldest, so a finished report stays readable until newer
 * interviews push it out.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, InterviewSession>();

  constructor(readonly capacity: number = MAX_LIVE_SESSIONS) {}

  add(session: InterviewSession): InterviewSession {
    this.sessions.delete(session.id);
    while (this.sessions.size >= this.capacity) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): InterviewSession | null {
    return this.sessions.get(id) ?? null;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
