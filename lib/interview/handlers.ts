/**
 * Interview operations behind the HTTP routes.
 *
 * Every operation takes the session it acts on and its dependencies
 * explicitly. Client errors come back as { success: false, error }; oracle
 * failures degrade to fallback text and never fail the operation.
 */

import type { CodingTask, TaskCatalog, TheoryQuestion } from "@/lib/catalog/types";
import type { CodeSandbox, TestResult } from "@/lib/sandbox/types";
import { analyzeAnswerDepth } from "./analyzers/depth";
import { analyzeLearningAgility } from "./analyzers/learning-agility";
import { analyzeReadability } from "./analyzers/readability";
import { runCommittee } from "./committee";
import {
  FALLBACK_ANTICHEAT_POINTS,
  INITIAL_QUESTION_COUNT,
  INITIAL_TASK_COUNT,
} from "./config";
import type { FeedbackClassifier } from "./feedback-timing";
import {
  addPersonaNote,
  appendPenalty,
  levelWeight,
  penaltyPointsFor,
} from "./ledger";
import { clamp } from "./numbers";
import { complete } from "./oracle";
import { getPersona, summarizePersona } from "./personas";
import {
  THEORY_EVALUATOR_SYSTEM,
  buildCodingFeedbackPartialPrompt,
  buildCodingFeedbackSuccessPrompt,
  buildGreetingPrompt,
  buildPersonaIntroPrompt,
  buildPersonaSpeechSystem,
  buildTheoryEvaluationPrompt,
} from "./prompts";
import { SessionRegistry, createSession, currentQuestion, currentTask } from "./session";
import { runChatTurn, type ChatTurnResult } from "./turn";
import type {
  CommitteeReport,
  Failure,
  InterviewSession,
  Persona,
  PersonaRole,
  PersonaSummary,
  Phase,
} from "./types";
import type {
  AnticheatInput,
  StartInterviewInput,
  SubmitCodeInput,
  TheoryAnswerInput,
} from "./validation";

export interface InterviewDependencies {
  catalog: TaskCatalog;
  sandbox: CodeSandbox;
  registry: SessionRegistry;
  archive?: (session: InterviewSession) => Promise<void>;
  classifier?: FeedbackClassifier;
  clock?: () => Date;
}

function now(deps: Pick<InterviewDependencies, "clock">): Date {
  return deps.clock ? deps.clock() : new Date();
}

/** Spoken text from the oracle, or the fallback when the call fails. */
async function speak(
  prompt: string,
  persona: Persona,
  fallback: string,
  tag: string
): Promise<string> {
  try {
    const text = await complete(prompt, { system: buildPersonaSpeechSystem(persona) });
    return text || fallback;
  } catch (error) {
    console.error(`[${tag}] Falling back to canned text:`, error);
    return fallback;
  }
}

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

export interface StartResult {
  success: true;
  sessionId: string;
  greeting: string;
  persona: PersonaSummary;
  phase: Phase;
  totalCodingTasks: number;
  totalTheoryQuestions: number;
}

export async function startInterview(
  input: StartInterviewInput,
  deps: InterviewDependencies
): Promise<StartResult> {
  const [codingTasks, theoryQuestions] = await Promise.all([
    deps.catalog.listTasks(input.level, INITIAL_TASK_COUNT),
    deps.catalog.listQuestions(input.level, INITIAL_QUESTION_COUNT),
  ]);
  const session = deps.registry.add(
    createSession({
      candidateName: input.candidateName,
      level: input.level,
      codingTasks,
      theoryQuestions,
      now: now(deps),
    })
  );

  const persona = getPersona(session.currentPersona);
  const greeting = await speak(
    buildGreetingPrompt(input.candidateName, input.level),
    persona,
    `Hello, ${input.candidateName}! I'm ${persona.name}, ${persona.title}. Let's begin the interview.`,
    "start"
  );

  return {
    success: true,
    sessionId: session.id,
    greeting,
    persona: summarizePersona(persona),
    phase: session.phase,
    totalCodingTasks: session.codingTasks.length,
    totalTheoryQuestions: session.theoryQuestions.length,
  };
}

// ---------------------------------------------------------------------------
// Current items
// ---------------------------------------------------------------------------

export interface Finished {
  success: false;
  error: string;
  finished: true;
}

export interface TaskView {
  success: true;
  task: Omit<CodingTask, "tests" | "hints" | "level" | "tags">;
  current: number;
  total: number;
}

export function getCurrentTask(session: InterviewSession): TaskView | Finished {
  const task = currentTask(session);
  if (!task) return { success: false, error: "No tasks left", finished: true };
  return {
    success: true,
    task: {
      id: task.id,
      difficulty: task.difficulty,
      title: task.title,
      description: task.description,
      examples: task.examples,
      starterCode: task.starterCode,
      timeLimit: task.timeLimit,
    },
    current: session.currentTaskIdx + 1,
    total: session.codingTasks.length,
  };
}

export interface QuestionView {
  success: true;
  question: Pick<TheoryQuestion, "id" | "category" | "question" | "timeLimit">;
  current: number;
  total: number;
}

export function getCurrentQuestion(
  session: InterviewSession
): QuestionView | Finished {
  const question = currentQuestion(session);
  if (!question) return { success: false, error: "No questions left", finished: true };
  return {
    success: true,
    question: {
      id: question.id,
      category: question.category,
      question: question.question,
      timeLimit: question.timeLimit,
    },
    current: session.currentTheoryIdx + 1,
    total: session.theoryQuestions.length,
  };
}

// ---------------------------------------------------------------------------
// Coding
// ---------------------------------------------------------------------------

const MAX_LISTED_VIOLATIONS = 3;

export interface SubmitCodeResult {
  success: true;
  results: TestResult[];
  passed: number;
  total: number;
  allPassed: boolean;
  feedback: string;
  attempts: number;
  persona: PersonaSummary;
  codeReadability: {
    score: number;
    violationsCount: number;
    penaltyApplied: number;
  };
  nextTask?: boolean;
  codingFinished?: boolean;
}

export async function submitCode(
  session: InterviewSession,
  input: SubmitCodeInput,
  deps: InterviewDependencies
): Promise<SubmitCodeResult | Failure> {
  const task = session.codingTasks.find((t) => t.id === input.taskId);
  if (!task) return { success: false, error: "Task not found" };

  const attemptKey = `coding_${task.id}`;
  const attempts = (session.attempts[attemptKey] ?? 0) + 1;
  session.attempts[attemptKey] = attempts;
  if (attempts > 1) {
    appendPenalty(
      session,
      "multiple_attempts",
      penaltyPointsFor(session.level, "multiple_attempts"),
      `Attempt #${attempts} at ${task.title}`,
      now(deps)
    );
  }

  const readability = analyzeReadability(input.code, session.level);
  session.readabilityReports[task.id] = readability;
  if (readability.penaltyScore > 0) {
    appendPenalty(
      session,
      "poor_code_readability",
      readability.penaltyScore,
      `PEP 8 violations in ${task.title}: ${readability.violationsCount} issues`,
      now(deps)
    );
  }

  const results = await deps.sandbox.run(input.code, task.tests);
  const passed = results.filter((r) => r.passed).length;
  const total = results.length;
  const score = total > 0 ? passed / total : 0;
  session.codingScores[task.id] = score;

  const persona = getPersona(session.currentPersona);
  let feedback =
    total > 0 && passed === total
      ? await speak(
          buildCodingFeedbackSuccessPrompt(task.title, attempts),
          persona,
          "All tests passed. Well done!",
          "code"
        )
      : await speak(
          buildCodingFeedbackPartialPrompt(task.title, passed, total),
          persona,
          `${passed} of ${total} tests passed. Take another look at the failing cases.`,
          "code"
        );

  if (readability.violationsCount > 0) {
    feedback += `\nCode quality: ${readability.feedback}`;
    const listed = readability.violations.slice(0, MAX_LISTED_VIOLATIONS);
    feedback += "\nMain notes:";
    for (const violation of listed) {
      feedback += `\n  - ${violation.message}`;
    }
  }

  const result: SubmitCodeResult = {
    success: true,
    results,
    passed,
    total,
    allPassed: passed === total,
    feedback,
    attempts,
    persona: summarizePersona(persona),
    codeReadability: {
      score: readability.readabilityScore,
      violationsCount: readability.violationsCount,
      penaltyApplied: readability.penaltyScore,
    },
  };

  if (passed === total && currentTask(session)?.id === task.id) {
    session.currentTaskIdx += 1;
    if (session.currentTaskIdx < session.codingTasks.length) {
      result.nextTask = true;
    } else {
      result.codingFinished = true;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Theory
// ---------------------------------------------------------------------------

const DEFAULT_THEORY_SCORE = 5;
const POOR_COMMUNICATION_ADR = 0.25;
const LEARNING_AGILITY_REPORT_THRESHOLD = 0.3;

/** Grade from an evaluator reply in the "SCORE: n / FEEDBACK: text" format. */
export function parseTheoryEvaluation(text: string): { score: number; feedback: string } {
  const scoreMatch = text.match(/SCORE:\s*(\d+)/i);
  const raw = scoreMatch ? Number(scoreMatch[1]) : DEFAULT_THEORY_SCORE;
  const feedbackMatch = text.match(/FEEDBACK:\s*([\s\S]+)/i);
  return {
    score: clamp(raw, 0, 10) / 10,
    feedback: feedbackMatch ? feedbackMatch[1].trim() : text.trim(),
  };
}

/** Reward deep answers and mark down shallow ones. */
export function adjustForDepth(score: number, adrScore: number): number {
  if (adrScore > 0.7) return Math.min(1, score + 0.15);
  if (adrScore > 0.3) return Math.max(0, score - 0.1);
  return Math.max(0, score - 0.25);
}

export interface TheoryAnswerResult {
  success: true;
  score: number; // percent
  adrScore: number; // percent
  learningAgilityScore: number | null; // percent
  feedback: string;
  persona: PersonaSummary;
  nextQuestion?: boolean;
  theoryFinished?: boolean;
}

export async function submitTheoryAnswer(
  session: InterviewSession,
  input: TheoryAnswerInput,
  deps: Pick<InterviewDependencies, "clock">
): Promise<TheoryAnswerResult | Failure> {
  const question = session.theoryQuestions.find((q) => q.id === input.questionId);
  if (!question) return { success: false, error: "Question not found" };

  const previousAnswer = session.previousAnswers[question.id] ?? "";
  const previousFeedback = session.feedbackReceived[question.id] ?? "";

  const depth = await analyzeAnswerDepth({
    answer: input.answer,
    question: question.question,
    expectedTopics: question.expectedTopics,
  });

  let evaluation = { score: DEFAULT_THEORY_SCORE / 10, feedback: "" };
  try {
    const text = await complete(
      buildTheoryEvaluationPrompt({
        question: question.question,
        answer: input.answer,
        expectedTopics: question.expectedTopics,
        adrScore: depth.adrScore,
      }),
      { system: THEORY_EVALUATOR_SYSTEM, maxTokens: 500, format: "raw" }
    );
    evaluation = parseTheoryEvaluation(text);
  } catch (error) {
    console.error("[theory] Evaluation failed:", error);
    evaluation.feedback = "The answer could not be graded automatically.";
  }

  let agility: Awaited<ReturnType<typeof analyzeLearningAgility>> | null = null;
  if (previousAnswer && previousFeedback) {
    agility = await analyzeLearningAgility({
      previousAnswer,
      feedback: previousFeedback,
      newAnswer: input.answer,
    });
    session.learningAgilityScores[question.id] = agility.score;
  }

  const finalScore = adjustForDepth(evaluation.score, depth.adrScore);
  if (depth.adrScore < POOR_COMMUNICATION_ADR) {
    appendPenalty(
      session,
      "poor_communication",
      penaltyPointsFor(session.level, "poor_communication"),
      `Shallow answer with filler (ADR=${depth.adrScore.toFixed(2)})`,
      now(deps)
    );
  }

  let feedback = `${evaluation.feedback}\nAnswer depth: ${depth.adrScore.toFixed(2)}/1.0\n${depth.feedback}`;
  if (depth.issues.length > 0) {
    feedback += `\nIssues: ${depth.issues.join(", ")}`;
  }
  if (agility && agility.score > LEARNING_AGILITY_REPORT_THRESHOLD) {
    feedback += `\nLearning agility: ${agility.score.toFixed(2)}/1.0\n${agility.feedback}`;
    if (agility.improvedAreas.length > 0) {
      feedback += `\nImproved: ${agility.improvedAreas.join(", ")}`;
    }
  }

  session.theoryScores[question.id] = finalScore;
  session.previousAnswers[question.id] = input.answer;
  session.feedbackReceived[question.id] = feedback;

  const result: TheoryAnswerResult = {
    success: true,
    score: Math.round(finalScore * 100),
    adrScore: Math.round(depth.adrScore * 100),
    learningAgilityScore: agility ? Math.round(agility.score * 100) : null,
    feedback,
    persona: summarizePersona(getPersona(session.currentPersona)),
  };

  if (currentQuestion(session)?.id === question.id) {
    session.currentTheoryIdx += 1;
  }
  if (session.currentTheoryIdx >= session.theoryQuestions.length) {
    result.theoryFinished = true;
  } else {
    result.nextQuestion = true;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export function chat(
  session: InterviewSession,
  message: string,
  deps: InterviewDependencies
): Promise<ChatTurnResult> {
  return runChatTurn(session, message, {
    catalog: deps.catalog,
    classifier: deps.classifier,
    clock: deps.clock,
  });
}

// ---------------------------------------------------------------------------
// Hints
// ---------------------------------------------------------------------------

export const NO_MORE_HINTS = "No more hints. Try to solve it on your own!";

export interface HintResult {
  success: true;
  hint: string;
  penaltyApplied: boolean;
  hintsRemaining: number;
}

export function requestHint(
  session: InterviewSession,
  deps: Pick<InterviewDependencies, "clock"> = {}
): HintResult | Failure {
  const task = currentTask(session);
  if (!task) return { success: false, error: "No active task" };

  const hintKey = `hint_${task.id}`;
  const used = session.attempts[hintKey] ?? 0;
  if (used >= task.hints.length) {
    return { success: true, hint: NO_MORE_HINTS, penaltyApplied: false, hintsRemaining: 0 };
  }

  appendPenalty(
    session,
    "hint_used",
    penaltyPointsFor(session.level, "hint_used"),
    `Hint #${used + 1} for ${task.title}`,
    now(deps)
  );
  session.attempts[hintKey] = used + 1;

  return {
    success: true,
    hint: task.hints[used],
    penaltyApplied: true,
    hintsRemaining: task.hints.length - used - 1,
  };
}

// ---------------------------------------------------------------------------
// Personas
// ---------------------------------------------------------------------------

export interface SwitchPersonaResult {
  success: true;
  persona: PersonaSummary;
  intro: string;
}

export async function switchPersona(
  session: InterviewSession,
  role: PersonaRole
): Promise<SwitchPersonaResult> {
  session.currentPersona = role;
  const persona = getPersona(role);
  const intro = await speak(
    buildPersonaIntroPrompt(session.level),
    persona,
    `Hi, I'm ${persona.name}, ${persona.title}. Let's continue.`,
    "persona"
  );
  return { success: true, persona: summarizePersona(persona), intro };
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export interface StatusResult {
  success: true;
  level: InterviewSession["level"];
  phase: Phase;
  persona: PersonaSummary;
  coding: { current: number; total: number; completed: number };
  theory: { current: number; total: number; completed: number };
  penaltiesCount: number;
  elapsedSeconds: number;
  violations: {
    contextSwitching: number;
    conflictBehavior: number;
    readabilityChecks: number;
    anticheat: number;
  };
  finished: boolean;
}

export function getStatus(
  session: InterviewSession,
  deps: Pick<InterviewDependencies, "clock"> = {}
): StatusResult {
  return {
    success: true,
    level: session.level,
    phase: session.phase,
    persona: summarizePersona(getPersona(session.currentPersona)),
    coding: {
      current: session.currentTaskIdx + 1,
      total: session.codingTasks.length,
      completed: Object.keys(session.codingScores).length,
    },
    theory: {
      current: session.currentTheoryIdx + 1,
      total: session.theoryQuestions.length,
      completed: Object.keys(session.theoryScores).length,
    },
    penaltiesCount: session.penalties.length,
    elapsedSeconds: Math.floor(
      (now(deps).getTime() - session.startedAt.getTime()) / 1000
    ),
    violations: {
      contextSwitching: session.contextSwitchViolations.length,
      conflictBehavior: session.conflictViolations.length,
      readabilityChecks: Object.keys(session.readabilityReports).length,
      anticheat: session.anticheatViolations.length,
    },
    finished: session.report !== null,
  };
}

// ---------------------------------------------------------------------------
// Anti-cheat
// ---------------------------------------------------------------------------

export interface AnticheatResult {
  success: true;
  penaltyApplied: number;
  totalViolations: number;
}

export function reportAnticheatViolation(
  session: InterviewSession,
  input: AnticheatInput,
  deps: Pick<InterviewDependencies, "clock"> = {}
): AnticheatResult {
  const timestamp = now(deps);
  session.anticheatViolations.push({
    type: input.type,
    reason: input.reason,
    timestamp: timestamp.toISOString(),
  });

  const points = levelWeight(session.level, input.type) ?? FALLBACK_ANTICHEAT_POINTS;
  appendPenalty(session, input.type, points, `Anti-cheat: ${input.reason}`, timestamp);
  addPersonaNote(
    session,
    `Anti-cheat violation: ${input.type} - ${input.reason}`,
    "negative"
  );

  return {
    success: true,
    penaltyApplied: points,
    totalViolations: session.anticheatViolations.length,
  };
}

// ---------------------------------------------------------------------------
// Finish
// ---------------------------------------------------------------------------

export interface FinishResult {
  success: true;
  report: CommitteeReport;
}

/** Convene the committee once; later calls return the stored report. */
export async function finishInterview(
  session: InterviewSession,
  deps: Pick<InterviewDependencies, "archive">
): Promise<FinishResult> {
  if (session.report) return { success: true, report: session.report };

  session.phase = "final";
  const report = await runCommittee(session);
  session.report = report;
  if (deps.archive) await deps.archive(session);
  return { success: true, report };
}
