/**
 * Core type definitions for the panel interview engine.
 *
 * Interview lifecycle:
 *   Start:   session created, tasks/questions preloaded, HR greets
 *   Turns:   chat / code / theory submissions feed the analyzers and ledger
 *   Finish:  committee of three personas reduces the session to a verdict
 */

import type { CodingTask, TheoryQuestion } from "@/lib/catalog/types";

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export type Level = "junior" | "middle" | "senior";

export const LEVELS = ["junior", "middle", "senior"] as const satisfies readonly Level[];

export type Phase = "intro" | "theory" | "coding" | "final";

export const PHASES = [
  "intro",
  "theory",
  "coding",
  "final",
] as const satisfies readonly Phase[];

export type PersonaRole = "hr_manager" | "tech_lead" | "senior_dev";

export const PERSONA_ROLES = [
  "hr_manager",
  "tech_lead",
  "senior_dev",
] as const satisfies readonly PersonaRole[];

/** Severity scale shared by context switching and readability. */
export type Severity = "none" | "minor" | "moderate" | "severe";

/** Conflict behaviour adds a terminal tier on top of the shared scale. */
export type ConflictSeverity = Severity | "critical";

export type Sentiment = "positive" | "neutral" | "negative";

export type FeedbackType = "theory" | "coding";

// ---------------------------------------------------------------------------
// Personas
// ---------------------------------------------------------------------------

export interface Persona {
  role: PersonaRole;
  name: string;
  title: string;
  personality: string;
  focusAreas: string[];
}

export interface PersonaNote {
  note: string;
  sentiment: Sentiment;
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export interface Penalty {
  kind: string;
  points: number;
  reason: string;
  timestamp: string; // ISO-8601
}

export interface ClarificationRequest {
  question: string;
  confidence: number;
  reason: string;
  timestamp: string;
}

export interface ClarificationRecord {
  message: string;
  confidence: number;
  context: string;
  bonus: number;
  timestamp: string;
}

// ---------------------------------------------------------------------------
// Analyzer verdicts
// ---------------------------------------------------------------------------

export interface DepthVerdict {
  adrScore: number; // 0..1
  feedback: string;
  issues: string[];
  improvementSuggestions: string[];
}

export interface ContextSwitchVerdict {
  isViolation: boolean;
  penaltyScore: number;
  severity: Severity;
  reason: string;
  specificIssue: string;
}

export type ReadabilityViolationType =
  | "line_too_long"
  | "trailing_whitespace"
  | "tabs_used"
  | "multiple_blank_lines"
  | "missing_whitespace_around_operator"
  | "naming_convention"
  | "missing_docstring";

export interface ReadabilityViolation {
  line: number;
  type: ReadabilityViolationType;
  message: string;
  severity: Exclude<Severity, "none">;
}

export interface ReadabilityReport {
  violations: ReadabilityViolation[];
  penaltyScore: number;
  readabilityScore: number; // 0..1
  feedback: string;
  violationsCount: number;
}

export interface ConflictVerdict {
  isViolation: boolean;
  penaltyScore: number;
  severity: ConflictSeverity;
  behaviorType: string;
  reason: string;
  specificQuote: string;
}

export interface LearningAgilityVerdict {
  score: number; // 0..1
  improvedAreas: string[];
  stillNeedsImprovement: string[];
  feedback: string;
}

export interface ClarificationVerdict {
  isClarification: boolean;
  confidence: number; // 0..1 detection certainty
  reason: string;
  suggestedResponse: string;
}

// ---------------------------------------------------------------------------
// Conversation
// ---------------------------------------------------------------------------

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
}

export type ContextType = "intro" | "theory" | "coding";

export interface CurrentContext {
  type: ContextType;
  id: string;
  description: string;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface FeedbackTiming {
  lastFeedbackAt: Date | null;
  lastFeedbackType: FeedbackType | null;
  deadline: Date | null;
  penaltyApplied: boolean;
}

export interface AnticheatViolation {
  type: string;
  reason: string;
  timestamp: string;
}

export interface InterviewSession {
  id: string;
  candidateName: string;
  level: Level;
  currentPersona: PersonaRole;
  phase: Phase;

  codingTasks: CodingTask[];
  theoryQuestions: TheoryQuestion[];
  currentTaskIdx: number;
  currentTheoryIdx: number;
  usedTaskIds: number[];

  codingScores: Record<number, number>;
  theoryScores: Record<number, number>;
  adrScores: Record<number, number>;
  attempts: Record<string, number>;

  penalties: Penalty[];
  personaNotes: Record<PersonaRole, PersonaNote[]>;

  startedAt: Date;
  phaseStartedAt: Date;
  chatHistory: ConversationTurn[];
  feedbackTiming: FeedbackTiming;

  previousAnswers: Record<number, string>;
  feedbackReceived: Record<number, string>;
  learningAgilityScores: Record<number, number>;

  clarificationRequests: Record<string, ClarificationRequest[]>;
  clarificationBonuses: Record<string, number>;
  clarificationHistory: ClarificationRecord[];

  contextSwitchViolations: ContextSwitchVerdict[];
  readabilityReports: Record<number, ReadabilityReport>;
  conflictViolations: ConflictVerdict[];
  anticheatViolations: AnticheatViolation[];

  finishRequested: boolean;
  report: CommitteeReport | null;
}

// ---------------------------------------------------------------------------
// Committee
// ---------------------------------------------------------------------------

export type Opinion = "strong_hire" | "hire" | "maybe" | "no_hire";

export type Verdict = "STRONG_HIRE" | "HIRE" | "MAYBE" | "NO_HIRE";

export interface PersonaOpinion {
  role: PersonaRole;
  name: string;
  title: string;
  text: string;
  opinion: Opinion;
  score: number;
  failed: boolean;
}

export interface ScoreBreakdown {
  codingAverage: number; // 0..1
  theoryAverage: number; // 0..1
  base: number;
  totalPenalties: number;
  learningAgilityAverage: number;
  learningAgilityBonus: number;
  clarificationBonus: number;
  totalBonuses: number;
  bonusDetails: string[];
  penaltyDetails: string[];
  finalScore: number; // clamped 0..100, unrounded
}

export interface CommitteeStatistics {
  codingTasksCompleted: number;
  codingAverage: number; // percent
  theoryAverage: number; // percent
  totalPenalties: number;
  totalBonuses: number;
}

export interface AnalyzerSummary {
  learningAgility: { averageScore: number; questionsAnalyzed: number };
  contextSwitching: { violationsCount: number; totalPenalty: number };
  codeReadability: { averageScore: number; totalViolations: number };
  conflictBehavior: { violationsCount: number; hasCritical: boolean };
  clarificationBonus: number;
}

export interface CommitteeReport {
  finalScore: number;
  verdict: Verdict;
  forced: boolean;
  opinions: PersonaOpinion[];
  penalties: Penalty[];
  statistics: CommitteeStatistics;
  analyzers: AnalyzerSummary;
  bonusDetails: string[];
  penaltyDetails: string[];
}

// ---------------------------------------------------------------------------
// Operation results
// ---------------------------------------------------------------------------

export interface Failure {
  success: false;
  error: string;
}

export interface PersonaSummary {
  name: string;
  title: string;
  role: PersonaRole;
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

export function isPhase(value: string): value is Phase {
  return PHASES.some((phase) => phase === value);
}

export function isPersonaRole(value: string): value is PersonaRole {
  return PERSONA_ROLES.some((role) => role === value);
}
