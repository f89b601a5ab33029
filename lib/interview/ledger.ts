/**
 * Penalty/bonus ledger.
 *
 * Penalties are append-only and frozen once recorded; their sum is the
 * only source of the total deduction. Clarification bonuses accumulate per
 * scope, a scope being one (context type, context id) pair.
 */

import {
  CLARIFICATION_FIRST_BONUS,
  CLARIFICATION_REPEAT_BONUS,
  DEFAULT_PENALTY_TYPES,
  DEFAULT_PENALTY_WEIGHTS,
  FALLBACK_PENALTY_POINTS,
} from "./config";
import type {
  ClarificationVerdict,
  CurrentContext,
  InterviewSession,
  Level,
  Penalty,
  PersonaRole,
  Sentiment,
} from "./types";

// ---------------------------------------------------------------------------
// Penalties
// ---------------------------------------------------------------------------

function lookup(table: Readonly<Record<string, number>>, key: string): number | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function levelWeight(level: Level, kind: string): number | undefined {
  return lookup(DEFAULT_PENALTY_WEIGHTS[level], kind);
}

/** Level weight if the kind has one, else the flat default for the kind. */
export function penaltyPointsFor(
  level: Level,
  kind: string,
  fallback: number = FALLBACK_PENALTY_POINTS
): number {
  return (
    levelWeight(level, kind) ??
    lookup(DEFAULT_PENALTY_TYPES, kind) ??
    fallback
  );
}

export function appendPenalty(
  session: InterviewSession,
  kind: string,
  points: number,
  reason: string,
  now: Date = new Date()
): Penalty {
  const penalty: Penalty = Object.freeze({
    kind,
    points: Math.max(0, points),
    reason,
    timestamp: now.toISOString(),
  });
  session.penalties.push(penalty);
  return penalty;
}

export function totalPenalties(session: InterviewSession): number {
  return session.penalties.reduce((sum, penalty) => sum + penalty.points, 0);
}

// ---------------------------------------------------------------------------
// Persona notes
// ---------------------------------------------------------------------------

export function addPersonaNote(
  session: InterviewSession,
  note: string,
  sentiment: Sentiment,
  role: PersonaRole = session.currentPersona
): void {
  session.personaNotes[role].push({ note, sentiment });
}

// ---------------------------------------------------------------------------
// Clarification bonuses
// ---------------------------------------------------------------------------

export function scopeKey(context: CurrentContext): string {
  return `${context.type}:${context.id}`;
}

export interface ClarificationAward {
  bonus: number;
  scopeTotal: number;
  scope: string;
}

/**
 * Record a detected clarification question. The first one in a scope earns
 * the full bonus, later ones the smaller repeat bonus.
 */
export function recordClarification(
  session: InterviewSession,
  context: CurrentContext,
  message: string,
  verdict: ClarificationVerdict,
  now: Date = new Date()
): ClarificationAward {
  const scope = scopeKey(context);
  const timestamp = now.toISOString();
  const requests = session.clarificationRequests[scope] ?? [];
  requests.push({
    question: message,
    confidence: verdict.confidence,
    reason: verdict.reason,
    timestamp,
  });
  session.clarificationRequests[scope] = requests;

  const bonus =
    requests.length === 1 ? CLARIFICATION_FIRST_BONUS : CLARIFICATION_REPEAT_BONUS;
  const scopeTotal = (session.clarificationBonuses[scope] ?? 0) + bonus;
  session.clarificationBonuses[scope] = scopeTotal;

  session.clarificationHistory.push({
    message,
    confidence: verdict.confidence,
    context: context.description,
    bonus,
    timestamp,
  });

  return { bonus, scopeTotal, scope };
}

export function totalClarificationBonus(session: InterviewSession): number {
  return Object.values(session.clarificationBonuses).reduce(
    (sum, bonus) => sum + bonus,
    0
  );
}
