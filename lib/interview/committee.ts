/**
 * Committee decision engine.
 *
 * At finish the three personas each read the same aggregated summary and
 * return an opinion. Opinions are tallied into a verdict, unless a critical
 * conflict violation is on record, which forces NO_HIRE.
 *
 * The numeric score is independent of the opinions:
 *   base  = (coding × 0.5 + theory × 0.3 + 0.2) × 100
 *   final = clamp(base − penalties + bonuses, 0, 100)
 */

import { DEFAULT_COMMITTEE_CONFIG, type CommitteeConfig } from "./config";
import { errorMessage } from "./errors";
import { addPersonaNote, totalClarificationBonus, totalPenalties } from "./ledger";
import { clamp, mean, roundTo } from "./numbers";
import { complete } from "./oracle";
import { PERSONA_REGISTRY } from "./personas";
import {
  buildCommitteeContext,
  buildCommitteePrompt,
  buildCommitteeSystem,
} from "./prompts";
import type {
  AnalyzerSummary,
  CommitteeReport,
  InterviewSession,
  Opinion,
  PersonaOpinion,
  ScoreBreakdown,
  Verdict,
} from "./types";
import { PERSONA_ROLES } from "./types";

// ---------------------------------------------------------------------------
// Score
// ---------------------------------------------------------------------------

export function computeScoreBreakdown(
  session: InterviewSession,
  config: CommitteeConfig = DEFAULT_COMMITTEE_CONFIG
): ScoreBreakdown {
  const codingAverage = mean(Object.values(session.codingScores));
  const theoryAverage = mean(Object.values(session.theoryScores));
  const base =
    (codingAverage * config.codingWeight +
      theoryAverage * config.theoryWeight +
      config.baseline) *
    100;

  const bonusDetails: string[] = [];

  const agilityScores = Object.values(session.learningAgilityScores);
  const learningAgilityAverage = mean(agilityScores);
  let learningAgilityBonus = 0;
  if (learningAgilityAverage > config.learningAgilityThreshold) {
    learningAgilityBonus = Math.min(
      config.learningAgilityBonusCap,
      learningAgilityAverage * 10
    );
    bonusDetails.push(`Learning agility: +${learningAgilityBonus.toFixed(1)}`);
  }

  const clarificationBonus = totalClarificationBonus(session);
  if (Object.keys(session.clarificationBonuses).length > 0) {
    bonusDetails.push(`Clarifying questions: +${clarificationBonus.toFixed(1)}`);
  }

  // Detail lines only; every penalty is already in the ledger.
  const penaltyDetails: string[] = [];
  if (session.contextSwitchViolations.length > 0) {
    penaltyDetails.push(
      `Changing the subject: ${session.contextSwitchViolations.length} violations`
    );
  }
  const readabilityIssues = Object.values(session.readabilityReports).reduce(
    (sum, report) => sum + report.violationsCount,
    0
  );
  if (readabilityIssues > 0) {
    penaltyDetails.push(`Code style (PEP 8): ${readabilityIssues} notes`);
  }
  if (session.conflictViolations.length > 0) {
    penaltyDetails.push(
      `Destructive behaviour: ${session.conflictViolations.length} violations`
    );
  }
  if (session.anticheatViolations.length > 0) {
    penaltyDetails.push(
      `Anti-cheat: ${session.anticheatViolations.length} violations`
    );
  }

  const penalties = totalPenalties(session);
  const totalBonuses = learningAgilityBonus + clarificationBonus;

  return {
    codingAverage,
    theoryAverage,
    base,
    totalPenalties: penalties,
    learningAgilityAverage,
    learningAgilityBonus,
    clarificationBonus,
    totalBonuses,
    bonusDetails,
    penaltyDetails,
    finalScore: clamp(base - penalties + totalBonuses, 0, 100),
  };
}

// ---------------------------------------------------------------------------
// Opinions and verdict
// ---------------------------------------------------------------------------

/** Read a persona's decision from free text. The first match wins. */
export function parseOpinion(text: string): Opinion {
  const upper = text.toUpperCase();
  if (upper.includes("STRONG_HIRE")) return "strong_hire";
  if (upper.includes("NO_HIRE")) return "no_hire";
  if (upper.includes("MAYBE")) return "maybe";
  return "hire";
}

export function hasCriticalConflict(session: InterviewSession): boolean {
  return session.conflictViolations.some((v) => v.severity === "critical");
}

export function decideVerdict(
  opinions: Opinion[],
  criticalConflict: boolean
): { verdict: Verdict; forced: boolean } {
  if (criticalConflict) return { verdict: "NO_HIRE", forced: true };

  const count = (opinion: Opinion) =>
    opinions.filter((o) => o === opinion).length;

  if (count("strong_hire") >= 2) return { verdict: "STRONG_HIRE", forced: false };
  if (count("no_hire") >= 2) return { verdict: "NO_HIRE", forced: false };
  if (count("hire") + count("strong_hire") >= 2) {
    return { verdict: "HIRE", forced: false };
  }
  return { verdict: "MAYBE", forced: false };
}

/** Notes the committee should see that the personas did not write themselves. */
export function addCommitteeNotes(
  session: InterviewSession,
  breakdown: ScoreBreakdown,
  config: CommitteeConfig = DEFAULT_COMMITTEE_CONFIG
): void {
  if (breakdown.learningAgilityBonus > 0) {
    addPersonaNote(
      session,
      `Learns well from feedback (learning agility ${breakdown.learningAgilityAverage.toFixed(2)})`,
      "positive"
    );
  }

  const confidences = session.clarificationHistory.map((c) => c.confidence);
  if (
    confidences.length > 0 &&
    mean(confidences) > config.clarificationNoteThreshold
  ) {
    addPersonaNote(
      session,
      `Asks good clarifying questions (confidence ${mean(confidences).toFixed(2)})`,
      "positive"
    );
  }

  const critical = session.conflictViolations.find(
    (v) => v.severity === "critical"
  );
  if (critical) {
    addPersonaNote(
      session,
      `CRITICAL VIOLATION: ${critical.reason || "destructive behaviour"}`,
      "negative"
    );
  }
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export function summarizeAnalyzers(session: InterviewSession): AnalyzerSummary {
  const agility = Object.values(session.learningAgilityScores);
  const readability = Object.values(session.readabilityReports);

  return {
    learningAgility: {
      averageScore: roundTo(mean(agility), 2),
      questionsAnalyzed: agility.length,
    },
    contextSwitching: {
      violationsCount: session.contextSwitchViolations.length,
      totalPenalty: roundTo(
        session.contextSwitchViolations.reduce((sum, v) => sum + v.penaltyScore, 0),
        2
      ),
    },
    codeReadability: {
      averageScore: roundTo(mean(readability.map((r) => r.readabilityScore)), 2),
      totalViolations: readability.reduce((sum, r) => sum + r.violationsCount, 0),
    },
    conflictBehavior: {
      violationsCount: session.conflictViolations.length,
      hasCritical: hasCriticalConflict(session),
    },
    clarificationBonus: roundTo(totalClarificationBonus(session), 2),
  };
}

// ---------------------------------------------------------------------------
// Meeting
// ---------------------------------------------------------------------------

export async function runCommittee(
  session: InterviewSession,
  config: CommitteeConfig = DEFAULT_COMMITTEE_CONFIG
): Promise<CommitteeReport> {
  const breakdown = computeScoreBreakdown(session, config);
  addCommitteeNotes(session, breakdown, config);

  const readabilityScores = Object.values(session.readabilityReports).map(
    (r) => r.readabilityScore
  );
  const context = buildCommitteeContext({
    level: session.level,
    codingCompleted: Object.keys(session.codingScores).length,
    codingTotal: session.codingTasks.length,
    codingAverage: Math.round(breakdown.codingAverage * 100),
    theoryAverage: Math.round(breakdown.theoryAverage * 100),
    penaltiesCount: session.penalties.length,
    totalPenalties: breakdown.totalPenalties,
    bonusDetails: breakdown.bonusDetails,
    penaltyDetails: breakdown.penaltyDetails,
    learningAgility:
      Object.keys(session.learningAgilityScores).length > 0
        ? breakdown.learningAgilityAverage
        : null,
    readability: readabilityScores.length > 0 ? mean(readabilityScores) : null,
    finalScore: Math.round(breakdown.finalScore),
    personaNotes: JSON.stringify(session.personaNotes, null, 2),
  });

  const personas = PERSONA_ROLES.map((role) => PERSONA_REGISTRY[role]);
  const results = await Promise.allSettled(
    personas.map((persona) =>
      complete(buildCommitteePrompt(context, persona), {
        system: buildCommitteeSystem(persona),
        maxTokens: 400,
        format: "raw",
      })
    )
  );

  const opinions: PersonaOpinion[] = results.map((result, index) => {
    const persona = personas[index];
    if (result.status === "fulfilled") {
      const opinion = parseOpinion(result.value);
      return {
        role: persona.role,
        name: persona.name,
        title: persona.title,
        text: result.value,
        opinion,
        score: config.opinionScores[opinion],
        failed: false,
      };
    }

    console.error(`[committee] ${persona.role} opinion failed:`, result.reason);
    return {
      role: persona.role,
      name: persona.name,
      title: persona.title,
      text: `Assessment unavailable: ${errorMessage(result.reason)}`,
      opinion: "maybe",
      score: config.opinionScores.maybe,
      failed: true,
    };
  });

  const { verdict, forced } = decideVerdict(
    opinions.map((o) => o.opinion),
    hasCriticalConflict(session)
  );

  return {
    finalScore: Math.round(breakdown.finalScore),
    verdict,
    forced,
    opinions,
    penalties: [...session.penalties],
    statistics: {
      codingTasksCompleted: Object.keys(session.codingScores).length,
      codingAverage: Math.round(breakdown.codingAverage * 100),
      theoryAverage: Math.round(breakdown.theoryAverage * 100),
      totalPenalties: roundTo(breakdown.totalPenalties, 1),
      totalBonuses: roundTo(breakdown.totalBonuses, 1),
    },
    analyzers: summarizeAnalyzers(session),
    bonusDetails: breakdown.bonusDetails,
    penaltyDetails: breakdown.penaltyDetails,
  };
}
