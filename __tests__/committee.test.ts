/**
 * Tests for scoring and the committee verdict.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@/lib/interview/oracle", () => ({
  complete: vi.fn(),
  completeWithTools: vi.fn(),
}));

import { complete } from "@/lib/interview/oracle";
import { OracleError } from "@/lib/interview/errors";
import {
  computeScoreBreakdown,
  decideVerdict,
  parseOpinion,
  runCommittee,
} from "@/lib/interview/committee";
import { appendPenalty } from "@/lib/interview/ledger";
import type { ConflictVerdict, InterviewSession } from "@/lib/interview/types";
import { makeSession } from "./fixtures";

const mockComplete = vi.mocked(complete);

const CRITICAL: ConflictVerdict = {
  isViolation: true,
  penaltyScore: 20,
  severity: "critical",
  behaviorType: "aggression",
  reason: "Insulted the interviewer",
  specificQuote: "",
};

let session: InterviewSession;

beforeEach(async () => {
  vi.clearAllMocks();
  vi.spyOn(console, "error").mockImplementation(() => {});
  session = await makeSession("junior");
});

// ---------------------------------------------------------------------------
// Score
// ---------------------------------------------------------------------------

describe("computeScoreBreakdown", () => {
  it("starts from the baseline for an empty session", () => {
    const breakdown = computeScoreBreakdown(session);
    expect(breakdown.base).toBeCloseTo(20);
    expect(breakdown.finalScore).toBeCloseTo(20);
    expect(breakdown.bonusDetails).toEqual([]);
  });

  it("weighs results, subtracts penalties and adds bonuses", () => {
    session.codingScores = { 1: 1, 2: 0.5 };
    session.theoryScores = { 1: 0.8 };
    session.learningAgilityScores = { 1: 0.9 };
    session.clarificationBonuses = { "theory:1": 3 };
    appendPenalty(session, "hint_used", 3, "Hint #1");

    const breakdown = computeScoreBreakdown(session);

    expect(breakdown.codingAverage).toBeCloseTo(0.75);
    expect(breakdown.base).toBeCloseTo(81.5);
    expect(breakdown.totalPenalties).toBe(3);
    expect(breakdown.learningAgilityBonus).toBeCloseTo(9);
    expect(breakdown.totalBonuses).toBeCloseTo(12);
    expect(breakdown.finalScore).toBeCloseTo(90.5);
    expect(breakdown.bonusDetails).toEqual([
      "Learning agility: +9.0",
      "Clarifying questions: +3.0",
    ]);
  });

  it("gives no agility bonus at or below the threshold", () => {
    session.learningAgilityScores = { 1: 0.7 };
    expect(computeScoreBreakdown(session).learningAgilityBonus).toBe(0);
  });

  it("clamps the final score to 0..100", () => {
    appendPenalty(session, "devtools_open", 150, "Anti-cheat");
    expect(computeScoreBreakdown(session).finalScore).toBe(0);

    session.penalties = [];
    session.codingScores = { 1: 1 };
    session.theoryScores = { 1: 1 };
    session.clarificationBonuses = { "coding:1": 30 };
    expect(computeScoreBreakdown(session).finalScore).toBe(100);
  });
});

// ---------------------------------------------------------------------------
// Opinions
// ---------------------------------------------------------------------------

describe("parseOpinion", () => {
  it("reads the decision keyword", () => {
    expect(parseOpinion("Excellent work. Decision: STRONG_HIRE")).toBe("strong_hire");
    expect(parseOpinion("Weak fundamentals. NO_HIRE")).toBe("no_hire");
    expect(parseOpinion("Hard to say, maybe")).toBe("maybe");
    expect(parseOpinion("Solid. HIRE")).toBe("hire");
  });

  it("defaults to hire", () => {
    expect(parseOpinion("")).toBe("hire");
  });
});

describe("decideVerdict", () => {
  it("needs two votes for a strong decision", () => {
    expect(decideVerdict(["strong_hire", "strong_hire", "no_hire"], false)).toEqual({
      verdict: "STRONG_HIRE",
      forced: false,
    });
    expect(decideVerdict(["no_hire", "no_hire", "strong_hire"], false).verdict).toBe(
      "NO_HIRE"
    );
  });

  it("counts strong hire towards hire", () => {
    expect(decideVerdict(["hire", "strong_hire", "maybe"], false).verdict).toBe("HIRE");
  });

  it("falls back to maybe on a split panel", () => {
    expect(decideVerdict(["hire", "maybe", "no_hire"], false).verdict).toBe("MAYBE");
  });

  it("forces no hire on a critical conflict", () => {
    expect(decideVerdict(["strong_hire", "strong_hire", "strong_hire"], true)).toEqual({
      verdict: "NO_HIRE",
      forced: true,
    });
  });
});

// ---------------------------------------------------------------------------
// Meeting
// ---------------------------------------------------------------------------

describe("runCommittee", () => {
  it("treats a failed persona as undecided", async () => {
    mockComplete
      .mockResolvedValueOnce("Great communicator. STRONG_HIRE")
      .mockRejectedValueOnce(new OracleError("upstream timeout"))
      .mockResolvedValueOnce("Clean code. HIRE");

    const report = await runCommittee(session);

    expect(report.opinions.map((o) => [o.role, o.opinion, o.score, o.failed])).toEqual([
      ["hr_manager", "strong_hire", 95, false],
      ["tech_lead", "maybe", 60, true],
      ["senior_dev", "hire", 80, false],
    ]);
    expect(report.opinions[1].text).toBe("Assessment unavailable: upstream timeout");
    expect(report.verdict).toBe("HIRE");
    expect(report.forced).toBe(false);
    expect(report.finalScore).toBe(20);
  });

  it("overrides the panel after a critical conflict", async () => {
    session.conflictViolations.push(CRITICAL);
    appendPenalty(session, "conflict_behavior", 20, "Destructive behaviour");
    mockComplete.mockResolvedValue("STRONG_HIRE");

    const report = await runCommittee(session);

    expect(report.verdict).toBe("NO_HIRE");
    expect(report.forced).toBe(true);
    expect(report.finalScore).toBe(0);
    expect(report.analyzers.conflictBehavior).toEqual({
      violationsCount: 1,
      hasCritical: true,
    });
    expect(report.penaltyDetails).toEqual(["Destructive behaviour: 1 violations"]);
    expect(session.personaNotes.hr_manager).toContainEqual({
      note: "CRITICAL VIOLATION: Insulted the interviewer",
      sentiment: "negative",
    });
  });

  it("notes good clarifying questions for the panel", async () => {
    session.clarificationHistory.push({
      message: "Can the list be empty?",
      confidence: 0.9,
      context: "Coding task",
      bonus: 3,
      timestamp: "2025-01-15T10:05:00.000Z",
    });
    mockComplete.mockResolvedValue("HIRE");

    await runCommittee(session);

    expect(session.personaNotes.hr_manager).toEqual([
      {
        note: "Asks good clarifying questions (confidence 0.90)",
        sentiment: "positive",
      },
    ]);
  });
});
