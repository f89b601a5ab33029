/**
 * Tests for the chat turn pipeline. Analyzer calls arrive in a fixed order:
 * conflict, context switching, clarification.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@/lib/interview/oracle", () => ({
  complete: vi.fn(),
  completeWithTools: vi.fn(),
}));

import { complete, completeWithTools } from "@/lib/interview/oracle";
import { OracleError } from "@/lib/interview/errors";
import { openFeedbackCycle } from "@/lib/interview/feedback-timing";
import { runChatTurn } from "@/lib/interview/turn";
import type { InterviewSession } from "@/lib/interview/types";
import { START, makeSession, minutesAfter, seededCatalog } from "./fixtures";

const mockComplete = vi.mocked(complete);
const mockCompleteWithTools = vi.mocked(completeWithTools);

const NO_CONFLICT = '{"is_violation": false, "severity": "none"}';
const NO_SWITCH = '{"is_violation": false, "severity": "none"}';
const NO_CLARIFICATION = '{"is_clarification": false, "confidence": 0.1}';

let session: InterviewSession;
const catalog = seededCatalog();

beforeEach(async () => {
  vi.clearAllMocks();
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  session = await makeSession("junior", catalog);
});

describe("runChatTurn", () => {
  it("rewards a clarifying question and applies tool calls", async () => {
    mockComplete
      .mockResolvedValueOnce(NO_CONFLICT)
      .mockResolvedValueOnce(NO_SWITCH)
      .mockResolvedValueOnce(
        '{"is_clarification": true, "confidence": 0.9, "reason": "Asks about the format", "suggested_response": "Plain text is fine."}'
      );
    mockCompleteWithTools.mockResolvedValue({
      content: "Good question. Plain text is fine.",
      toolCalls: [
        { id: "call-1", name: "add_agent_note", args: { note: "Curious", sentiment: "positive" } },
      ],
    });

    const result = await runChatTurn(session, "Should the answers be in plain text?", {
      catalog,
      clock: () => START,
    });

    expect(result.reply).toBe("Good question. Plain text is fine.");
    expect(result.clarification).toEqual({
      isClarification: true,
      confidence: 0.9,
      reason: "Asks about the format",
      bonusApplied: 3,
      scopeTotal: 3,
    });
    expect(result.toolCalls).toEqual([
      { tool: "add_agent_note", result: { success: true } },
    ]);
    expect(session.clarificationBonuses).toEqual({ "intro:intro": 3 });
    expect(session.personaNotes.hr_manager).toEqual([
      { note: "Asked a clarifying question (confidence 0.90)", sentiment: "positive" },
      { note: "Curious", sentiment: "positive" },
    ]);
    expect(session.chatHistory).toEqual([
      { role: "user", content: "Should the answers be in plain text?" },
      { role: "assistant", content: "Good question. Plain text is fine." },
    ]);
    expect(result.feedbackTracking.isFeedback).toBe(false);
  });

  it("sends the recent history after the context preamble", async () => {
    mockComplete
      .mockResolvedValueOnce(NO_CONFLICT)
      .mockResolvedValueOnce(NO_SWITCH)
      .mockResolvedValueOnce(NO_CLARIFICATION);
    mockCompleteWithTools.mockResolvedValue({ content: "Sure.", toolCalls: [] });

    await runChatTurn(session, "I am ready to start", { catalog });

    const [messages] = mockCompleteWithTools.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages[0].role).toBe("system");
    expect(messages[1]).toEqual({ role: "user", content: "I am ready to start" });
  });

  it("charges a late reply, a critical conflict and survives a failing persona", async () => {
    session.phase = "theory";
    openFeedbackCycle(session, "theory", START);

    mockComplete
      .mockResolvedValueOnce(
        '{"is_violation": true, "severity": "critical", "behavior_type": "aggression", "reason": "Insulted the interviewer", "specific_quote": "..."}'
      )
      .mockRejectedValueOnce(new OracleError("upstream timeout"))
      .mockResolvedValueOnce(NO_CLARIFICATION);
    mockCompleteWithTools.mockRejectedValue(new OracleError("upstream timeout"));

    const result = await runChatTurn(session, "This question is stupid and so are you", {
      catalog,
      clock: () => minutesAfter(START, 4),
    });

    expect(result.reply).toBe("Let's keep going. Could you say that once more?");
    expect(result.timeoutPenalty?.points).toBe(2);
    expect(result.behavior).toEqual({
      conflictDetected: true,
      conflictSeverity: "critical",
      contextSwitchingDetected: false,
      contextSwitchingSeverity: "none",
    });
    expect(session.penalties.map((p) => [p.kind, p.points])).toEqual([
      ["timeout", 2],
      ["conflict_behavior", 20],
    ]);
    expect(session.penalties[1].reason).toBe(
      "Destructive behaviour (aggression): Insulted the interviewer"
    );
    expect(session.conflictViolations).toHaveLength(1);
    expect(session.feedbackTiming.lastFeedbackAt).toBeNull();
  });

  it("answers a clarification with the suggested response", async () => {
    mockComplete
      .mockResolvedValueOnce(NO_CONFLICT)
      .mockResolvedValueOnce(NO_SWITCH)
      .mockResolvedValueOnce(
        '{"is_clarification": true, "confidence": 0.9, "reason": "Asks about input size", "suggested_response": "Assume up to a thousand items."}'
      );
    mockCompleteWithTools.mockResolvedValue({ content: "Up to a thousand.", toolCalls: [] });

    await runChatTurn(session, "How large can the input get?", { catalog });

    const [messages] = mockCompleteWithTools.mock.calls[0];
    expect(messages[0].content).toContain(
      "A suitable answer would be along these lines: Assume up to a thousand items."
    );
  });

  it("lets a moderate conflict override the clarification context", async () => {
    mockComplete
      .mockResolvedValueOnce(
        '{"is_violation": true, "severity": "moderate", "behavior_type": "rudeness", "reason": "Dismissive tone"}'
      )
      .mockResolvedValueOnce(NO_SWITCH)
      .mockResolvedValueOnce(
        '{"is_clarification": true, "confidence": 0.9, "reason": "Asks about input size", "suggested_response": "Assume up to a thousand items."}'
      );
    mockCompleteWithTools.mockResolvedValue({ content: "Let's stay professional.", toolCalls: [] });

    const result = await runChatTurn(session, "Whatever, how large can the input even get?", {
      catalog,
    });

    const [messages] = mockCompleteWithTools.mock.calls[0];
    expect(messages[0].role).toBe("system");
    expect(messages[0].content).toContain("was unprofessional");
    expect(messages[0].content).not.toContain("A suitable answer would be along these lines");
    expect(result.behavior.conflictSeverity).toBe("moderate");
    expect(result.clarification.isClarification).toBe(true);
  });

  it("opens a feedback cycle when the reply reads as critique", async () => {
    session.phase = "theory";
    mockComplete
      .mockResolvedValueOnce(NO_CONFLICT)
      .mockResolvedValueOnce(NO_SWITCH)
      .mockResolvedValueOnce(NO_CLARIFICATION);
    mockCompleteWithTools.mockResolvedValue({
      content: "That is incorrect. Think about mutability.",
      toolCalls: [],
    });

    const result = await runChatTurn(session, "Tuples can be changed in place", {
      catalog,
      clock: () => START,
    });

    expect(result.feedbackTracking).toEqual({
      isFeedback: true,
      lastFeedbackAt: "2025-01-15T10:00:00.000Z",
      feedbackType: "theory",
      deadline: "2025-01-15T10:03:00.000Z",
      penaltyApplied: false,
    });
  });

  it("charges context switching by severity", async () => {
    session.phase = "coding";
    mockComplete
      .mockResolvedValueOnce(NO_CONFLICT)
      .mockResolvedValueOnce(
        '{"is_violation": true, "severity": "severe", "reason": "Asked about salary mid-task"}'
      )
      .mockResolvedValueOnce(NO_CLARIFICATION);
    mockCompleteWithTools.mockResolvedValue({ content: "Let's finish the task first.", toolCalls: [] });

    const result = await runChatTurn(session, "What is the salary for this role?", { catalog });

    expect(result.behavior.contextSwitchingSeverity).toBe("severe");
    expect(session.penalties).toHaveLength(1);
    expect(session.penalties[0]).toMatchObject({
      kind: "context_switching",
      points: 3,
      reason: "Changed the subject: Asked about salary mid-task",
    });
    expect(session.personaNotes.hr_manager[0]).toEqual({
      note: "Tried to change the subject: Asked about salary mid-task",
      sentiment: "negative",
    });
  });

  it("passes a finish request through", async () => {
    mockComplete
      .mockResolvedValueOnce(NO_CONFLICT)
      .mockResolvedValueOnce(NO_SWITCH)
      .mockResolvedValueOnce(NO_CLARIFICATION);
    mockCompleteWithTools.mockResolvedValue({
      content: "Thank you for your time.",
      toolCalls: [{ id: "call-1", name: "finish_interview", args: {} }],
    });

    const result = await runChatTurn(session, "I think I am done now", { catalog });

    expect(result.finishRequested).toBe(true);
    expect(result.toolCalls).toEqual([
      { tool: "finish_interview", result: { success: true, action: "finish" } },
    ]);
  });
});
