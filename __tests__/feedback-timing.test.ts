/**
 * Tests for feedback-response timing and the keyword classifier.
 */

import { describe, it, expect } from "vitest";
import {
  KeywordFeedbackClassifier,
  checkFeedbackResponseTime,
  closeFeedbackCycle,
  openFeedbackCycle,
} from "@/lib/interview/feedback-timing";
import { feedbackTimeLimitMinutes } from "@/lib/interview/config";
import { START, makeSession, minutesAfter } from "./fixtures";

describe("KeywordFeedbackClassifier", () => {
  const classifier = new KeywordFeedbackClassifier();

  it("matches critique keywords case-insensitively", () => {
    expect(classifier.isFeedback("There is a MISTAKE in your loop.")).toBe(true);
    expect(classifier.isFeedback("Consider using a set here.")).toBe(true);
  });

  it("treats suggestions as feedback", () => {
    expect(classifier.isFeedback("I suggest a dictionary for lookups.")).toBe(true);
    expect(classifier.isFeedback("One suggestion: name the loop variable.")).toBe(true);
  });

  it("ignores neutral replies", () => {
    expect(classifier.isFeedback("Great, let's move on to the next question.")).toBe(false);
  });

  it("accepts a custom keyword list", () => {
    const custom = new KeywordFeedbackClassifier(["ошибка"]);
    expect(custom.isFeedback("Здесь ошибка")).toBe(true);
    expect(custom.isFeedback("There is a mistake")).toBe(false);
  });
});

describe("feedbackTimeLimitMinutes", () => {
  it("uses the table for known levels and 5 minutes otherwise", () => {
    expect(feedbackTimeLimitMinutes("theory", "senior")).toBe(1.5);
    expect(feedbackTimeLimitMinutes("coding", "middle")).toBe(10);
    expect(feedbackTimeLimitMinutes("theory", "principal")).toBe(5);
  });
});

describe("checkFeedbackResponseTime", () => {
  it("does nothing without an open cycle", async () => {
    const session = await makeSession();
    expect(checkFeedbackResponseTime(session, minutesAfter(START, 60))).toBeNull();
  });

  it("sets the deadline when a cycle opens", async () => {
    const session = await makeSession("middle");
    openFeedbackCycle(session, "theory", START);

    expect(session.feedbackTiming.deadline?.toISOString()).toBe(
      "2025-01-15T10:02:00.000Z"
    );
  });

  it("charges a late theory response once per cycle", async () => {
    const session = await makeSession("junior");
    openFeedbackCycle(session, "theory", START);

    expect(checkFeedbackResponseTime(session, minutesAfter(START, 2))).toBeNull();

    const penalty = checkFeedbackResponseTime(session, minutesAfter(START, 4));
    expect(penalty).toEqual({
      kind: "timeout",
      points: 2,
      reason: "Slow response to theory feedback (4.0 min > 3 min)",
      timestamp: "2025-01-15T10:04:00.000Z",
    });
    expect(checkFeedbackResponseTime(session, minutesAfter(START, 6))).toBeNull();
    expect(session.penalties).toHaveLength(1);
  });

  it("never charges coding cycles", async () => {
    const session = await makeSession("senior");
    openFeedbackCycle(session, "coding", START);

    expect(checkFeedbackResponseTime(session, minutesAfter(START, 30))).toBeNull();
    expect(session.penalties).toEqual([]);
  });

  it("stops tracking once the candidate responds", async () => {
    const session = await makeSession("junior");
    openFeedbackCycle(session, "theory", START);
    closeFeedbackCycle(session);

    expect(checkFeedbackResponseTime(session, minutesAfter(START, 10))).toBeNull();
    expect(session.feedbackTiming.lastFeedbackType).toBe("theory");
  });
});
