/**
 * Feedback-response timing.
 *
 * When an interviewer reply reads as critique, a feedback cycle opens with
 * a deadline. If the candidate's next message arrives after the deadline on
 * a theory question, a timeout penalty is charged once for that cycle.
 * Coding cycles are tracked but never penalised.
 */

import {
  DEFAULT_FEEDBACK_KEYWORDS,
  DEFAULT_PENALTY_WEIGHTS,
  feedbackTimeLimitMinutes,
} from "./config";
import { appendPenalty } from "./ledger";
import type { FeedbackType, InterviewSession, Penalty } from "./types";

const MS_PER_MINUTE = 60_000;

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export interface FeedbackClassifier {
  isFeedback(reply: string): boolean;
}

export class KeywordFeedbackClassifier implements FeedbackClassifier {
  constructor(
    private readonly keywords: readonly string[] = DEFAULT_FEEDBACK_KEYWORDS
  ) {}

  isFeedback(reply: string): boolean {
    const text = reply.toLowerCase();
    return this.keywords.some((keyword) => text.includes(keyword));
  }
}

// ---------------------------------------------------------------------------
// Cycle management
// ---------------------------------------------------------------------------

export function openFeedbackCycle(
  session: InterviewSession,
  type: FeedbackType,
  now: Date = new Date()
): void {
  const limit = feedbackTimeLimitMinutes(type, session.level);
  session.feedbackTiming = {
    lastFeedbackAt: now,
    lastFeedbackType: type,
    deadline: new Date(now.getTime() + limit * MS_PER_MINUTE),
    penaltyApplied: false,
  };
}

/** The candidate responded; the deadline and type are kept for reporting. */
export function closeFeedbackCycle(session: InterviewSession): void {
  session.feedbackTiming.lastFeedbackAt = null;
  session.feedbackTiming.penaltyApplied = false;
}

/**
 * Charge the slow-response penalty if the open theory cycle has expired.
 * Returns the penalty appended, or null.
 */
export function checkFeedbackResponseTime(
  session: InterviewSession,
  now: Date = new Date()
): Penalty | null {
  const timing = session.feedbackTiming;
  if (!timing.lastFeedbackAt || timing.penaltyApplied) return null;

  const type = timing.lastFeedbackType ?? "coding";
  const limit = feedbackTimeLimitMinutes(type, session.level);
  const elapsed = (now.getTime() - timing.lastFeedbackAt.getTime()) / MS_PER_MINUTE;

  if (elapsed <= limit || type !== "theory") return null;

  timing.penaltyApplied = true;
  return appendPenalty(
    session,
    "timeout",
    DEFAULT_PENALTY_WEIGHTS[session.level].slow_feedback_response,
    `Slow response to theory feedback (${elapsed.toFixed(1)} min > ${limit} min)`,
    now
  );
}
