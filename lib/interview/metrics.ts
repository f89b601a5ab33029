/**
 * Descriptions of the signals that feed the final score.
 */

export interface MetricInfo {
  key: string;
  name: string;
  description: string;
  effect: string;
}

export const METRIC_DESCRIPTIONS: MetricInfo[] = [
  {
    key: "answer_depth",
    name: "Answer depth (ADR)",
    description: "How substantive a theory answer is relative to the expected topics.",
    effect: "Adjusts the theory score; a very shallow answer adds a poor_communication penalty.",
  },
  {
    key: "learning_agility",
    name: "Learning agility",
    description: "How much a repeated answer improves after interviewer feedback.",
    effect: "An average above 0.7 adds up to 10 bonus points.",
  },
  {
    key: "context_switching",
    name: "Context switching",
    description: "Dodging the current question or changing the subject.",
    effect: "Penalty scaled by severity and level.",
  },
  {
    key: "code_readability",
    name: "Code readability",
    description: "PEP 8 style checks on submitted code.",
    effect: "Penalty per violation, capped at twice the level weight.",
  },
  {
    key: "conflict_behavior",
    name: "Conflict behaviour",
    description: "Rudeness, aggression, manipulation or unethical statements.",
    effect: "Penalty scaled by severity and level; a critical violation forces NO_HIRE.",
  },
  {
    key: "clarification",
    name: "Clarifying questions",
    description: "Questions about requirements, constraints or edge cases.",
    effect: "3 bonus points for the first question on a topic, 1 for each later one.",
  },
  {
    key: "feedback_response_time",
    name: "Feedback response time",
    description: "Time taken to respond after theory feedback.",
    effect: "One timeout penalty per feedback cycle, weighted by level.",
  },
];
