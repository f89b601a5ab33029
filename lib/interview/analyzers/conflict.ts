/**
 * Conflict-behaviour analyzer.
 *
 * Detects rudeness, aggression, disrespect and manipulation. Seniors are
 * held to a stricter standard through the level multiplier. A critical
 * finding anywhere in the session forces the committee to reject.
 */

import { z } from "zod";
import { complete } from "../oracle";
import { errorMessage } from "../errors";
import { parseOracleJson } from "../json-reply";
import { roundTo } from "../numbers";
import {
  CONFLICT_BASE_PENALTIES,
  CONFLICT_LEVEL_MULTIPLIERS,
} from "../config";
import { CONFLICT_SYSTEM, buildConflictPrompt, formatHistory } from "../prompts";
import type {
  ConflictSeverity,
  ConflictVerdict,
  ConversationTurn,
  Level,
} from "../types";

export const MIN_MESSAGE_LENGTH = 5;
const HISTORY_TURNS = 5;
const HISTORY_CHARS = 150;

const ConflictReplySchema = z.object({
  is_violation: z.boolean().default(false),
  severity: z
    .enum(["none", "minor", "moderate", "severe", "critical"])
    .default("none"),
  behavior_type: z.string().default("none"),
  reason: z.string().default("Analysis complete"),
  specific_quote: z.string().default(""),
});

export interface ConflictInput {
  message: string;
  history: ConversationTurn[];
  level: Level;
}

function noViolation(reason: string): ConflictVerdict {
  return {
    isViolation: false,
    penaltyScore: 0,
    severity: "none",
    behaviorType: "none",
    reason,
    specificQuote: "",
  };
}

export function conflictPenalty(level: Level, severity: ConflictSeverity): number {
  return roundTo(
    CONFLICT_BASE_PENALTIES[severity] * CONFLICT_LEVEL_MULTIPLIERS[level],
    2
  );
}

export async function analyzeConflictBehavior(
  input: ConflictInput
): Promise<ConflictVerdict> {
  if (input.message.trim().length < MIN_MESSAGE_LENGTH) {
    return noViolation("Message too short to analyse");
  }

  const historyText = formatHistory(
    input.history.slice(-HISTORY_TURNS),
    HISTORY_CHARS
  );

  let text: string;
  try {
    text = await complete(buildConflictPrompt(historyText, input.message), {
      system: CONFLICT_SYSTEM,
      format: "raw",
    });
  } catch (error) {
    console.error("[conflict] Analysis failed:", error);
    return noViolation(`Analysis error: ${errorMessage(error)}`);
  }

  const reply = parseOracleJson(text, ConflictReplySchema);
  if (!reply) {
    console.warn("[conflict] Could not parse oracle reply");
    return noViolation("Could not analyse the message");
  }

  return {
    isViolation: reply.is_violation,
    penaltyScore: conflictPenalty(input.level, reply.severity),
    severity: reply.severity,
    behaviorType: reply.behavior_type,
    reason: reply.reason,
    specificQuote: reply.specific_quote,
  };
}
