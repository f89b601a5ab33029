/**
 * Context-switching analyzer.
 *
 * Flags messages that dodge the current topic. The penalty scales the
 * level's context_switching weight by severity.
 */

import { z } from "zod";
import { complete } from "../oracle";
import { errorMessage } from "../errors";
import { parseOracleJson } from "../json-reply";
import {
  CONTEXT_SWITCH_MULTIPLIERS,
  DEFAULT_PENALTY_WEIGHTS,
} from "../config";
import { CONTEXT_SWITCH_SYSTEM, buildContextSwitchPrompt, formatHistory } from "../prompts";
import type {
  ContextSwitchVerdict,
  ConversationTurn,
  Level,
  Severity,
} from "../types";

export const MIN_MESSAGE_LENGTH = 5;
const HISTORY_TURNS = 5;
const HISTORY_CHARS = 200;

const ContextSwitchReplySchema = z.object({
  is_violation: z.boolean().default(false),
  severity: z.enum(["none", "minor", "moderate", "severe"]).default("none"),
  reason: z.string().default("Analysis complete"),
  specific_issue: z.string().default(""),
});

export interface ContextSwitchInput {
  message: string;
  history: ConversationTurn[];
  currentContext: string;
  level: Level;
}

function noViolation(reason: string): ContextSwitchVerdict {
  return {
    isViolation: false,
    penaltyScore: 0,
    severity: "none",
    reason,
    specificIssue: "",
  };
}

export function contextSwitchPenalty(level: Level, severity: Severity): number {
  return (
    DEFAULT_PENALTY_WEIGHTS[level].context_switching *
    CONTEXT_SWITCH_MULTIPLIERS[severity]
  );
}

export async function analyzeContextSwitching(
  input: ContextSwitchInput
): Promise<ContextSwitchVerdict> {
  if (input.message.trim().length < MIN_MESSAGE_LENGTH) {
    return noViolation("Message too short to analyse");
  }

  const prompt = buildContextSwitchPrompt({
    currentContext: input.currentContext,
    level: input.level,
    historyText: formatHistory(input.history.slice(-HISTORY_TURNS), HISTORY_CHARS),
    message: input.message,
  });

  let text: string;
  try {
    text = await complete(prompt, {
      system: CONTEXT_SWITCH_SYSTEM,
      format: "raw",
    });
  } catch (error) {
    console.error("[context-switching] Analysis failed:", error);
    return noViolation(`Analysis error: ${errorMessage(error)}`);
  }

  const reply = parseOracleJson(text, ContextSwitchReplySchema);
  if (!reply) {
    console.warn("[context-switching] Could not parse oracle reply");
    return noViolation("Could not analyse the message");
  }

  return {
    isViolation: reply.is_violation,
    penaltyScore: contextSwitchPenalty(input.level, reply.severity),
    severity: reply.severity,
    reason: reply.reason,
    specificIssue: reply.specific_issue,
  };
}
