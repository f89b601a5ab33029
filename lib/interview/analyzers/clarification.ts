/**
 * Clarification-question detector.
 *
 * Asking about requirements before answering is rewarded. This only
 * classifies; the bonus is granted by the ledger.
 */

import { z } from "zod";
import { complete } from "../oracle";
import { errorMessage } from "../errors";
import { parseOracleJson } from "../json-reply";
import { clamp } from "../numbers";
import { CLARIFICATION_SYSTEM, buildClarificationPrompt } from "../prompts";
import type { ClarificationVerdict } from "../types";

const ClarificationReplySchema = z.object({
  is_clarification: z.boolean().default(false),
  confidence: z.coerce.number().default(0),
  reason: z.string().default("Analysis complete"),
  suggested_response: z.string().default(""),
});

export async function detectClarification(
  message: string,
  currentContext: string
): Promise<ClarificationVerdict> {
  if (message.trim() === "") {
    return {
      isClarification: false,
      confidence: 0,
      reason: "Empty message",
      suggestedResponse: "",
    };
  }

  let text: string;
  try {
    text = await complete(buildClarificationPrompt(currentContext, message), {
      system: CLARIFICATION_SYSTEM,
      format: "raw",
    });
  } catch (error) {
    console.error("[clarification] Analysis failed:", error);
    return {
      isClarification: false,
      confidence: 0,
      reason: `Analysis error: ${errorMessage(error)}`,
      suggestedResponse: "",
    };
  }

  const reply = parseOracleJson(text, ClarificationReplySchema);
  if (!reply) {
    console.warn("[clarification] Could not parse oracle reply");
    return {
      isClarification: false,
      confidence: 0.5,
      reason: "Could not analyse the message",
      suggestedResponse: "",
    };
  }

  return {
    isClarification: reply.is_clarification,
    confidence: clamp(reply.confidence, 0, 1),
    reason: reply.reason,
    suggestedResponse: reply.is_clarification ? reply.suggested_response : "",
  };
}
