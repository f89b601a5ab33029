/**
 * Depth-of-answer analyzer (ADR, Answer Depth Rating).
 *
 * Scores how substantive a theory answer is, 0..1. Very short answers are
 * rated 0 without asking the oracle.
 */

import { z } from "zod";
import { complete } from "../oracle";
import { errorMessage } from "../errors";
import { parseOracleJson } from "../json-reply";
import { clamp } from "../numbers";
import { DEPTH_SYSTEM, buildDepthPrompt } from "../prompts";
import type { DepthVerdict } from "../types";

export const MIN_ANSWER_LENGTH = 10;

const DepthReplySchema = z.object({
  score: z.coerce.number().default(5),
  feedback: z.string().default("Good answer"),
  issues: z.array(z.string()).default([]),
  improvement_suggestions: z.array(z.string()).default([]),
});

export interface DepthInput {
  answer: string;
  question: string;
  expectedTopics: string[];
}

export async function analyzeAnswerDepth(input: DepthInput): Promise<DepthVerdict> {
  if (input.answer.trim().length < MIN_ANSWER_LENGTH) {
    return {
      adrScore: 0,
      feedback: "Answer is too short or missing",
      issues: ["answer too short"],
      improvementSuggestions: [],
    };
  }

  let text: string;
  try {
    text = await complete(
      buildDepthPrompt(input.question, input.expectedTopics, input.answer),
      { system: DEPTH_SYSTEM, format: "raw" }
    );
  } catch (error) {
    console.error("[depth] Analysis failed:", error);
    return {
      adrScore: 0.5,
      feedback: `Analysis error: ${errorMessage(error)}`,
      issues: ["analysis error"],
      improvementSuggestions: ["Try again later"],
    };
  }

  const reply = parseOracleJson(text, DepthReplySchema);
  if (!reply) {
    console.warn("[depth] Could not parse oracle reply");
    return {
      adrScore: 0.5,
      feedback: "Could not analyse answer depth",
      issues: ["analysis error"],
      improvementSuggestions: ["Try giving a more detailed answer"],
    };
  }

  return {
    adrScore: clamp(reply.score, 0, 10) / 10,
    feedback: reply.feedback,
    issues: reply.issues,
    improvementSuggestions: reply.improvement_suggestions,
  };
}
