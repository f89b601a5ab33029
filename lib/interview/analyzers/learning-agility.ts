/**
 * Learning-agility analyzer.
 *
 * Compares a repeated theory answer with the first attempt and the
 * feedback given in between.
 */

import { z } from "zod";
import { complete } from "../oracle";
import { errorMessage } from "../errors";
import { parseOracleJson } from "../json-reply";
import { clamp } from "../numbers";
import {
  LEARNING_AGILITY_SYSTEM,
  buildLearningAgilityPrompt,
} from "../prompts";
import type { LearningAgilityVerdict } from "../types";

const LearningAgilityReplySchema = z.object({
  score: z.coerce.number().default(5),
  improved_areas: z.array(z.string()).default([]),
  still_needs_improvement: z.array(z.string()).default([]),
  feedback: z.string().default("Good improvement"),
});

export interface LearningAgilityInput {
  previousAnswer: string;
  feedback: string;
  newAnswer: string;
}

export async function analyzeLearningAgility(
  input: LearningAgilityInput
): Promise<LearningAgilityVerdict> {
  if (
    input.previousAnswer.trim() === "" ||
    input.feedback.trim() === "" ||
    input.newAnswer.trim() === ""
  ) {
    return {
      score: 0,
      improvedAreas: [],
      stillNeedsImprovement: [],
      feedback: "Not enough data",
    };
  }

  let text: string;
  try {
    text = await complete(buildLearningAgilityPrompt(input), {
      system: LEARNING_AGILITY_SYSTEM,
      format: "raw",
    });
  } catch (error) {
    console.error("[learning-agility] Analysis failed:", error);
    return {
      score: 0,
      improvedAreas: [],
      stillNeedsImprovement: ["analysis error"],
      feedback: `Analysis error: ${errorMessage(error)}`,
    };
  }

  const reply = parseOracleJson(text, LearningAgilityReplySchema);
  if (!reply) {
    console.warn("[learning-agility] Could not parse oracle reply");
    return {
      score: 0.5,
      improvedAreas: ["minor improvements"],
      stillNeedsImprovement: ["more practice needed"],
      feedback: "Moderate improvement after feedback",
    };
  }

  return {
    score: clamp(reply.score, 0, 10) / 10,
    improvedAreas: reply.improved_areas,
    stillNeedsImprovement: reply.still_needs_improvement,
    feedback: reply.feedback,
  };
}
