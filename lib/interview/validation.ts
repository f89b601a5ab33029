/**
 * Request body schemas for the interview API.
 */

import { z } from "zod";
import { LEVELS, PERSONA_ROLES } from "./types";

export const StartInterviewSchema = z.object({
  level: z.enum(LEVELS),
  candidateName: z
    .string()
    .trim()
    .min(1)
    .max(100, "Name must be at most 100 characters")
    .default("Candidate"),
});

export const SubmitCodeSchema = z.object({
  taskId: z.number().int().positive(),
  code: z.string().max(20000, "Code must be at most 20,000 characters"),
});

export const TheoryAnswerSchema = z.object({
  questionId: z.number().int().positive(),
  answer: z.string().max(10000, "Answer must be at most 10,000 characters"),
});

export const ChatSchema = z.object({
  message: z
    .string()
    .min(1, "Message is required")
    .max(4000, "Message must be at most 4,000 characters"),
});

export const SwitchPersonaSchema = z.object({
  persona: z.enum(PERSONA_ROLES),
});

export const AnticheatSchema = z.object({
  type: z.string().min(1).max(50),
  reason: z.string().max(500).default(""),
});

export type StartInterviewInput = z.infer<typeof StartInterviewSchema>;
export type SubmitCodeInput = z.infer<typeof SubmitCodeSchema>;
export type TheoryAnswerInput = z.infer<typeof TheoryAnswerSchema>;
export type AnticheatInput = z.infer<typeof AnticheatSchema>;
