/**
 * Persona tool protocol.
 *
 * The oracle may answer a chat turn with tool calls. Each call is validated
 * against its parameter schema and applied to the session exactly once.
 * Unknown tools and bad arguments come back as failures, never throws.
 */

import { tool } from "ai";
import { z } from "zod";
import type { CodingTask, TaskCatalog, TheoryQuestion } from "@/lib/catalog/types";
import { addPersonaNote, appendPenalty, penaltyPointsFor } from "./ledger";
import { clamp, mean } from "./numbers";
import { PERSONA_REGISTRY } from "./personas";
import type { Failure, InterviewSession, Penalty, Phase } from "./types";
import { PERSONA_ROLES, PHASES } from "./types";

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const TOOL_PARAMETERS = {
  get_next_task: z.object({
    difficulty_adjustment: z.enum(["easier", "same", "harder"]).default("same"),
  }),
  get_theory_question: z.object({}),
  evaluate_theory_answer: z.object({
    score: z.number().min(0).max(10),
  }),
  add_penalty: z.object({
    type: z.string().min(1),
    reason: z.string().default(""),
  }),
  add_agent_note: z.object({
    note: z.string().min(1),
    sentiment: z.enum(["positive", "neutral", "negative"]).default("neutral"),
  }),
  switch_agent: z.object({
    agent: z.enum(PERSONA_ROLES),
  }),
  change_phase: z.object({
    phase: z.enum(PHASES),
  }),
  finish_interview: z.object({}),
};

export type ToolName = keyof typeof TOOL_PARAMETERS;

export const INTERVIEW_TOOLS = {
  get_next_task: tool({
    description:
      "Fetch the next coding task, adapting difficulty to the candidate's results so far.",
    parameters: TOOL_PARAMETERS.get_next_task,
  }),
  get_theory_question: tool({
    description: "Fetch the next theory question for the candidate's level.",
    parameters: TOOL_PARAMETERS.get_theory_question,
  }),
  evaluate_theory_answer: tool({
    description: "Record a 0-10 score for the candidate's answer to the latest theory question.",
    parameters: TOOL_PARAMETERS.evaluate_theory_answer,
  }),
  add_penalty: tool({
    description:
      "Record a penalty, e.g. incorrect_answer, poor_communication, off_topic.",
    parameters: TOOL_PARAMETERS.add_penalty,
  }),
  add_agent_note: tool({
    description: "Write a private note about the candidate for the final committee.",
    parameters: TOOL_PARAMETERS.add_agent_note,
  }),
  switch_agent: tool({
    description: "Hand the conversation to another interviewer.",
    parameters: TOOL_PARAMETERS.switch_agent,
  }),
  change_phase: tool({
    description: "Move the interview to another phase.",
    parameters: TOOL_PARAMETERS.change_phase,
  }),
  finish_interview: tool({
    description: "End the interview and convene the hiring committee.",
    parameters: TOOL_PARAMETERS.finish_interview,
  }),
};

export function isToolName(name: string): name is ToolName {
  return Object.hasOwn(TOOL_PARAMETERS, name);
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface ToolSuccess {
  success: true;
  task?: CodingTask;
  question?: TheoryQuestion;
  score?: number;
  penalty?: Penalty;
  persona?: string;
  phase?: Phase;
  action?: "finish";
}

export type ToolResult = ToolSuccess | Failure;

export interface ToolOutcome {
  tool: string;
  result: ToolResult;
}

export interface ToolContext {
  catalog: TaskCatalog;
  now?: Date;
}

const DIFFICULTY_SHIFT = 0.3;

function invalidArguments(name: string, error: z.ZodError): Failure {
  const fields = Object.keys(error.flatten().fieldErrors).join(", ");
  return {
    success: false,
    error: `Invalid arguments for ${name}${fields ? `: ${fields}` : ""}`,
  };
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export async function handleToolCall(
  session: InterviewSession,
  name: string,
  rawArgs: unknown,
  context: ToolContext
): Promise<ToolResult> {
  if (!isToolName(name)) {
    return { success: false, error: `Unknown tool: ${name}` };
  }

  const args = rawArgs ?? {};
  const now = context.now ?? new Date();

  switch (name) {
    case "get_next_task": {
      const parsed = TOOL_PARAMETERS.get_next_task.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);

      const scores = Object.values(session.codingScores);
      let score = scores.length > 0 ? mean(scores) : 0.5;
      if (parsed.data.difficulty_adjustment === "easier") {
        score = clamp(score - DIFFICULTY_SHIFT, 0, 1);
      } else if (parsed.data.difficulty_adjustment === "harder") {
        score = clamp(score + DIFFICULTY_SHIFT, 0, 1);
      }

      const task = await context.catalog.pickAdaptiveTask(
        session.level,
        score,
        session.usedTaskIds
      );
      if (!task) return { success: false, error: "No tasks available" };

      session.usedTaskIds.push(task.id);
      session.codingTasks.push(task);
      return { success: true, task };
    }

    case "get_theory_question": {
      const asked = new Set(session.theoryQuestions.map((q) => q.id));
      const questions = await context.catalog.listQuestions(
        session.level,
        Number.MAX_SAFE_INTEGER
      );
      const question = questions.find((q) => !asked.has(q.id));
      if (!question) return { success: false, error: "No questions available" };

      session.theoryQuestions.push(question);
      return { success: true, question };
    }

    case "evaluate_theory_answer": {
      const parsed = TOOL_PARAMETERS.evaluate_theory_answer.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);

      const score = parsed.data.score / 10;
      const last = session.theoryQuestions.at(-1);
      if (last) {
        session.theoryScores[last.id] = score;
        session.currentTheoryIdx += 1;
      }
      return { success: true, score };
    }

    case "add_penalty": {
      const parsed = TOOL_PARAMETERS.add_penalty.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);

      const penalty = appendPenalty(
        session,
        parsed.data.type,
        penaltyPointsFor(session.level, parsed.data.type),
        parsed.data.reason,
        now
      );
      return { success: true, penalty };
    }

    case "add_agent_note": {
      const parsed = TOOL_PARAMETERS.add_agent_note.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);

      addPersonaNote(session, parsed.data.note, parsed.data.sentiment);
      return { success: true };
    }

    case "switch_agent": {
      const parsed = TOOL_PARAMETERS.switch_agent.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);

      session.currentPersona = parsed.data.agent;
      return { success: true, persona: PERSONA_REGISTRY[parsed.data.agent].name };
    }

    case "change_phase": {
      const parsed = TOOL_PARAMETERS.change_phase.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);

      session.phase = parsed.data.phase;
      session.phaseStartedAt = now;
      return { success: true, phase: parsed.data.phase };
    }

    case "finish_interview":
      session.finishRequested = true;
      return { success: true, action: "finish" };
  }
}
