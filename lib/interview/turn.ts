/**
 * Chat turn orchestrator.
 *
 * One candidate message runs through a fixed pipeline:
 *   1. feedback-response timeout check
 *   2. current context resolution
 *   3. conflict analysis          (penalty + negative note)
 *   4. context-switch analysis    (penalty + negative note)
 *   5. clarification detection    (bonus + positive note)
 *   6-7. history append, feedback cycle closed
 *   8-10. persona reply with tool calls, applied in order
 *   11. feedback classification of the reply
 *   12. history append and turn summary
 *
 * Analyzer calls are sequential. A failing analyzer degrades to its neutral
 * verdict; a failing persona call degrades to a holding reply.
 */

import type { CoreMessage } from "ai";
import type { TaskCatalog } from "@/lib/catalog/types";
import { analyzeConflictBehavior } from "./analyzers/conflict";
import { analyzeContextSwitching } from "./analyzers/context-switching";
import { detectClarification } from "./analyzers/clarification";
import { CLARIFICATION_CONFIDENCE_THRESHOLD } from "./config";
import {
  KeywordFeedbackClassifier,
  checkFeedbackResponseTime,
  closeFeedbackCycle,
  openFeedbackCycle,
  type FeedbackClassifier,
} from "./feedback-timing";
import {
  addPersonaNote,
  appendPenalty,
  recordClarification,
  scopeKey,
  type ClarificationAward,
} from "./ledger";
import { roundTo } from "./numbers";
import { completeWithTools, type RawToolCall } from "./oracle";
import { getPersona, summarizePersona } from "./personas";
import {
  buildChatContext,
  buildClarificationChatContext,
  buildConflictChatContext,
  buildPersonaSystemPrompt,
  type ChatContextInput,
} from "./prompts";
import { resolveCurrentContext } from "./session";
import { handleToolCall, type ToolOutcome } from "./tools";
import type {
  ConflictSeverity,
  ConversationTurn,
  FeedbackType,
  InterviewSession,
  Penalty,
  PersonaSummary,
  Phase,
  Severity,
} from "./types";

const HISTORY_WINDOW = 10;
const FALLBACK_REPLY = "Let's keep going. Could you say that once more?";

const CONFLICT_RESPONSE_SEVERITIES: readonly ConflictSeverity[] = [
  "moderate",
  "severe",
  "critical",
];

export interface TurnDependencies {
  catalog: TaskCatalog;
  classifier?: FeedbackClassifier;
  clock?: () => Date;
}

export interface ChatTurnResult {
  success: true;
  reply: string;
  persona: PersonaSummary;
  toolCalls: ToolOutcome[];
  phase: Phase;
  finishRequested: boolean;
  timeoutPenalty: Penalty | null;
  clarification: {
    isClarification: boolean;
    confidence: number;
    reason: string;
    bonusApplied: number;
    scopeTotal: number | null;
  };
  feedbackTracking: {
    isFeedback: boolean;
    lastFeedbackAt: string | null;
    feedbackType: FeedbackType | null;
    deadline: string | null;
    penaltyApplied: boolean;
  };
  behavior: {
    conflictDetected: boolean;
    conflictSeverity: ConflictSeverity;
    contextSwitchingDetected: boolean;
    contextSwitchingSeverity: Severity;
  };
}

function toCoreMessage(turn: ConversationTurn): CoreMessage {
  return turn.role === "user"
    ? { role: "user", content: turn.content }
    : { role: "assistant", content: turn.content };
}

export async function runChatTurn(
  session: InterviewSession,
  message: string,
  deps: TurnDependencies
): Promise<ChatTurnResult> {
  const clock = deps.clock ?? (() => new Date());
  const classifier = deps.classifier ?? new KeywordFeedbackClassifier();
  const persona = getPersona(session.currentPersona);

  // 1. Slow response to earlier feedback
  const timeoutPenalty = checkFeedbackResponseTime(session, clock());

  // 2. What the candidate is working on
  const context = resolveCurrentContext(session);

  // 3. Conflict behaviour
  const conflict = await analyzeConflictBehavior({
    message,
    history: session.chatHistory,
    level: session.level,
  });
  if (conflict.isViolation) {
    session.conflictViolations.push(conflict);
    appendPenalty(
      session,
      "conflict_behavior",
      conflict.penaltyScore,
      `Destructive behaviour (${conflict.behaviorType}): ${conflict.reason}`,
      clock()
    );
    addPersonaNote(
      session,
      `Destructive behaviour: ${conflict.reason.slice(0, 100)}`,
      "negative"
    );
  }

  // 4. Context switching
  const contextSwitch = await analyzeContextSwitching({
    message,
    history: session.chatHistory,
    currentContext: context.description,
    level: session.level,
  });
  if (contextSwitch.isViolation) {
    session.contextSwitchViolations.push(contextSwitch);
    appendPenalty(
      session,
      "context_switching",
      contextSwitch.penaltyScore,
      `Changed the subject: ${contextSwitch.reason}`,
      clock()
    );
    addPersonaNote(
      session,
      `Tried to change the subject: ${contextSwitch.reason.slice(0, 80)}`,
      "negative"
    );
  }

  // 5. Clarification questions
  const clarification = await detectClarification(message, context.description);
  const clarified =
    clarification.isClarification &&
    clarification.confidence > CLARIFICATION_CONFIDENCE_THRESHOLD;
  let award: ClarificationAward | null = null;
  if (clarified) {
    award = recordClarification(session, context, message, clarification, clock());
    addPersonaNote(
      session,
      `Asked a clarifying question (confidence ${clarification.confidence.toFixed(2)})`,
      "positive"
    );
  }

  // 6-7. The candidate has responded
  session.chatHistory.push({ role: "user", content: message });
  closeFeedbackCycle(session);

  // 8. Persona context
  const contextInput: ChatContextInput = {
    phase: session.phase,
    level: session.level,
    codingCompleted: Object.keys(session.codingScores).length,
    codingTotal: session.codingTasks.length,
    theoryCompleted: Object.keys(session.theoryScores).length,
    theoryTotal: session.theoryQuestions.length,
    currentContext: context.description,
  };
  let preamble = buildChatContext(contextInput);
  if (clarified && clarification.suggestedResponse) {
    preamble = buildClarificationChatContext(
      contextInput,
      clarification.suggestedResponse
    );
  }
  if (
    conflict.isViolation &&
    CONFLICT_RESPONSE_SEVERITIES.includes(conflict.severity)
  ) {
    preamble = buildConflictChatContext(contextInput);
  }

  // 9. Persona reply
  const messages: CoreMessage[] = [
    { role: "system", content: preamble },
    ...session.chatHistory.slice(-HISTORY_WINDOW).map(toCoreMessage),
  ];
  let reply = FALLBACK_REPLY;
  let toolCalls: RawToolCall[] = [];
  try {
    const result = await completeWithTools(
      messages,
      buildPersonaSystemPrompt(persona, session.phase, session.level)
    );
    reply = result.content || FALLBACK_REPLY;
    toolCalls = result.toolCalls;
  } catch (error) {
    console.error("[turn] Persona reply failed:", error);
  }

  // 10. Tool calls, once each, in order
  const outcomes: ToolOutcome[] = [];
  for (const call of toolCalls) {
    const result = await handleToolCall(session, call.name, call.args, {
      catalog: deps.catalog,
      now: clock(),
    });
    outcomes.push({ tool: call.name, result });
  }

  // 11. Did the persona just give feedback?
  const isFeedback = classifier.isFeedback(reply);
  if (isFeedback) {
    openFeedbackCycle(session, session.phase === "theory" ? "theory" : "coding", clock());
  }

  // 12. Record the reply and summarise
  session.chatHistory.push({ role: "assistant", content: reply });

  const scope = scopeKey(context);
  const timing = session.feedbackTiming;

  return {
    success: true,
    reply,
    persona: summarizePersona(persona),
    toolCalls: outcomes,
    phase: session.phase,
    finishRequested: session.finishRequested,
    timeoutPenalty,
    clarification: {
      isClarification: clarification.isClarification,
      confidence: roundTo(clarification.confidence, 2),
      reason: clarification.reason,
      bonusApplied: award ? award.bonus : 0,
      scopeTotal: award
        ? award.scopeTotal
        : session.clarificationBonuses[scope] ?? null,
    },
    feedbackTracking: {
      isFeedback,
      lastFeedbackAt: timing.lastFeedbackAt?.toISOString() ?? null,
      feedbackType: timing.lastFeedbackType,
      deadline: timing.deadline?.toISOString() ?? null,
      penaltyApplied: timing.penaltyApplied,
    },
    behavior: {
      conflictDetected: conflict.isViolation,
      conflictSeverity: conflict.severity,
      contextSwitchingDetected: contextSwitch.isViolation,
      contextSwitchingSeverity: contextSwitch.severity,
    },
  };
}
