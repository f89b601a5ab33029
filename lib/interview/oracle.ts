/**
 * Oracle client: Vercel AI SDK pointed at the OpenRouter endpoint.
 *
 * Two entry points:
 *   complete()          single prompt, text back (analyzers, scoring, intros)
 *   completeWithTools() persona chat turn with the interview tool set
 *
 * Failures surface as OracleError. Callers decide their own fallback.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type CoreMessage } from "ai";
import { loadEnv } from "./config";
import { OracleError, errorMessage } from "./errors";
import {
  cleanResponse,
  hasForbiddenMarkers,
  stripReasoning,
} from "./response-cleaner";
import { INTERVIEW_TOOLS } from "./tools";

export { OracleError };

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const CORRECTION_MESSAGE =
  "WARNING: your previous reply contained meta-commentary or internal thoughts. " +
  "Speak to the candidate ONLY in direct speech, without tags or remarks about " +
  "your reasoning, in at most 3 sentences. Rephrase your reply within these rules.";

/**
 * Create a Vercel AI SDK provider configured for OpenRouter.
 */
function getOpenRouterProvider(apiKey: string | undefined) {
  if (!apiKey) {
    throw new OracleError("OPENROUTER_API_KEY environment variable is not set");
  }

  return createOpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey,
  });
}

// ---------------------------------------------------------------------------
// Plain completion
// ---------------------------------------------------------------------------

export interface CompleteOptions {
  system?: string;
  maxTokens?: number;
  /** "raw" keeps the reply whole apart from reasoning blocks. */
  format?: "speech" | "raw";
}

/**
 * Send one prompt and return the cleaned reply text.
 */
export async function complete(
  prompt: string,
  options: CompleteOptions = {}
): Promise<string> {
  const env = loadEnv();
  const provider = getOpenRouterProvider(env.OPENROUTER_API_KEY);

  try {
    const result = await generateText({
      model: provider(env.INTERVIEW_MODEL),
      system: options.system,
      prompt,
      maxTokens: options.maxTokens ?? 300,
      temperature: 0.7,
      abortSignal: AbortSignal.timeout(env.ORACLE_TIMEOUT_MS),
    });

    return options.format === "raw"
      ? stripReasoning(result.text)
      : cleanResponse(result.text);
  } catch (error) {
    console.error(`[oracle] Error querying ${env.INTERVIEW_MODEL}:`, error);
    throw new OracleError(errorMessage(error), { cause: error });
  }
}

// ---------------------------------------------------------------------------
// Tool-calling completion
// ---------------------------------------------------------------------------

export interface RawToolCall {
  id: string;
  name: string;
  args: unknown;
}

export interface ToolReply {
  content: string;
  toolCalls: RawToolCall[];
}

/**
 * Run a persona turn. A reply that still carries reasoning markers after
 * cleaning gets one corrective retry; the second reply is used as is.
 */
export async function completeWithTools(
  messages: CoreMessage[],
  system: string,
  maxAttempts: number = 2
): Promise<ToolReply> {
  const env = loadEnv();
  const provider = getOpenRouterProvider(env.OPENROUTER_API_KEY);
  const conversation: CoreMessage[] = [...messages];
  let reply: ToolReply = { content: "", toolCalls: [] };

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const result = await generateText({
        model: provider(env.INTERVIEW_MODEL),
        system,
        messages: conversation,
        tools: INTERVIEW_TOOLS,
        toolChoice: "auto",
        maxTokens: 2000,
        temperature: 0.7,
        abortSignal: AbortSignal.timeout(env.ORACLE_TIMEOUT_MS),
      });

      reply = {
        content: cleanResponse(result.text),
        toolCalls: result.toolCalls.map((call) => ({
          id: call.toolCallId,
          name: call.toolName,
          args: call.args,
        })),
      };
    } catch (error) {
      console.error(`[oracle] Tool call to ${env.INTERVIEW_MODEL} failed:`, error);
      throw new OracleError(errorMessage(error), { cause: error });
    }

    if (!hasForbiddenMarkers(reply.content) || attempt === maxAttempts - 1) {
      return reply;
    }

    console.warn("[oracle] Reply contained meta-commentary, retrying once");
    conversation.push(
      { role: "assistant", content: reply.content },
      { role: "system", content: CORRECTION_MESSAGE }
    );
  }

  return reply;
}
