/**
 * Structured-reply parsing.
 *
 * Analyzer prompts ask the oracle for a single JSON object, but replies
 * often wrap it in prose or code fences. The outermost {...} block is
 * taken, parsed, and validated; anything that does not fit the schema is
 * treated as no reply at all.
 */

import type { z } from "zod";

export function extractJsonBlock(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

export function parseOracleJson<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): z.output<S> | null {
  const block = extractJsonBlock(text);
  if (block === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(block);
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
