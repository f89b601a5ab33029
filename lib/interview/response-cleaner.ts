/**
 * Reply cleaning for persona output.
 *
 * Models sometimes narrate their reasoning or wrap it in tags. The candidate
 * must only ever see direct speech, capped at three sentences.
 */

const REASONING_TAGS = ["think", "thinking", "internal", "reasoning"];

const REASONING_PATTERNS: RegExp[] = [
  ...REASONING_TAGS.map(
    (tag) => new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, "gi")
  ),
  /<!--[\s\S]*?-->/g,
  /\{thinking:[\s\S]*?\}/gi,
  /\[thinking:[\s\S]*?\]/gi,
  /\(thinking:[\s\S]*?\)/gi,
  /\/\/ thinking:/gi,
  /# thinking:/gi,
];

const PREAMBLE_PATTERNS: RegExp[] = [
  /^(?:okay|ok|alright|well|hmm|so|right|got it|understood)\b,?[^\n]*\n\s*/i,
  /^(?:let me|i need to|i should|i must|i want to|i will try|i think about|i'll consider|i'll analy[sz]e|i'll check)\b.*?[.!?]\s*/i,
  /^\*[^*]+\*\s*/,
  /^\[[^\]]+\]\s*/,
  /^\([^)]+\)\s*/,
  /^the (?:user|candidate) is asking about.*\n/i,
  /^current request:.*\n/i,
  /^i am the interviewer.*\n/i,
  /^first,? i .*\n/i,
  /^then i .*\n/i,
  /^in the end i .*\n/i,
  /^i decided.*\n/i,
  /^my answer will be.*\n/i,
];

/** Markers that must not survive cleaning; a reply carrying one is retried. */
export const FORBIDDEN_MARKERS: RegExp[] = [
  /<think/i,
  /<internal/i,
  /<reason/i,
  /<!--/,
  /\{thinking/i,
  /\[thinking/i,
  /\(thinking/i,
  /\/\/ thinking/i,
  /# thinking/i,
  /my reasoning/i,
  /let me think/i,
  /i decided/i,
  /my answer will be/i,
  /i am the interviewer/i,
  /my task is/i,
  /i should ask/i,
];

export const MAX_REPLY_SENTENCES = 3;

/**
 * Remove reasoning blocks only. Used on replies that are expected to carry
 * JSON, where sentence trimming would corrupt the payload.
 */
export function stripReasoning(text: string): string {
  let result = text;
  for (const pattern of REASONING_PATTERNS) {
    result = result.replace(pattern, "");
  }
  return result.trim();
}

export function cleanResponse(text: string): string {
  let result = stripReasoning(text);

  for (const pattern of PREAMBLE_PATTERNS) {
    result = result.replace(pattern, "");
  }

  const sentences = result.trim().split(/(?<=[.!?])\s+/);
  if (sentences.length > MAX_REPLY_SENTENCES) {
    result = sentences.slice(0, MAX_REPLY_SENTENCES).join(" ");
    if (!/(?:\.\.\.|[….!?])$/.test(result)) {
      result += "…";
    }
  }

  return result
    .replace(/<[^>]+>/g, "")
    .replace(/\n\s*\n/g, "\n")
    .trim();
}

export function hasForbiddenMarkers(text: string): boolean {
  return FORBIDDEN_MARKERS.some((pattern) => pattern.test(text));
}
