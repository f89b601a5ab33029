/**
 * Tests for persona reply cleaning and structured-reply parsing.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  cleanResponse,
  hasForbiddenMarkers,
  stripReasoning,
} from "@/lib/interview/response-cleaner";
import { extractJsonBlock, parseOracleJson } from "@/lib/interview/json-reply";

// ---------------------------------------------------------------------------
// cleanResponse
// ---------------------------------------------------------------------------

describe("cleanResponse", () => {
  it("removes reasoning tags", () => {
    expect(cleanResponse("<think>plan the reply</think>Hello there.")).toBe(
      "Hello there."
    );
  });

  it("removes HTML comments", () => {
    expect(
      cleanResponse("Good answer.<!-- internal score 7 --> Let's move on.")
    ).toBe("Good answer. Let's move on.");
  });

  it("strips a narrated preamble line", () => {
    expect(cleanResponse("Okay, let me look at this.\nWhat is a closure?")).toBe(
      "What is a closure?"
    );
  });

  it("keeps a first line that only starts like a filler word", () => {
    expect(cleanResponse("Solution passes all tests.\nNow consider an empty list.")).toBe(
      "Solution passes all tests.\nNow consider an empty list."
    );
    expect(cleanResponse("Rightmost element is the pivot here.\nWhy did you choose it?")).toBe(
      "Rightmost element is the pivot here.\nWhy did you choose it?"
    );
    expect(cleanResponse("Someone else wrote this helper?\nExplain it anyway.")).toBe(
      "Someone else wrote this helper?\nExplain it anyway."
    );
  });

  it("strips a stage direction", () => {
    expect(cleanResponse("*smiles* Welcome to the interview.")).toBe(
      "Welcome to the interview."
    );
  });

  it("keeps at most three sentences", () => {
    expect(cleanResponse("One. Two. Three. Four.")).toBe("One. Two. Three.");
  });

  it("collapses blank lines", () => {
    expect(cleanResponse("Line one\n\n\nLine two")).toBe("Line one\nLine two");
  });
});

describe("stripReasoning", () => {
  it("keeps the payload whole", () => {
    expect(stripReasoning('<reasoning>check</reasoning>{"a": 1}. Two. Three. Four.')).toBe(
      '{"a": 1}. Two. Three. Four.'
    );
  });
});

describe("hasForbiddenMarkers", () => {
  it("detects meta-commentary", () => {
    expect(hasForbiddenMarkers("Let me think about what to ask.")).toBe(true);
    expect(hasForbiddenMarkers("<internal>notes</internal>")).toBe(true);
  });

  it("accepts direct speech", () => {
    expect(hasForbiddenMarkers("What is a decorator in Python?")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// parseOracleJson
// ---------------------------------------------------------------------------

const ScoreSchema = z.object({ score: z.number() });

describe("extractJsonBlock", () => {
  it("returns the outermost braces", () => {
    expect(extractJsonBlock('prefix {"a": {"b": 1}} suffix')).toBe('{"a": {"b": 1}}');
  });

  it("returns null without a block", () => {
    expect(extractJsonBlock("no json here")).toBeNull();
    expect(extractJsonBlock("}{")).toBeNull();
  });
});

describe("parseOracleJson", () => {
  it("parses JSON wrapped in prose and fences", () => {
    const text = 'Sure!\n```json\n{"score": 7}\n```\nDone.';
    expect(parseOracleJson(text, ScoreSchema)).toEqual({ score: 7 });
  });

  it("returns null for malformed JSON", () => {
    expect(parseOracleJson("{score: 7}", ScoreSchema)).toBeNull();
  });

  it("returns null when the schema does not match", () => {
    expect(parseOracleJson('{"score": "high"}', ScoreSchema)).toBeNull();
  });
});
