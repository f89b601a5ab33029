/**
 * Result comparison.
 *
 * Two sequences match when they hold the same elements in any order. If the
 * elements cannot be ordered (mixed types, nulls, objects) the sequences
 * must match exactly.
 */

import { isDeepStrictEqual } from "node:util";
import type { TestVector } from "@/lib/catalog/types";
import type { CallOutcome, TestResult } from "./types";

class Unorderable extends Error {}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const order = compareValues(a[i], b[i]);
      if (order !== 0) return order;
    }
    return a.length - b.length;
  }
  throw new Unorderable();
}

function sortedCopy(values: unknown[]): unknown[] | null {
  try {
    return [...values].sort(compareValues);
  } catch (error) {
    if (error instanceof Unorderable) return null;
    throw error;
  }
}

export function valuesMatch(expected: unknown, actual: unknown): boolean {
  if (Array.isArray(expected) && Array.isArray(actual)) {
    const left = sortedCopy(expected);
    const right = sortedCopy(actual);
    if (left && right) return isDeepStrictEqual(left, right);
  }
  return isDeepStrictEqual(expected, actual);
}

export function buildTestResults(
  tests: TestVector[],
  outcomes: CallOutcome[]
): TestResult[] {
  return tests.map((test, index) => {
    const outcome: CallOutcome = outcomes[index] ?? {
      ok: false,
      error: "No result from runner",
    };
    const base = {
      num: index + 1,
      expected: test.expected,
      hidden: test.hidden,
    };
    if (!outcome.ok) {
      return { ...base, passed: false, actual: null, error: outcome.error };
    }
    return {
      ...base,
      passed: valuesMatch(test.expected, outcome.actual),
      actual: outcome.actual,
      error: null,
    };
  });
}
