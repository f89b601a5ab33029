/**
 * Code-execution sandbox contract.
 *
 * Candidate code defines `solution(...)`; each test calls it with the
 * test's positional arguments.
 */

import type { TestVector } from "@/lib/catalog/types";

export interface TestResult {
  num: number;
  passed: boolean;
  expected: unknown;
  actual: unknown;
  error: string | null;
  hidden: boolean;
}

export interface CodeSandbox {
  run(code: string, tests: TestVector[]): Promise<TestResult[]>;
}

/** What the runner reports for a single call of `solution`. */
export type CallOutcome =
  | { ok: true; actual: unknown }
  | { ok: false; error: string };
