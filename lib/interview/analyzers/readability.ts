/**
 * Code-readability analyzer.
 *
 * A deterministic subset of PEP 8 checks over candidate Python code. No
 * oracle involved. Stricter levels pay more per violation, and middle and
 * senior candidates are also expected to document their functions.
 */

import {
  DEFAULT_PENALTY_WEIGHTS,
  READABILITY_SEVERITY_WEIGHTS,
} from "../config";
import { roundTo } from "../numbers";
import type {
  Level,
  ReadabilityReport,
  ReadabilityViolation,
} from "../types";

export const MIN_CODE_LENGTH = 10;
export const MAX_LINE_LENGTH = 79;

const OPERATOR_PATTERN = /[A-Za-z0-9_][+\-*/=<>][A-Za-z0-9_]/;
const CAMEL_CASE_ASSIGNMENT = /\b[a-z]+[A-Z][a-zA-Z]*\s*=/;
const FUNCTION_DEF = /^def\s+\w+\s*\([^)]*\)\s*:/;

function isBlank(line: string | undefined): boolean {
  return line !== undefined && line.trim() === "";
}

function checkLayout(lines: string[]): ReadabilityViolation[] {
  const violations: ReadabilityViolation[] = [];

  lines.forEach((line, index) => {
    const lineNo = index + 1;

    if (line.length > MAX_LINE_LENGTH) {
      violations.push({
        line: lineNo,
        type: "line_too_long",
        message: `Line ${lineNo}: ${line.length} characters (limit ${MAX_LINE_LENGTH})`,
        severity: "minor",
      });
    }

    if (line.trimEnd() !== line && line.trim() !== "") {
      violations.push({
        line: lineNo,
        type: "trailing_whitespace",
        message: `Line ${lineNo}: trailing whitespace`,
        severity: "minor",
      });
    }

    if (line.includes("\t")) {
      violations.push({
        line: lineNo,
        type: "tabs_used",
        message: `Line ${lineNo}: tabs used instead of spaces`,
        severity: "minor",
      });
    }

    // one finding per run of blank lines
    if (isBlank(line) && isBlank(lines[index - 1]) && !isBlank(lines[index - 2])) {
      violations.push({
        line: lineNo,
        type: "multiple_blank_lines",
        message: `Line ${lineNo}: multiple blank lines`,
        severity: "minor",
      });
    }
  });

  return violations;
}

function checkOperators(lines: string[]): ReadabilityViolation[] {
  const violations: ReadabilityViolation[] = [];

  lines.forEach((line, index) => {
    const hash = line.indexOf("#");
    const code = hash === -1 ? line : line.slice(0, hash);
    if (
      OPERATOR_PATTERN.test(code) &&
      !code.includes('"') &&
      !code.includes("'")
    ) {
      violations.push({
        line: index + 1,
        type: "missing_whitespace_around_operator",
        message: `Line ${index + 1}: missing whitespace around operator`,
        severity: "minor",
      });
    }
  });

  return violations;
}

function checkNaming(lines: string[]): ReadabilityViolation[] {
  const violations: ReadabilityViolation[] = [];

  lines.forEach((line, index) => {
    if (CAMEL_CASE_ASSIGNMENT.test(line) && !line.includes("class")) {
      violations.push({
        line: index + 1,
        type: "naming_convention",
        message: `Line ${index + 1}: camelCase used instead of snake_case`,
        severity: "moderate",
      });
    }
  });

  return violations;
}

function checkDocstrings(lines: string[], level: Level): ReadabilityViolation[] {
  if (level === "junior") return [];

  const violations: ReadabilityViolation[] = [];

  lines.forEach((line, index) => {
    if (!FUNCTION_DEF.test(line.trim())) return;
    const next = lines[index + 1];
    if (next === undefined) return;
    const nextTrimmed = next.trim();
    if (!nextTrimmed.startsWith('"""') && !nextTrimmed.startsWith("'''")) {
      violations.push({
        line: index + 1,
        type: "missing_docstring",
        message: `Line ${index + 1}: function without a docstring`,
        severity: level === "middle" ? "moderate" : "severe",
      });
    }
  });

  return violations;
}

function readabilityFeedback(count: number, level: Level): string {
  if (count === 0) return "Excellent code, consistent with PEP 8.";
  if (count <= 3) {
    return `The code is good overall, with ${count} minor style notes.`;
  }
  if (count <= 7) {
    return `Found ${count} PEP 8 violations. Readability should be improved.`;
  }
  return `Too many style violations (${count}). This is not acceptable at ${level} level.`;
}

export function analyzeReadability(code: string, level: Level): ReadabilityReport {
  if (code.trim().length < MIN_CODE_LENGTH) {
    return {
      violations: [],
      penaltyScore: 0,
      readabilityScore: 1,
      feedback: "Code is missing or too short to review.",
      violationsCount: 0,
    };
  }

  const lines = code.split("\n");
  const violations = [
    ...checkLayout(lines),
    ...checkOperators(lines),
    ...checkNaming(lines),
    ...checkDocstrings(lines, level),
  ];

  const rawPenalty = violations.reduce(
    (sum, violation) => sum + READABILITY_SEVERITY_WEIGHTS[violation.severity][level],
    0
  );
  const maxPenalty = DEFAULT_PENALTY_WEIGHTS[level].poor_code_readability * 2;
  const readability = Math.max(0, 1 - (violations.length / lines.length) * 0.5);

  return {
    violations,
    penaltyScore: roundTo(Math.min(rawPenalty, maxPenalty), 2),
    readabilityScore: roundTo(readability, 2),
    feedback: readabilityFeedback(violations.length, level),
    violationsCount: violations.length,
  };
}
