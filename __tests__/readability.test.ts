/**
 * Tests for the deterministic code-readability analyzer.
 */

import { describe, it, expect } from "vitest";
import { analyzeReadability } from "@/lib/interview/analyzers/readability";

describe("analyzeReadability", () => {
  it("treats very short code as nothing to review", () => {
    const report = analyzeReadability("x=1", "senior");
    expect(report).toEqual({
      violations: [],
      penaltyScore: 0,
      readabilityScore: 1,
      feedback: "Code is missing or too short to review.",
      violationsCount: 0,
    });
  });

  it("flags a missing space around an operator", () => {
    const report = analyzeReadability("def solution(a,b):\n    return a+b", "junior");

    expect(report.violations).toEqual([
      {
        line: 2,
        type: "missing_whitespace_around_operator",
        message: "Line 2: missing whitespace around operator",
        severity: "minor",
      },
    ]);
    expect(report.penaltyScore).toBe(0.2);
    expect(report.readabilityScore).toBe(0.75);
    expect(report.feedback).toBe("The code is good overall, with 1 minor style notes.");
  });

  it("flags long lines and tabs", () => {
    const code = ["# " + "a".repeat(118), "\tpass", "\tpass", "\tpass"].join("\n");
    const report = analyzeReadability(code, "junior");

    expect(report.violations.map((v) => v.type)).toEqual([
      "line_too_long",
      "tabs_used",
      "tabs_used",
      "tabs_used",
    ]);
    expect(report.violations[0].message).toBe("Line 1: 120 characters (limit 79)");
    expect(report.penaltyScore).toBe(0.8);
    expect(report.readabilityScore).toBe(0.5);
  });

  it("flags trailing whitespace", () => {
    const report = analyzeReadability("def f():   \n    return 1", "junior");
    expect(report.violations.map((v) => v.type)).toEqual(["trailing_whitespace"]);
  });

  it("reports a run of blank lines once", () => {
    const report = analyzeReadability("a = 1\n\n\n\nb = 2", "junior");
    expect(report.violations).toEqual([
      {
        line: 3,
        type: "multiple_blank_lines",
        message: "Line 3: multiple blank lines",
        severity: "minor",
      },
    ]);
  });

  it("flags camelCase assignments as moderate", () => {
    const report = analyzeReadability("myValue = 10\nprint(myValue)", "junior");
    expect(report.violations.map((v) => v.type)).toEqual(["naming_convention"]);
    expect(report.penaltyScore).toBe(0.5);
  });

  it("requires docstrings above junior level", () => {
    const code = "def add(a, b):\n    return a + b";

    expect(analyzeReadability(code, "junior").violationsCount).toBe(0);

    const middle = analyzeReadability(code, "middle");
    expect(middle.violations).toEqual([
      {
        line: 1,
        type: "missing_docstring",
        message: "Line 1: function without a docstring",
        severity: "moderate",
      },
    ]);
    expect(middle.penaltyScore).toBe(1);

    const senior = analyzeReadability(code, "senior");
    expect(senior.violations[0].severity).toBe("severe");
    expect(senior.penaltyScore).toBe(3);
  });

  it("accepts documented functions", () => {
    const code = 'def add(a, b):\n    """Sum two numbers."""\n    return a + b';
    const report = analyzeReadability(code, "middle");

    expect(report.violationsCount).toBe(0);
    expect(report.readabilityScore).toBe(1);
    expect(report.feedback).toBe("Excellent code, consistent with PEP 8.");
  });

  it("caps the penalty at twice the level weight", () => {
    const code = Array.from({ length: 30 }, () => "x=1").join("\n");
    const report = analyzeReadability(code, "junior");

    expect(report.violationsCount).toBe(30);
    expect(report.penaltyScore).toBe(4);
    expect(report.readabilityScore).toBe(0.5);
    expect(report.feedback).toBe(
      "Too many style violations (30). This is not acceptable at junior level."
    );
  });

  it("never lowers the penalty as violations grow", () => {
    let previous = 0;
    for (let n = 1; n <= 25; n++) {
      const code = Array.from({ length: n }, () => "y=2").join("\n") + "\n# end of file";
      const penalty = analyzeReadability(code, "middle").penaltyScore;
      expect(penalty).toBeGreaterThanOrEqual(previous);
      previous = penalty;
    }
    expect(previous).toBe(6);
  });
});
