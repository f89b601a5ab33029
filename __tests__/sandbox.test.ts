/**
 * Tests for result comparison and the Python subprocess sandbox.
 * The interpreter is replaced by a scripted fake process.
 */

import { EventEmitter } from "node:events";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildTestResults, valuesMatch } from "@/lib/sandbox/compare";
import { PythonSandbox, type SandboxProcess } from "@/lib/sandbox/python";
import type { TestVector } from "@/lib/catalog/types";

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

describe("valuesMatch", () => {
  it("compares sequences without regard to order", () => {
    expect(valuesMatch([0, 1], [1, 0])).toBe(true);
    expect(valuesMatch(["b", "a"], ["a", "b"])).toBe(true);
    expect(valuesMatch([[8, 10], [1, 6]], [[1, 6], [8, 10]])).toBe(true);
  });

  it("still requires the same elements", () => {
    expect(valuesMatch([1, 2], [1, 2, 2])).toBe(false);
    expect(valuesMatch([1, 2], [1, 3])).toBe(false);
  });

  it("falls back to exact equality for unorderable elements", () => {
    expect(valuesMatch([null, 1], [null, 1])).toBe(true);
    expect(valuesMatch([null, 1], [1, null])).toBe(false);
  });

  it("compares scalars exactly", () => {
    expect(valuesMatch(5, 5)).toBe(true);
    expect(valuesMatch(true, 1)).toBe(false);
    expect(valuesMatch("5", 5)).toBe(false);
  });
});

describe("buildTestResults", () => {
  const tests: TestVector[] = [
    { input: [2, 3], expected: 5, hidden: false },
    { input: [0, 0], expected: 0, hidden: true },
  ];

  it("numbers results and carries errors", () => {
    const results = buildTestResults(tests, [
      { ok: true, actual: 5 },
      { ok: false, error: "ZeroDivisionError: division by zero" },
    ]);

    expect(results).toEqual([
      { num: 1, passed: true, expected: 5, actual: 5, error: null, hidden: false },
      {
        num: 2,
        passed: false,
        expected: 0,
        actual: null,
        error: "ZeroDivisionError: division by zero",
        hidden: true,
      },
    ]);
  });

  it("fails tests the runner did not report", () => {
    const results = buildTestResults(tests, [{ ok: true, actual: 5 }]);
    expect(results[1].error).toBe("No result from runner");
  });
});

// ---------------------------------------------------------------------------
// PythonSandbox
// ---------------------------------------------------------------------------

class FakeStream extends EventEmitter {
  setEncoding = vi.fn();
}

class FakeProcess extends EventEmitter implements SandboxProcess {
  stdout = new FakeStream();
  stderr = new FakeStream();
  stdin = { end: vi.fn(), on: vi.fn() };
  kill = vi.fn((): boolean => {
    this.emit("close", null);
    return true;
  });
}

describe("PythonSandbox", () => {
  const tests: TestVector[] = [
    { input: [2, 3], expected: 5, hidden: false },
    { input: [[3, 1, 2]], expected: [1, 2, 3], hidden: false },
  ];
  let child: FakeProcess;
  let sandbox: PythonSandbox;

  beforeEach(() => {
    child = new FakeProcess();
    sandbox = new PythonSandbox({
      pythonBin: "python3",
      timeoutMs: 100,
      harnessPath: "/opt/harness.py",
      spawner: () => child,
    });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sends code and inputs and reads the results", async () => {
    const pending = sandbox.run("def solution(a, b=None): ...", tests);
    child.stdout.emit(
      "data",
      JSON.stringify({
        results: [
          { ok: true, actual: 5 },
          { ok: true, actual: [3, 2, 1] },
        ],
      })
    );
    child.emit("close", 0);

    const results = await pending;
    expect(results.map((r) => r.passed)).toEqual([true, true]);
    expect(child.stdin.end).toHaveBeenCalledWith(
      JSON.stringify({
        code: "def solution(a, b=None): ...",
        inputs: [[2, 3], [[3, 1, 2]]],
      })
    );
  });

  it("fails every test on timeout", async () => {
    vi.useFakeTimers();
    const pending = sandbox.run("while True: pass", tests);
    vi.advanceTimersByTime(100);

    const results = await pending;
    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
    expect(results.map((r) => r.error)).toEqual([
      "Timed out after 100 ms",
      "Timed out after 100 ms",
    ]);
  });

  it("reports stderr when the harness crashes", async () => {
    const pending = sandbox.run("x", tests);
    child.stderr.emit("data", "Traceback: boom\n");
    child.emit("close", 1);

    const results = await pending;
    expect(results[0]).toMatchObject({ passed: false, error: "Traceback: boom" });
  });

  it("reports a missing interpreter", async () => {
    const pending = sandbox.run("x", tests);
    child.emit("error", new Error("spawn python3 ENOENT"));

    const results = await pending;
    expect(results[1].error).toBe("Sandbox unavailable: spawn python3 ENOENT");
  });

  it("does not start a process without tests", async () => {
    const spawner = vi.fn(() => child);
    const idle = new PythonSandbox({ pythonBin: "python3", timeoutMs: 100, spawner });
    expect(await idle.run("x", [])).toEqual([]);
    expect(spawner).not.toHaveBeenCalled();
  });
});
