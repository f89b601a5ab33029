/**
 * Python subprocess sandbox.
 *
 * Spawns the configured interpreter on harness.py, sends the code and test
 * inputs as JSON on stdin and reads one JSON document back. The process is
 * killed when it exceeds the timeout; every test then fails with the
 * timeout message.
 */

import { spawn } from "node:child_process";
import path from "node:path";
import { z } from "zod";
import type { TestVector } from "@/lib/catalog/types";
import { errorMessage } from "@/lib/interview/errors";
import { buildTestResults } from "./compare";
import type { CallOutcome, CodeSandbox, TestResult } from "./types";

const HarnessOutputSchema = z.object({
  results: z.array(
    z.union([
      z.object({ ok: z.literal(true), actual: z.unknown() }),
      z.object({ ok: z.literal(false), error: z.string() }),
    ])
  ),
});

interface OutputStream {
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: "data", listener: (chunk: string) => void): unknown;
}

/** The parts of a child process the sandbox talks to. */
export interface SandboxProcess {
  stdin: {
    end(data: string): unknown;
    on(event: "error", listener: (error: Error) => void): unknown;
  };
  stdout: OutputStream;
  stderr: OutputStream;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: (exitCode: number | null) => void): unknown;
}

export type Spawner = (command: string, args: string[]) => SandboxProcess;

export interface PythonSandboxOptions {
  pythonBin: string;
  timeoutMs: number;
  harnessPath?: string;
  spawner?: Spawner;
}

const defaultSpawner: Spawner = (command, args) => spawn(command, args);

export const DEFAULT_HARNESS_PATH = path.join(
  process.cwd(),
  "lib",
  "sandbox",
  "harness.py"
);

interface ProcessOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

export class PythonSandbox implements CodeSandbox {
  private readonly harnessPath: string;
  private readonly spawner: Spawner;

  constructor(private readonly options: PythonSandboxOptions) {
    this.harnessPath = options.harnessPath ?? DEFAULT_HARNESS_PATH;
    this.spawner = options.spawner ?? defaultSpawner;
  }

  async run(code: string, tests: TestVector[]): Promise<TestResult[]> {
    if (tests.length === 0) return [];

    const input = JSON.stringify({ code, inputs: tests.map((t) => t.input) });
    let output: ProcessOutput;
    try {
      output = await this.execute(input);
    } catch (error) {
      console.error("[sandbox] Failed to start interpreter:", error);
      return this.failAll(tests, `Sandbox unavailable: ${errorMessage(error)}`);
    }

    if (output.timedOut) {
      return this.failAll(tests, `Timed out after ${this.options.timeoutMs} ms`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(output.stdout);
    } catch {
      console.error("[sandbox] Harness produced no JSON:", output.stderr);
      return this.failAll(
        tests,
        output.stderr.trim() || `Runner exited with code ${output.exitCode}`
      );
    }

    const parsed = HarnessOutputSchema.safeParse(raw);
    if (!parsed.success) {
      console.error("[sandbox] Unexpected harness output:", parsed.error.message);
      return this.failAll(tests, "Unexpected runner output");
    }

    const outcomes = parsed.data.results.map(
      (result): CallOutcome =>
        result.ok
          ? { ok: true, actual: result.actual }
          : { ok: false, error: result.error }
    );
    return buildTestResults(tests, outcomes);
  }

  private failAll(tests: TestVector[], error: string): TestResult[] {
    return buildTestResults(
      tests,
      tests.map((): CallOutcome => ({ ok: false, error }))
    );
  }

  private execute(input: string): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const child = this.spawner(this.options.pythonBin, [this.harnessPath]);
      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, this.options.timeoutMs);

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (error: Error) => {
        clearTimeout(timer);
        reject(error);
      });
      child.on("close", (exitCode: number | null) => {
        clearTimeout(timer);
        resolve({ stdout, stderr, exitCode, timedOut });
      });

      // EPIPE when the interpreter exits before reading its input
      child.stdin.on("error", (error: Error) => {
        console.warn("[sandbox] Could not write to interpreter:", error.message);
      });
      child.stdin.end(input);
    });
  }
}
