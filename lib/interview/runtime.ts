/**
 * Process-wide interview runtime.
 *
 * Route handlers share one session registry, one catalog and one sandbox.
 * The catalog is Postgres-backed when POSTGRES_URL is set and the in-memory
 * seed catalog otherwise.
 */

import { MemoryCatalog } from "@/lib/catalog/memory";
import type { TaskCatalog } from "@/lib/catalog/types";
import { PythonSandbox } from "@/lib/sandbox/python";
import { loadEnv } from "./config";
import type { InterviewDependencies } from "./handlers";
import { SessionRegistry } from "./session";
import type { InterviewSession } from "./types";

let runtime: Promise<InterviewDependencies> | null = null;

async function createCatalog(databaseUrl: string | undefined): Promise<TaskCatalog> {
  if (!databaseUrl) return MemoryCatalog.fromSeed();
  const { DbCatalog } = await import("@/lib/db/queries");
  return new DbCatalog();
}

/** Store the final report when a database is configured. Never throws. */
export async function archiveSession(session: InterviewSession): Promise<void> {
  if (!loadEnv().POSTGRES_URL) return;
  try {
    const { saveInterviewReport } = await import("@/lib/db/queries");
    await saveInterviewReport(session);
  } catch (error) {
    console.error(`[db] Failed to archive interview ${session.id}:`, error);
  }
}

async function createRuntime(): Promise<InterviewDependencies> {
  const env = loadEnv();
  return {
    catalog: await createCatalog(env.POSTGRES_URL),
    sandbox: new PythonSandbox({
      pythonBin: env.PYTHON_BIN,
      timeoutMs: env.SANDBOX_TIMEOUT_MS,
    }),
    registry: new SessionRegistry(),
    archive: archiveSession,
  };
}

export function getRuntime(): Promise<InterviewDependencies> {
  if (!runtime) runtime = createRuntime();
  return runtime;
}
