/**
 * Drizzle ORM client singleton.
 *
 * Uses @vercel/postgres, which reads the POSTGRES_URL environment
 * variable. Only imported when a database is configured.
 */

import { sql } from "@vercel/postgres";
import { drizzle } from "drizzle-orm/vercel-postgres";
import * as schema from "./schema";

export const db = drizzle({ client: sql, schema });
