import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type * as schema from "@/database/schema";

/** The pool-backed database or an open transaction on it. */
export type DatabaseExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;
