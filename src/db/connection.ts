import pg from "pg";
import type { Pool } from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** In-process Postgres for local use and tests; nothing is persisted. */
export function createMemoryPool(): Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as Pool;
}

export function createDb(pool: Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
