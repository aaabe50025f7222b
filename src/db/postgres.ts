/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import type { DatabaseBackend, SqlParam } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

/** Rewrite `?` placeholders to `$1, $2, …`. */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;

  constructor(connectionString: string) {
    if (!connectionString) {
      throw new Error("PostgresBackend requires a connection string");
    }
    this.sql = postgres(connectionString);
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    await this.sql.unsafe(toPositional(sql), params);
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    return await this.sql.unsafe<T[]>(toPositional(sql), params);
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
