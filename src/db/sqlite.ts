/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { DatabaseBackend, SqlParam } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

export class SQLiteBackend implements DatabaseBackend {
  private db: Database.Database;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    this.db.prepare(sql).run(...params);
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    return this.db.prepare(sql).all(...params) as T[];
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const row = this.db.prepare(sql).get(...params);
    return (row as T | undefined) ?? null;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
