/**
 * Progress sinks.
 */
import { describe, test, expect } from "vitest";

import { SQLiteBackend } from "../src/db/sqlite.js";
import { CompositeProgressSink, DatabaseProgressSink } from "../src/progress/sinks.js";
import { RecordingProgressSink } from "./fixtures.js";

async function dbWithRun(id: string): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  const now = new Date().toISOString();
  await db.execute(
    "INSERT INTO runs (id, input_path, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?)",
    [id, "/tmp/in.xlsx", "running", now, now],
  );
  return db;
}

interface LogRow {
  level: string;
  step: string;
  message: string;
  percent: number;
}

interface CountRow {
  record_count: number;
  created_count: number;
  deleted_count: number;
}

describe("DatabaseProgressSink", () => {
  test("log lines are stored per run", async () => {
    const db = await dbWithRun("run-1");
    const sink = new DatabaseProgressSink(db, "run-1");
    await sink.logInfo("read", "Read 3 rows", 4.6);
    await sink.logWarning("keywords", "1 record without keywords", 75);
    await sink.logError("publish", "batch 1 failed", 80);

    const rows = await db.query<LogRow>(
      "SELECT level, step, message, percent FROM run_logs WHERE run_id = ? ORDER BY created_at, rowid",
      ["run-1"],
    );
    expect(rows).toEqual([
      { level: "info", step: "read", message: "Read 3 rows", percent: 5 },
      { level: "warning", step: "keywords", message: "1 record without keywords", percent: 75 },
      { level: "error", step: "publish", message: "batch 1 failed", percent: 80 },
    ]);
    await db.close();
  });

  test("stats update only the given counters", async () => {
    const db = await dbWithRun("run-1");
    const sink = new DatabaseProgressSink(db, "run-1");
    await sink.updateStats({ recordCount: 3 });
    await sink.updateStats({ createdCount: 2, deletedCount: 1 });
    await sink.updateStats({});

    const row = await db.queryOne<CountRow>(
      "SELECT record_count, created_count, deleted_count FROM runs WHERE id = ?",
      ["run-1"],
    );
    expect(row).toEqual({ record_count: 3, created_count: 2, deleted_count: 1 });
    await db.close();
  });

  test("a log line for an unknown run is rejected", async () => {
    const db = await dbWithRun("run-1");
    const sink = new DatabaseProgressSink(db, "run-404");
    await expect(sink.logInfo("read", "orphan", 0)).rejects.toThrow();
    await db.close();
  });
});

describe("CompositeProgressSink", () => {
  test("forwards every call to each sink", async () => {
    const a = new RecordingProgressSink();
    const b = new RecordingProgressSink();
    const sink = new CompositeProgressSink([a, b]);
    await sink.logInfo("read", "start", 0);
    await sink.logWarning("manifest", "skipped", 12);
    await sink.updateStep("embedding", 4, 50, 3);
    await sink.updateStats({ recordCount: 2 });

    for (const s of [a, b]) {
      expect(s.events).toEqual([
        { level: "info", step: "read", message: "start", percent: 0 },
        { level: "warning", step: "manifest", message: "skipped", percent: 12 },
      ]);
      expect(s.steps).toEqual([{ step: "embedding", index: 4, percent: 50, eta: 3 }]);
      expect(s.stats).toEqual([{ recordCount: 2 }]);
    }
  });
});
