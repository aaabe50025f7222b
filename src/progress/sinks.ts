/**
 * ProgressSink implementations shipped with the library.
 */
import { randomUUID } from "node:crypto";

import type { ProgressSink, StatsUpdate } from "../core/types.js";
import type { DatabaseBackend } from "../db/backend.js";
import type { Logger } from "../logger.js";

/** Writes progress to a pino logger. */
export class LoggerProgressSink implements ProgressSink {
  private log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: "progress" });
  }

  logInfo(step: string, message: string, percent: number): void {
    this.log.info({ step, percent }, message);
  }

  logWarning(step: string, message: string, percent: number): void {
    this.log.warn({ step, percent }, message);
  }

  logError(step: string, message: string, percent: number): void {
    this.log.error({ step, percent }, message);
  }

  updateStep(step: string, stepIndex: number, stepPercent: number, etaSeconds: number | null): void {
    this.log.debug({ step, stepIndex, stepPercent, etaSeconds }, "step progress");
  }

  updateStats(stats: StatsUpdate): void {
    this.log.info(stats, "stats");
  }
}

/** Persists log lines and counters into the run history tables. */
export class DatabaseProgressSink implements ProgressSink {
  private db: DatabaseBackend;
  private runId: string;

  constructor(db: DatabaseBackend, runId: string) {
    this.db = db;
    this.runId = runId;
  }

  logInfo(step: string, message: string, percent: number): Promise<void> {
    return this.insert("info", step, message, percent);
  }

  logWarning(step: string, message: string, percent: number): Promise<void> {
    return this.insert("warning", step, message, percent);
  }

  logError(step: string, message: string, percent: number): Promise<void> {
    return this.insert("error", step, message, percent);
  }

  updateStep(): void {
    // Step progress is not persisted.
  }

  async updateStats(stats: StatsUpdate): Promise<void> {
    const columns: [string, number | undefined][] = [
      ["record_count", stats.recordCount],
      ["created_count", stats.createdCount],
      ["deleted_count", stats.deletedCount],
    ];
    const set = columns.filter((c): c is [string, number] => c[1] !== undefined);
    if (set.length === 0) return;
    await this.db.execute(
      `UPDATE runs SET ${set.map(([c]) => `${c} = ?`).join(", ")}, updated_at = ? WHERE id = ?`,
      [...set.map(([, v]) => v), new Date().toISOString(), this.runId],
    );
  }

  private async insert(level: string, step: string, message: string, percent: number): Promise<void> {
    await this.db.execute(
      `INSERT INTO run_logs (id, run_id, level, step, message, percent, created_at) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [randomUUID(), this.runId, level, step, message, Math.round(percent), new Date().toISOString()],
    );
  }
}

/** Forwards every call to each sink in turn. */
export class CompositeProgressSink implements ProgressSink {
  private sinks: ProgressSink[];

  constructor(sinks: ProgressSink[]) {
    this.sinks = sinks;
  }

  async logInfo(step: string, message: string, percent: number): Promise<void> {
    for (const s of this.sinks) await s.logInfo(step, message, percent);
  }

  async logWarning(step: string, message: string, percent: number): Promise<void> {
    for (const s of this.sinks) await s.logWarning(step, message, percent);
  }

  async logError(step: string, message: string, percent: number): Promise<void> {
    for (const s of this.sinks) await s.logError(step, message, percent);
  }

  async updateStep(step: string, stepIndex: number, stepPercent: number, etaSeconds: number | null): Promise<void> {
    for (const s of this.sinks) await s.updateStep(step, stepIndex, stepPercent, etaSeconds);
  }

  async updateStats(stats: StatsUpdate): Promise<void> {
    for (const s of this.sinks) await s.updateStats(stats);
  }
}
