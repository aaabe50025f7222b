/**
 * index-publisher – ingests tabular content, enriches it with embeddings and
 * keywords, publishes it to a content repository, tags a release and deploys.
 */
import type { AxiosAdapter } from "axios";
import { randomUUID } from "node:crypto";

import { parseConfig } from "./config.js";
import type { Config } from "./config.js";
import { PipelineFailedError } from "./core/exceptions.js";
import { Pipeline, stagingPrefixes } from "./core/pipeline.js";
import type { PipelineOutcome } from "./core/pipeline.js";
import type { ProgressSink, RollbackReport, RunResult } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { FlowRunner } from "./deploy/flows.js";
import { JenkinsClient } from "./deploy/jenkins.js";
import type { BuildTrigger } from "./deploy/jenkins.js";
import { AzureEmbeddingProvider } from "./enrich/embedding.js";
import type { EmbeddingProvider } from "./enrich/embedding.js";
import { AzureKeywordProvider } from "./enrich/keywords.js";
import type { KeywordProvider } from "./enrich/keywords.js";
import { logger as defaultLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import {
  CompositeProgressSink,
  DatabaseProgressSink,
  LoggerProgressSink,
} from "./progress/sinks.js";
import { GitLabClient } from "./publish/gitlab.js";
import type { ContentRepository } from "./publish/gitlab.js";
import type { StorageBackend } from "./storage/backend.js";

export { ConfigSchema, loadConfig, parseConfig } from "./config.js";
export type { Config, RawConfig } from "./config.js";
export { configFromEnv, loadEnv } from "./env.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type { FatalError, FatalErrorKind, StageResult } from "./core/result.js";
export { EMBEDDING_RETRY, KEYWORD_RETRY } from "./core/retry.js";
export type { RetryPolicy } from "./core/retry.js";
export { STEPS } from "./core/pipeline.js";
export type { EmbeddingProvider } from "./enrich/embedding.js";
export type { KeywordProvider } from "./enrich/keywords.js";
export type { ContentRepository, CommitAction } from "./publish/gitlab.js";
export type { BuildTrigger, DeployParams } from "./deploy/jenkins.js";
export type { ContentArtifact, IndexDocument } from "./payload/models.js";
export {
  CompositeProgressSink,
  DatabaseProgressSink,
  LoggerProgressSink,
} from "./progress/sinks.js";
export { createLogger } from "./logger.js";

/** A row of the `runs` table. */
export interface RunRecord {
  id: string;
  input_path: string;
  status: string;
  record_count: number;
  created_count: number;
  deleted_count: number;
  tag: string | null;
  build_state: string | null;
  error_kind: string | null;
  error: string | null;
  manual_action: string | null;
  created_at: string;
  updated_at: string;
}

export interface IndexPublisherOptions {
  config: Readonly<Config>;
  storage: StorageBackend;
  db: DatabaseBackend;
  logger?: Logger;
  embeddingProvider?: EmbeddingProvider;
  keywordProvider?: KeywordProvider;
  repository?: ContentRepository;
  buildTrigger?: BuildTrigger;
  /** Transport for every remote HTTP client built from the config. */
  httpAdapter?: AxiosAdapter;
  now?: () => number;
}

export class IndexPublisher {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private log: Logger;
  private pipeline: Pipeline;

  constructor(opts: IndexPublisherOptions) {
    const { config } = opts;
    this.storage = opts.storage;
    this.db = opts.db;
    this.log = opts.logger ?? defaultLogger;

    this.pipeline = new Pipeline({
      config,
      storage: opts.storage,
      logger: this.log,
      now: opts.now,
      embeddingProvider:
        opts.embeddingProvider ?? new AzureEmbeddingProvider(config.embedding),
      keywordProvider:
        opts.keywordProvider ?? new AzureKeywordProvider(config.keywords),
      repository:
        opts.repository ??
        new GitLabClient({ ...config.gitlab, adapter: opts.httpAdapter }),
      buildTrigger:
        opts.buildTrigger ??
        new JenkinsClient({
          ...config.jenkins,
          adapter: opts.httpAdapter,
          now: opts.now,
          logger: this.log,
        }),
      flows: new FlowRunner({
        ...config.flows,
        adapter: opts.httpAdapter,
        logger: this.log,
      }),
    });
  }

  /** Construct from a raw configuration object (validates with Zod). */
  static async fromConfig(
    raw: unknown,
    overrides: Omit<IndexPublisherOptions, "config" | "storage" | "db"> = {},
  ): Promise<IndexPublisher> {
    const { config, storage, db } = parseConfig(raw);
    const publisher = new IndexPublisher({ ...overrides, config, storage, db });
    await publisher.initialize();
    return publisher;
  }

  /** Create the run history tables. Call once after construction. */
  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Run the whole pipeline once over `inputPath`. Rejects with
   * PipelineFailedError when a stage fails; published commits have then
   * been reverted where possible.
   */
  async run(inputPath: string, sink?: ProgressSink): Promise<RunResult> {
    const runId = randomUUID();
    const now = new Date().toISOString();
    await this.db.execute(
      `INSERT INTO runs (id, input_path, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?)`,
      [runId, inputPath, "created", now, now],
    );

    const sinks: ProgressSink[] = [new DatabaseProgressSink(this.db, runId)];
    sinks.push(sink ?? new LoggerProgressSink(this.log));
    const progress = new CompositeProgressSink(sinks);

    await this.updateStatus(runId, "running");
    const outcome = await this.runPipeline(runId, inputPath, progress);
    const { result, failure, rollback } = outcome;

    await this.recordCommits(runId, result.commits, rollback);
    const manual = rollback?.failed.map((f) => f.commitId) ?? [];
    await this.db.execute(
      `UPDATE runs SET status = ?, record_count = ?, created_count = ?, deleted_count = ?, tag = ?, build_state = ?, error_kind = ?, error = ?, manual_action = ?, updated_at = ? WHERE id = ?`,
      [
        failure ? "failed" : "completed",
        result.recordCount,
        result.jsonFilesCreated,
        result.jsonFilesDeleted,
        result.tag?.name ?? null,
        result.buildState,
        failure?.kind ?? null,
        failure?.detail ?? null,
        manual.length > 0 ? JSON.stringify(manual) : null,
        new Date().toISOString(),
        runId,
      ],
    );

    if (failure) {
      throw new PipelineFailedError({
        runId,
        kind: failure.kind,
        detail: failure.detail,
        rollback,
        cause: failure.cause,
      });
    }
    return result;
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    return this.db.queryOne<RunRecord>(`SELECT * FROM runs WHERE id = ?`, [runId]);
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async runPipeline(
    runId: string,
    inputPath: string,
    sink: ProgressSink,
  ): Promise<PipelineOutcome> {
    try {
      return await this.pipeline.run(runId, inputPath, sink);
    } catch (err) {
      await this.updateStatus(runId, "failed");
      throw err;
    } finally {
      await this.cleanup(runId);
    }
  }

  private async cleanup(runId: string): Promise<void> {
    try {
      await this.storage.deletePrefix(stagingPrefixes(runId).root);
    } catch (err) {
      this.log.warn({ runId, err: String(err) }, "staging cleanup failed");
    }
  }

  private async recordCommits(
    runId: string,
    commits: readonly string[],
    rollback: RollbackReport | null,
  ): Promise<void> {
    const reverted = new Set(rollback?.reverted ?? []);
    for (const [seq, commitId] of commits.entries()) {
      await this.db.execute(
        `INSERT INTO run_commits (run_id, seq, commit_id, reverted) VALUES (?, ?, ?, ?)`,
        [runId, seq + 1, commitId, reverted.has(commitId) ? 1 : 0],
      );
    }
  }

  private async updateStatus(runId: string, status: string): Promise<void> {
    await this.db.execute(
      `UPDATE runs SET status = ?, updated_at = ? WHERE id = ?`,
      [status, new Date().toISOString(), runId],
    );
  }
}
