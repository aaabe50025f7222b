/**
 * Orchestrator: runs the stages in order, turns each stage's failure into a
 * FatalError, and reverts published commits when a later stage fails.
 */
import { join } from "node:path";

import type { Config } from "../config.js";
import type { BuildTrigger, DeployParams } from "../deploy/jenkins.js";
import { buildFlowPayload } from "../deploy/flows.js";
import type { FlowRunner } from "../deploy/flows.js";
import type { EmbeddingProvider } from "../enrich/embedding.js";
import { EmbeddingEnricher } from "../enrich/embedding.js";
import type { KeywordEnrichment, KeywordProvider } from "../enrich/keywords.js";
import { KeywordEnricher } from "../enrich/keywords.js";
import { componentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { RecordBuilder } from "../payload/builders.js";
import { artifactPath, parseArtifact } from "../payload/models.js";
import type { ContentArtifact } from "../payload/models.js";
import { ArtifactWriter } from "../payload/writer.js";
import { PublicationBatcher, RollbackLedger } from "../publish/batcher.js";
import type { CommitAction, ContentRepository } from "../publish/gitlab.js";
import { RollbackCoordinator } from "../publish/rollback.js";
import { ReleaseTagger } from "../publish/tagger.js";
import { assignIdentifiers, writeManifest } from "../reconcile/identifiers.js";
import { RecordReconciler } from "../reconcile/reconciler.js";
import { stageInput } from "../sources/intake.js";
import { getSourceReader } from "../sources/registry.js";
import type { StorageBackend } from "../storage/backend.js";
import { POST_PUBLICATION_KINDS, describeError, guard } from "./result.js";
import type { FatalError, FatalErrorKind, StageResult } from "./result.js";
import type {
  IdentifiedRow,
  ProgressSink,
  Reconciliation,
  RollbackReport,
  RunResult,
  TabularSource,
} from "./types.js";

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export interface StepInfo {
  name: string;
  /** Overall percent when the step starts. */
  start: number;
  /** Overall percent when the step ends. */
  end: number;
}

export const STEPS = [
  { name: "read", start: 0, end: 5 },
  { name: "reconcile", start: 5, end: 10 },
  { name: "identify", start: 10, end: 15 },
  { name: "build", start: 15, end: 20 },
  { name: "embedding", start: 20, end: 50 },
  { name: "keywords", start: 50, end: 75 },
  { name: "write", start: 75, end: 80 },
  { name: "publish", start: 80, end: 88 },
  { name: "tag", start: 88, end: 90 },
  { name: "deploy", start: 90, end: 98 },
  { name: "flows", start: 98, end: 100 },
] as const satisfies readonly StepInfo[];

export type StepName = (typeof STEPS)[number]["name"];

const STEP_OF_KIND: Record<FatalErrorKind, StepName> = {
  validation: "reconcile",
  embedding: "embedding",
  write: "write",
  publish: "publish",
  tag: "tag",
  deploy: "deploy",
};

function stepIndex(name: StepName): number {
  return STEPS.findIndex((s) => s.name === name);
}

function stepInfo(name: StepName): StepInfo {
  return STEPS[stepIndex(name)] ?? { name, start: 0, end: 100 };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface PipelineDeps {
  config: Readonly<Config>;
  storage: StorageBackend;
  embeddingProvider: EmbeddingProvider;
  keywordProvider: KeywordProvider;
  repository: ContentRepository;
  buildTrigger: BuildTrigger;
  flows: FlowRunner;
  logger: Logger;
  /** Milliseconds clock used for ETAs and tag dates. */
  now?: () => number;
}

/** Kind a stray error is reported as; advanced as the run moves through stages. */
interface StageCursor {
  kind: FatalErrorKind;
}

export interface PipelineOutcome {
  result: RunResult;
  failure: FatalError | null;
  rollback: RollbackReport | null;
}

/** Staging layout of one run. */
export function stagingPrefixes(runId: string): {
  root: string;
  input: string;
  artifacts: string;
} {
  return {
    root: `${runId}/`,
    input: `${runId}/input/`,
    artifacts: `${runId}/artifacts/`,
  };
}

export class Pipeline {
  private deps: PipelineDeps;
  private log: Logger;
  private now: () => number;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
    this.log = componentLogger(deps.logger, "pipeline");
    this.now = deps.now ?? Date.now;
  }

  async run(runId: string, inputPath: string, sink: ProgressSink): Promise<PipelineOutcome> {
    const result: RunResult = {
      runId,
      recordCount: 0,
      jsonFilesCreated: 0,
      jsonFilesDeleted: 0,
      keywordFailures: 0,
      commits: [],
      tag: null,
      buildState: null,
      flows: [],
      manifestPath: null,
    };
    const ledger = new RollbackLedger();
    const cursor: StageCursor = { kind: "validation" };

    let failure: FatalError | null;
    try {
      failure = await this.execute(runId, inputPath, sink, result, ledger, cursor);
    } catch (err) {
      failure = { kind: cursor.kind, detail: describeError(err), cause: err };
    }
    result.commits = [...ledger.commits];
    if (!failure) {
      return { result, failure: null, rollback: null };
    }

    const step = STEP_OF_KIND[failure.kind];
    const detail = failure.detail;
    this.log.error({ runId, kind: failure.kind, detail }, "run failed");
    await this.report(() => sink.logError(step, detail, stepInfo(step).start));

    let rollback: RollbackReport | null = null;
    if (POST_PUBLICATION_KINDS.has(failure.kind) && ledger.size > 0) {
      rollback = await this.rollback(ledger, sink);
    }
    return { result, failure, rollback };
  }

  // ------------------------------------------------------------------
  // Stages
  // ------------------------------------------------------------------

  private async execute(
    runId: string,
    inputPath: string,
    sink: ProgressSink,
    result: RunResult,
    ledger: RollbackLedger,
    cursor: StageCursor,
  ): Promise<FatalError | null> {
    const { config } = this.deps;
    const prefixes = stagingPrefixes(runId);

    // 1. Read and reconcile
    await this.begin(sink, "read", `Reading ${inputPath}`);
    const reconciled = await guard("validation", () => this.readAndReconcile(inputPath, prefixes.input));
    if (!reconciled.ok) return reconciled.error;
    const { newRows, supersededIds, duplicateCount } = reconciled.value;
    await this.finish(sink, "read", `${newRows.length + supersededIds.length} rows read`);
    await sink.updateStats({ recordCount: newRows.length });
    await this.finish(
      sink,
      "reconcile",
      `${newRows.length} new rows, ${supersededIds.length} superseded`,
    );
    if (duplicateCount > 0) {
      await sink.logWarning("reconcile", `${duplicateCount} duplicate rows found`, stepInfo("reconcile").end);
    }
    result.recordCount = newRows.length;

    // 2. Identifiers and manifest
    const identified = assignIdentifiers(newRows, supersededIds);
    if (config.manifest.enabled && identified.length > 0) {
      const path = join(config.manifest.dir, `indexed-records-${runId}.xlsx`);
      try {
        await writeManifest(identified, path);
        result.manifestPath = path;
      } catch (err) {
        await sink.logWarning("identify", `Manifest not written: ${describeError(err)}`, stepInfo("identify").end);
      }
    }
    await this.finish(sink, "identify", `${identified.length} identifiers assigned`);

    // 3. Build
    const built = await guard("validation", async () => new RecordBuilder().buildAll(identified));
    if (!built.ok) return built.error;
    await this.finish(sink, "build", `${built.value.length} artifacts built`);

    // 4. Embeddings
    cursor.kind = "embedding";
    const embedded = await this.embed(built.value, sink);
    if (!embedded.ok) return embedded.error;

    // 5. Keywords
    const keywords = await this.extractKeywords(embedded.value, sink);
    result.keywordFailures = keywords.failedIds.length;

    // 6. Write
    cursor.kind = "write";
    const writer = new ArtifactWriter(this.deps.storage);
    const written = await guard("write", () => writer.writeAll(keywords.artifacts, prefixes.artifacts));
    if (!written.ok) return written.error;
    result.jsonFilesCreated = written.value.length;
    await sink.updateStats({ createdCount: written.value.length });
    await this.finish(sink, "write", `${written.value.length} files written`);

    // 7. Publish
    const actions = await guard("write", () => this.collectActions(written.value, supersededIds));
    if (!actions.ok) return actions.error;
    if (actions.value.length === 0) {
      await sink.logInfo("publish", "Nothing to publish", 100);
      return null;
    }
    await this.begin(sink, "publish", `Publishing ${actions.value.length} changes`);
    cursor.kind = "publish";
    const batcher = new PublicationBatcher({
      repository: this.deps.repository,
      batchSize: config.gitlab.batchSize,
      commitMessage: config.gitlab.commitMessage,
      logger: this.deps.logger,
    });
    const published = await guard("publish", async () => {
      const commits = await batcher.publish(actions.value, ledger, (done, total) =>
        sink.updateStep("publish", stepIndex("publish"), Math.round((done / total) * 100), null),
      );
      result.jsonFilesDeleted = supersededIds.length;
      await sink.updateStats({ deletedCount: supersededIds.length });
      await this.finish(sink, "publish", `${commits.length} commits created`);
      return commits;
    });
    if (!published.ok) return published.error;

    // 8. Tag
    const tagger = new ReleaseTagger({
      repository: this.deps.repository,
      tagMessage: config.gitlab.tagMessage,
      initialTag: config.gitlab.initialTag,
      timeZone: config.gitlab.timeZone,
      now: () => new Date(this.now()),
      logger: this.deps.logger,
    });
    const ref = ledger.last;
    cursor.kind = "tag";
    const tagged = await guard("tag", async () => {
      if (ref === null) throw new Error("no commit to tag");
      const tag = await tagger.tag(ref);
      result.tag = tag;
      await this.finish(sink, "tag", `Tag ${tag.name} created`);
      return tag;
    });
    if (!tagged.ok) return tagged.error;

    // 9. Deploy
    const params: DeployParams = {
      ...config.jenkins.params,
      newTag: tagged.value.name,
      oldTag: tagged.value.previous ?? "",
    };
    cursor.kind = "deploy";
    const deployed = await guard("deploy", async () => {
      await this.begin(sink, "deploy", `Triggering build for ${params.newTag}`);
      const state = await this.deps.buildTrigger.deploy(params, async (s) => {
        result.buildState = s;
        await sink.logInfo("deploy", `Build ${s}`, stepInfo("deploy").start);
      });
      result.buildState = state;
      await this.finish(sink, "deploy", `Build ended ${state}`);
      return state;
    });
    if (!deployed.ok) return deployed.error;

    // 10. Flows
    if (this.deps.flows.configured) {
      result.flows = await this.deps.flows.run(buildFlowPayload(tagged.value, params));
      const failedFlow = result.flows.find((f) => f.status !== 200);
      if (failedFlow) {
        await sink.logWarning("flows", `Flow ${failedFlow.url} answered ${failedFlow.status}`, 100);
      } else {
        await this.finish(sink, "flows", `${result.flows.length} flows completed`);
      }
    }

    return null;
  }

  private async readAndReconcile(inputPath: string, prefix: string): Promise<Reconciliation> {
    const { storage, config } = this.deps;
    const keys = await stageInput(inputPath, storage, prefix);
    const sources: TabularSource[] = [];
    for (const key of keys) {
      const reader = getSourceReader(key, { sheetName: config.input.sheetName });
      sources.push(await reader.read(key, storage));
    }
    return new RecordReconciler(config.input.requiredColumns).reconcile(sources);
  }

  private async embed(
    artifacts: ContentArtifact[],
    sink: ProgressSink,
  ): Promise<StageResult<ContentArtifact[]>> {
    const { config } = this.deps;
    await this.begin(sink, "embedding", `Embedding ${artifacts.length} artifacts`);
    const enricher = new EmbeddingEnricher({
      provider: this.deps.embeddingProvider,
      policy: config.embedding.retry,
      concurrency: config.embedding.concurrency,
      logger: this.deps.logger,
    });
    const enriched = await guard("embedding", () =>
      enricher.enrich(artifacts, this.progress(sink, "embedding")),
    );
    if (enriched.ok) {
      await this.finish(sink, "embedding", `${enriched.value.length} embeddings obtained`);
    }
    return enriched;
  }

  private async extractKeywords(
    artifacts: ContentArtifact[],
    sink: ProgressSink,
  ): Promise<KeywordEnrichment> {
    const { config } = this.deps;
    await this.begin(sink, "keywords", `Extracting keywords for ${artifacts.length} artifacts`);
    const enricher = new KeywordEnricher({
      provider: this.deps.keywordProvider,
      policy: config.keywords.retry,
      concurrency: config.keywords.concurrency,
      logger: this.deps.logger,
    });
    const outcome = await enricher.enrich(artifacts, this.progress(sink, "keywords"));
    for (const id of outcome.failedIds) {
      await sink.logWarning("keywords", `No keywords for ${id}`, stepInfo("keywords").end);
    }
    await this.finish(
      sink,
      "keywords",
      `${artifacts.length - outcome.failedIds.length}/${artifacts.length} keyword lists obtained`,
    );
    return outcome;
  }

  /** Creates in artifact order, then deletes. */
  private async collectActions(
    written: readonly { id: string; key: string }[],
    supersededIds: readonly string[],
  ): Promise<CommitAction[]> {
    const { storage, config } = this.deps;
    const decoder = new TextDecoder();
    const actions: CommitAction[] = [];
    for (const { id, key } of written) {
      const content = decoder.decode(await storage.read(key));
      if (parseArtifact(content).id !== id) {
        throw new Error(`staged file ${key} does not hold artifact ${id}`);
      }
      actions.push({
        action: "create",
        filePath: artifactPath(config.gitlab.targetDir, id),
        content,
      });
    }
    for (const id of supersededIds) {
      actions.push({ action: "delete", filePath: artifactPath(config.gitlab.targetDir, id) });
    }
    return actions;
  }

  private async rollback(ledger: RollbackLedger, sink: ProgressSink): Promise<RollbackReport> {
    await this.report(() => sink.logWarning("rollback", `Reverting ${ledger.size} commits`, 100));
    const report = await new RollbackCoordinator(this.deps.repository, this.deps.logger).rollback(
      ledger.commits,
    );
    if (report.failed.length > 0) {
      const ids = report.failed.map((f) => f.commitId).join(", ");
      await this.report(() =>
        sink.logError("rollback", `Manual action required: could not revert ${ids}`, 100),
      );
    } else {
      await this.report(() =>
        sink.logInfo("rollback", `${report.reverted.length} commits reverted`, 100),
      );
    }
    return report;
  }

  /** Progress on the failure path; a failing sink must not stop the rollback. */
  private async report(send: () => void | Promise<void>): Promise<void> {
    try {
      await send();
    } catch (err) {
      this.log.warn({ err: describeError(err) }, "progress sink failed while reporting a failure");
    }
  }

  // ------------------------------------------------------------------
  // Progress helpers
  // ------------------------------------------------------------------

  private async begin(sink: ProgressSink, step: StepName, message: string): Promise<void> {
    await sink.updateStep(step, stepIndex(step), 0, null);
    await sink.logInfo(step, message, stepInfo(step).start);
  }

  private async finish(sink: ProgressSink, step: StepName, message: string): Promise<void> {
    await sink.updateStep(step, stepIndex(step), 100, 0);
    await sink.logInfo(step, message, stepInfo(step).end);
  }

  /** Per-item progress with a linear ETA. */
  private progress(
    sink: ProgressSink,
    step: StepName,
  ): (done: number, total: number) => Promise<void> {
    const started = this.now();
    return async (done: number, total: number): Promise<void> => {
      const elapsed = (this.now() - started) / 1000;
      const eta = done > 0 ? Math.round((elapsed / done) * (total - done)) : null;
      await sink.updateStep(step, stepIndex(step), Math.round((done / total) * 100), eta);
    };
  }
}
