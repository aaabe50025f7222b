/**
 * Custom exceptions for pipeline operations.
 */
import type { RollbackReport } from "./types.js";
import type { FatalErrorKind } from "./result.js";

export class SourceReadFailedException extends Error {
  source: string;

  constructor(source: string, message?: string) {
    super(
      message
        ? `Reading source failed (${source}): ${message}`
        : `Reading source failed (${source})`,
    );
    this.name = "SourceReadFailedException";
    this.source = source;
  }
}

export class ValidationFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Validation failed: ${message}` : "Validation failed");
    this.name = "ValidationFailedException";
  }
}

export class RecordBuildFailedException extends Error {
  position: number;
  column: string;

  constructor(position: number, column: string, message: string) {
    super(`Record ${position} column ${column}: ${message}`);
    this.name = "RecordBuildFailedException";
    this.position = position;
    this.column = column;
  }
}

export class EmbeddingFailedException extends Error {
  artifactId: string;

  constructor(artifactId: string, message?: string) {
    super(
      message
        ? `Embedding failed for ${artifactId}: ${message}`
        : `Embedding failed for ${artifactId}`,
    );
    this.name = "EmbeddingFailedException";
    this.artifactId = artifactId;
  }
}

export class KeywordParseException extends Error {
  constructor(message?: string) {
    super(
      message
        ? `Keyword reply is not a JSON array of strings: ${message}`
        : "Keyword reply is not a JSON array of strings",
    );
    this.name = "KeywordParseException";
  }
}

export class IncompleteArtifactException extends Error {
  artifactId: string;

  constructor(artifactId: string) {
    super(`Artifact ${artifactId} has no embedding`);
    this.name = "IncompleteArtifactException";
    this.artifactId = artifactId;
  }
}

export class PublicationFailedException extends Error {
  batch: number;

  constructor(batch: number, message?: string) {
    super(
      message
        ? `Publishing batch ${batch} failed: ${message}`
        : `Publishing batch ${batch} failed`,
    );
    this.name = "PublicationFailedException";
    this.batch = batch;
  }
}

export class TagSequenceExhaustedException extends Error {
  lastTag: string;

  constructor(lastTag: string) {
    super(`Release tag sequence exhausted after ${lastTag}`);
    this.name = "TagSequenceExhaustedException";
    this.lastTag = lastTag;
  }
}

export class DeployFailedException extends Error {
  constructor(message: string) {
    super(`Deploy failed: ${message}`);
    this.name = "DeployFailedException";
  }
}

export class DeployTimeoutException extends DeployFailedException {
  constructor(phase: "queue" | "build", waitedMs: number) {
    super(`${phase} did not finish within ${waitedMs}ms`);
    this.name = "DeployTimeoutException";
  }
}

/** Thrown by IndexPublisher.run() when a stage ends the run. */
export class PipelineFailedError extends Error {
  runId: string;
  kind: FatalErrorKind;
  detail: string;
  rollback: RollbackReport | null;

  constructor(opts: {
    runId: string;
    kind: FatalErrorKind;
    detail: string;
    rollback: RollbackReport | null;
    cause?: unknown;
  }) {
    super(`Pipeline failed at ${opts.kind}: ${opts.detail}`, {
      cause: opts.cause,
    });
    this.name = "PipelineFailedError";
    this.runId = opts.runId;
    this.kind = opts.kind;
    this.detail = opts.detail;
    this.rollback = opts.rollback;
  }

  /** Commits that could not be reverted and need a human. */
  get manualActionRequired(): string[] {
    return this.rollback?.failed.map((f) => f.commitId) ?? [];
  }
}
