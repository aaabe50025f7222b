/**
 * Embedding enrichment: one vector per artifact, fatal on the first failure.
 */
import { AzureOpenAI } from "openai";

import { EmbeddingFailedException } from "../core/exceptions.js";
import { mapPool } from "../core/pool.js";
import { EMBEDDING_RETRY, withRetry } from "../core/retry.js";
import type { RetryPolicy } from "../core/retry.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ContentArtifact } from "../payload/models.js";
import { isTransientServiceError } from "./errors.js";
import { stripUrlsAndMarkup } from "./text.js";

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export interface AzureServiceOptions {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string;
  timeoutMs: number;
}

export class AzureEmbeddingProvider implements EmbeddingProvider {
  private client: AzureOpenAI;
  private deployment: string;

  constructor(opts: AzureServiceOptions) {
    this.deployment = opts.deployment;
    this.client = new AzureOpenAI({
      endpoint: opts.endpoint,
      apiKey: opts.apiKey,
      apiVersion: opts.apiVersion,
      deployment: opts.deployment,
      timeout: opts.timeoutMs,
      // Retries are owned by the enricher's policy.
      maxRetries: 0,
    });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      input: text,
      model: this.deployment,
    });
    return response.data[0]?.embedding ?? [];
  }
}

export type ProgressCallback = (done: number, total: number) => void | Promise<void>;

export interface EnricherOptions<P> {
  provider: P;
  policy?: RetryPolicy;
  concurrency?: number;
  logger?: Logger;
}

export class EmbeddingEnricher {
  private provider: EmbeddingProvider;
  private policy: RetryPolicy;
  private concurrency: number;
  private log: Logger;

  constructor(opts: EnricherOptions<EmbeddingProvider>) {
    this.provider = opts.provider;
    this.policy = opts.policy ?? EMBEDDING_RETRY;
    this.concurrency = opts.concurrency ?? 4;
    this.log = componentLogger(opts.logger ?? defaultLogger, "embedding");
  }

  /**
   * Returns the artifacts, in input order, each with a non-empty embedding.
   * Throws EmbeddingFailedException naming the first failed artifact.
   */
  async enrich(
    artifacts: readonly ContentArtifact[],
    onProgress?: ProgressCallback,
  ): Promise<ContentArtifact[]> {
    const outcomes = await mapPool(
      artifacts,
      (artifact) => this.embedOne(artifact),
      {
        width: this.concurrency,
        stopOnError: true,
        onSettled: onProgress,
      },
    );

    // Outcomes are in submission order; the first rejection by token decides
    // the reported artifact. Skipped items always follow it.
    const failed = outcomes.find((o) => o.status === "rejected");
    if (failed && failed.status === "rejected") {
      const reason = failed.reason;
      if (reason instanceof EmbeddingFailedException) throw reason;
      throw new EmbeddingFailedException(failed.item.id, String(reason));
    }

    return outcomes.map((outcome) => {
      if (outcome.status !== "fulfilled") {
        throw new EmbeddingFailedException(outcome.item.id, "not processed");
      }
      return { ...outcome.item, embedding: outcome.value };
    });
  }

  private async embedOne(artifact: ContentArtifact): Promise<number[]> {
    const text = stripUrlsAndMarkup(artifact.content);
    try {
      return await withRetry(
        this.policy,
        async () => {
          const vector = await this.provider.embed(text);
          if (vector.length === 0) {
            throw new EmbeddingFailedException(artifact.id, "service returned an empty vector");
          }
          return vector;
        },
        {
          isRetryable: isTransientServiceError,
          onRetry: (attempt, err) =>
            this.log.warn({ artifactId: artifact.id, attempt, err: String(err) }, "embedding retry"),
        },
      );
    } catch (err) {
      this.log.error({ artifactId: artifact.id, err: String(err) }, "embedding failed");
      if (err instanceof EmbeddingFailedException) throw err;
      throw new EmbeddingFailedException(artifact.id, err instanceof Error ? err.message : String(err));
    }
  }
}
