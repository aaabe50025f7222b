/**
 * Splits the run's changes into bounded commits and records each commit id.
 */
import { PublicationFailedException } from "../core/exceptions.js";
import { describeHttpError } from "../http.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { CommitAction, ContentRepository } from "./gitlab.js";

/** Ordered commit ids created by this run. Appended only by the batcher. */
export class RollbackLedger {
  private ids: string[] = [];

  record(commitId: string): void {
    this.ids.push(commitId);
  }

  get commits(): readonly string[] {
    return [...this.ids];
  }

  get last(): string | null {
    return this.ids.length > 0 ? (this.ids[this.ids.length - 1] ?? null) : null;
  }

  get size(): number {
    return this.ids.length;
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`batch size must be a positive integer, got ${size}`);
  }
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export interface PublicationBatcherOptions {
  repository: ContentRepository;
  batchSize: number;
  commitMessage: string;
  logger?: Logger;
}

export class PublicationBatcher {
  private repository: ContentRepository;
  private batchSize: number;
  private commitMessage: string;
  private log: Logger;

  constructor(opts: PublicationBatcherOptions) {
    this.repository = opts.repository;
    this.batchSize = opts.batchSize;
    this.commitMessage = opts.commitMessage;
    this.log = componentLogger(opts.logger ?? defaultLogger, "publish");
  }

  /**
   * Commit `actions` in order, at most `batchSize` per commit. Each commit id
   * lands in `ledger` before the next batch is sent.
   */
  async publish(
    actions: readonly CommitAction[],
    ledger: RollbackLedger,
    onBatch?: (done: number, total: number) => void | Promise<void>,
  ): Promise<string[]> {
    const batches = chunk(actions, this.batchSize);
    const created: string[] = [];

    for (const [i, batch] of batches.entries()) {
      const k = i + 1;
      const message = `${this.commitMessage} (${k}/${batches.length})`;
      let commitId: string;
      try {
        commitId = await this.repository.commit(batch, message);
      } catch (err) {
        throw new PublicationFailedException(k, describeHttpError(err));
      }
      ledger.record(commitId);
      created.push(commitId);
      this.log.info({ batch: k, of: batches.length, actions: batch.length, commitId }, "batch committed");
      await onBatch?.(k, batches.length);
    }

    return created;
  }
}
