/**
 * Best-effort revert of the commits a failed run published.
 */
import type { RollbackReport } from "../core/types.js";
import { describeHttpError } from "../http.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ContentRepository } from "./gitlab.js";

export class RollbackCoordinator {
  private repository: ContentRepository;
  private log: Logger;

  constructor(repository: ContentRepository, logger?: Logger) {
    this.repository = repository;
    this.log = componentLogger(logger ?? defaultLogger, "rollback");
  }

  /** Revert newest-first. Never throws; failures are reported. */
  async rollback(commits: readonly string[]): Promise<RollbackReport> {
    const report: RollbackReport = { reverted: [], failed: [] };
    for (const commitId of [...commits].reverse()) {
      try {
        await this.repository.revert(commitId);
        report.reverted.push(commitId);
        this.log.info({ commitId }, "commit reverted");
      } catch (err) {
        const reason = describeHttpError(err);
        report.failed.push({ commitId, reason });
        this.log.error({ commitId, reason }, "revert failed; manual action required");
      }
    }
    return report;
  }
}
