/**
 * Post-deploy webhook flows. Invoked in order after a passing build; the chain
 * stops at the first answer other than 200. Never throws.
 */
import type { AxiosAdapter, AxiosInstance } from "axios";

import type { FlowResult, ReleaseTag } from "../core/types.js";
import { createHttpClient, describeHttpError } from "../http.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { parseTag } from "../publish/tagger.js";
import type { DeployParams } from "./jenkins.js";

export const MAX_FLOWS = 3;

export interface FlowPayload {
  newTag: string;
  oldTag: string;
  newTagDate: string;
  oldTagDate: string;
  gitUser: string;
  gitToken: string;
  workEnv: string;
  indexNameShort: string;
}

export function buildFlowPayload(tag: ReleaseTag, params: DeployParams): FlowPayload {
  const previous = tag.previous ? parseTag(tag.previous) : null;
  return {
    newTag: parseTag(tag.name)?.sequence ?? "",
    oldTag: previous?.sequence ?? "",
    newTagDate: tag.date,
    oldTagDate: previous?.date ?? "",
    gitUser: params.gitUser,
    gitToken: params.gitToken,
    workEnv: params.workEnv,
    indexNameShort: params.indexNameShort,
  };
}

export interface FlowRunnerOptions {
  urls: readonly string[];
  sendJson: boolean;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export class FlowRunner {
  private urls: string[];
  private sendJson: boolean;
  private http: AxiosInstance;
  private log: Logger;

  constructor(opts: FlowRunnerOptions) {
    this.urls = opts.urls.filter((u) => u.trim() !== "").slice(0, MAX_FLOWS);
    this.sendJson = opts.sendJson;
    this.http = createHttpClient({ timeoutMs: opts.timeoutMs, adapter: opts.adapter });
    this.log = componentLogger(opts.logger ?? defaultLogger, "flows");
  }

  get configured(): boolean {
    return this.urls.length > 0;
  }

  async run(payload: FlowPayload): Promise<FlowResult[]> {
    const results: FlowResult[] = [];
    for (const url of this.urls) {
      const result = await this.post(url, payload);
      results.push(result);
      if (result.status !== 200) {
        this.log.warn({ url, status: result.status }, "flow did not answer 200; stopping chain");
        break;
      }
      this.log.info({ url }, "flow completed");
    }
    return results;
  }

  private async post(url: string, payload: FlowPayload): Promise<FlowResult> {
    const body = this.sendJson
      ? JSON.stringify(payload)
      : new URLSearchParams({ ...payload }).toString();
    const contentType = this.sendJson
      ? "application/json"
      : "application/x-www-form-urlencoded";
    try {
      const res = await this.http.post(url, body, {
        headers: { "Content-Type": contentType },
        validateStatus: () => true,
        responseType: "text",
      });
      return {
        url,
        status: res.status,
        detail: typeof res.data === "string" ? res.data : JSON.stringify(res.data),
      };
    } catch (err) {
      // No answer at all; reported with status 0.
      return { url, status: 0, detail: describeHttpError(err) };
    }
  }
}
