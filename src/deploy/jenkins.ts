/**
 * Build trigger and poller (Jenkins remote API).
 *
 * queued → running → success | unstable | failed | aborted
 */
import { setTimeout as delay } from "node:timers/promises";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";

import { DeployFailedException, DeployTimeoutException } from "../core/exceptions.js";
import type { BuildState } from "../core/types.js";
import { createHttpClient, describeHttpError } from "../http.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export interface DeployParams {
  newTag: string;
  oldTag: string;
  gitUser: string;
  gitToken: string;
  workEnv: string;
  indexNameShort: string;
}

export interface JenkinsClientOptions {
  baseUrl: string;
  /** Job path below the base, e.g. `job/folder/job/name`. */
  job: string;
  user: string;
  apiToken: string;
  jobToken?: string;
  pollIntervalMs: number;
  queueTimeoutMs: number;
  buildTimeoutMs: number;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface BuildTrigger {
  deploy(
    params: DeployParams,
    onState?: (state: BuildState) => void | Promise<void>,
  ): Promise<BuildState>;
}

const QueueItemSchema = z.object({
  cancelled: z.boolean().nullish(),
  executable: z.object({ url: z.string().nullish() }).nullish(),
});

const BuildSchema = z.object({
  result: z.string().nullish(),
});

export function toBuildState(result: string): BuildState {
  switch (result) {
    case "SUCCESS":
      return "success";
    case "UNSTABLE":
      return "unstable";
    case "ABORTED":
      return "aborted";
    default:
      return "failed";
  }
}

export function isPassing(state: BuildState): boolean {
  return state === "success" || state === "unstable";
}

function apiUrl(url: string): string {
  return `${url.replace(/\/+$/, "")}/api/json`;
}

export class JenkinsClient implements BuildTrigger {
  private http: AxiosInstance;
  private opts: JenkinsClientOptions;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;
  private log: Logger;

  constructor(opts: JenkinsClientOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.log = componentLogger(opts.logger ?? defaultLogger, "deploy");
    this.http = createHttpClient({
      timeoutMs: opts.timeoutMs,
      auth: { username: opts.user, password: opts.apiToken },
      adapter: opts.adapter,
    });
  }

  /** Queue a parameterized build and return the queue item URL. */
  async trigger(params: DeployParams): Promise<string> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, "")}/${this.opts.job.replace(/^\/+|\/+$/g, "")}/buildWithParameters`;
    const query: Record<string, string> = {
      NEW_TAG: params.newTag,
      OLD_TAG: params.oldTag,
      GIT_USER: params.gitUser,
      GIT_TOKEN: params.gitToken,
      WORK_ENV: params.workEnv,
      INDEX_NAME_SHORT: params.indexNameShort,
    };
    if (this.opts.jobToken) query.token = this.opts.jobToken;

    let location: unknown;
    try {
      const res = await this.http.post(url, null, {
        params: query,
        maxRedirects: 0,
        validateStatus: (status) => status >= 200 && status < 400,
      });
      location = res.headers["location"];
    } catch (err) {
      throw new DeployFailedException(`trigger failed: ${describeHttpError(err)}`);
    }

    if (typeof location !== "string" || location === "") {
      throw new DeployFailedException("trigger response has no Location header");
    }
    this.log.info({ queue: location, newTag: params.newTag }, "build queued");
    return location;
  }

  /** Poll the queue item until it has a build URL. */
  async waitForBuild(queueUrl: string): Promise<string> {
    const deadline = this.now() + this.opts.queueTimeoutMs;
    while (this.now() < deadline) {
      const item = QueueItemSchema.parse(await this.get(apiUrl(queueUrl)));
      if (item.cancelled) throw new DeployFailedException("queue item was cancelled");
      const buildUrl = item.executable?.url;
      if (buildUrl) {
        this.log.info({ build: buildUrl }, "build started");
        return buildUrl;
      }
      await this.sleep(this.opts.pollIntervalMs);
    }
    throw new DeployTimeoutException("queue", this.opts.queueTimeoutMs);
  }

  /** Poll the build until it reports a result. */
  async waitForResult(buildUrl: string): Promise<BuildState> {
    const deadline = this.now() + this.opts.buildTimeoutMs;
    while (this.now() < deadline) {
      const build = BuildSchema.parse(await this.get(apiUrl(buildUrl)));
      if (build.result) {
        this.log.info({ build: buildUrl, result: build.result }, "build finished");
        return toBuildState(build.result);
      }
      await this.sleep(this.opts.pollIntervalMs);
    }
    throw new DeployTimeoutException("build", this.opts.buildTimeoutMs);
  }

  /** Trigger and follow one build. Throws unless it ends success or unstable. */
  async deploy(
    params: DeployParams,
    onState?: (state: BuildState) => void | Promise<void>,
  ): Promise<BuildState> {
    const queueUrl = await this.trigger(params);
    await onState?.("queued");
    const buildUrl = await this.waitForBuild(queueUrl);
    await onState?.("running");
    const state = await this.waitForResult(buildUrl);
    await onState?.(state);
    if (!isPassing(state)) {
      throw new DeployFailedException(`build ended ${state}`);
    }
    return state;
  }

  private async get(url: string): Promise<unknown> {
    try {
      const res = await this.http.get(url);
      return res.data;
    } catch (err) {
      throw new DeployFailedException(`poll of ${url} failed: ${describeHttpError(err)}`);
    }
  }
}
