/**
 * Shared test fixtures: workbook and zip builders, in-process HTTP stand-in,
 * fake AI providers and a pre-configured publisher.
 */
import { AxiosError, AxiosHeaders } from "axios";
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import ExcelJS from "exceljs";
import { strToU8, zipSync } from "fflate";
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

import { loadConfig } from "../src/config.js";
import type { RawConfig } from "../src/config.js";
import type { CellValue, ProgressSink, StatsUpdate } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import type { EmbeddingProvider } from "../src/enrich/embedding.js";
import type { KeywordProvider } from "../src/enrich/keywords.js";
import { IndexPublisher } from "../src/index.js";
import { createLogger } from "../src/logger.js";
import { DiskStorage } from "../src/storage/disk.js";

export const silentLogger = createLogger("silent");

// ---------------------------------------------------------------------------
// Input rows
// ---------------------------------------------------------------------------

export const COLUMNS = [
  "rag_id",
  "thread_id",
  "group_id",
  "update_timestamp",
  "content",
  "content_en",
  "content_embedding",
  "category_id_large",
  "category_id_medium",
  "category_id_small",
  "effective_start_date",
  "effective_end_date",
];

export function sampleRow(overrides: Record<string, CellValue> = {}): Record<string, CellValue> {
  return {
    rag_id: null,
    thread_id: "t-1",
    group_id: "g-1",
    update_timestamp: 20240105,
    content: "How do I reset my password?",
    content_en: null,
    content_embedding: null,
    category_id_large: 1,
    category_id_medium: "2.0",
    category_id_small: "-",
    effective_start_date: 20240101,
    effective_end_date: 20991231,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// File builders
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "index-publisher-test-"));
}

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] = typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}

export async function buildWorkbook(
  rows: Record<string, CellValue>[],
  opts: { sheetName?: string; columns?: string[] } = {},
): Promise<Uint8Array> {
  const columns = opts.columns ?? COLUMNS;
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(opts.sheetName ?? "rag");
  sheet.addRow(columns);
  for (const row of rows) {
    sheet.addRow(columns.map((c) => row[c] ?? null));
  }
  const buffer = await workbook.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

// ---------------------------------------------------------------------------
// In-process HTTP stand-in
// ---------------------------------------------------------------------------

export interface FakeRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
  headers: Record<string, string>;
  auth: { username: string; password: string } | null;
}

export interface FakeResponse {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

type Handler = (req: FakeRequest, match: RegExpExecArray) => FakeResponse;

function fullUrl(config: InternalAxiosRequestConfig): string {
  const url = config.url ?? "";
  if (/^[a-z][a-z\d+\-.]*:\/\//i.test(url) || !config.baseURL) return url;
  return `${config.baseURL.replace(/\/+$/, "")}/${url.replace(/^\/+/, "")}`;
}

function parseBody(data: unknown): unknown {
  if (typeof data !== "string" || data === "") return data ?? null;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

function plainHeaders(config: InternalAxiosRequestConfig): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(AxiosHeaders.from(config.headers).toJSON())) {
    if (typeof v === "string") out[k.toLowerCase()] = v;
  }
  return out;
}

/** Routes requests made through an axios adapter to registered handlers. */
export class FakeHttp {
  requests: FakeRequest[] = [];
  private routes: { method: string; pattern: RegExp; handler: Handler }[] = [];

  on(method: string, pattern: string | RegExp, handler: Handler | FakeResponse): this {
    const regex =
      typeof pattern === "string"
        ? new RegExp(`^${pattern.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}$`)
        : pattern;
    this.routes.unshift({
      method: method.toUpperCase(),
      pattern: regex,
      handler: typeof handler === "function" ? handler : () => handler,
    });
    return this;
  }

  requestsTo(method: string, pattern: RegExp): FakeRequest[] {
    return this.requests.filter((r) => r.method === method && pattern.test(r.url));
  }

  adapter: AxiosAdapter = async (config) => {
    const req: FakeRequest = {
      method: (config.method ?? "get").toUpperCase(),
      url: fullUrl(config),
      params: { ...(config.params ?? {}) },
      body: parseBody(config.data),
      headers: plainHeaders(config),
      auth: config.auth ?? null,
    };
    this.requests.push(req);

    let res: FakeResponse = { status: 404, data: { message: "404 Not Found" } };
    for (const route of this.routes) {
      const match = route.method === req.method ? route.pattern.exec(req.url) : null;
      if (match) {
        res = route.handler(req, match);
        break;
      }
    }

    const headers: Record<string, string> = {};
    for (const [k, v] of Object.entries(res.headers ?? {})) headers[k.toLowerCase()] = v;
    const response: AxiosResponse = {
      data: res.data ?? "",
      status: res.status,
      statusText: String(res.status),
      headers,
      config,
      request: {},
    };
    if (!config.validateStatus || config.validateStatus(res.status)) return response;
    throw new AxiosError(
      `Request failed with status code ${res.status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      {},
      response,
    );
  };
}

// ---------------------------------------------------------------------------
// Remote systems on top of FakeHttp
// ---------------------------------------------------------------------------

export const GITLAB_BASE = "https://gitlab.test/api/v4";
export const PROJECT_PATH = "/projects/group%2Fcontent";
export const JENKINS_BASE = "https://jenkins.test";
export const QUEUE_URL = "https://jenkins.test/queue/item/7/";
export const BUILD_URL = "https://jenkins.test/job/index/12/";

export interface RecordedCommit {
  id: string;
  message: string;
  actions: { action: string; file_path: string; content?: string }[];
}

/** Stateful content repository and build server behind a FakeHttp. */
export class FakeRemote {
  http = new FakeHttp();
  commits: RecordedCommit[] = [];
  tags: string[] = [];
  tagRefs = new Map<string, string>();
  reverted: string[] = [];
  /** 1-based commit call that answers 500. */
  failCommitAt: number | null = null;
  failTag = false;
  failRevert = new Set<string>();
  buildResult: string = "SUCCESS";
  private commitCalls = 0;

  constructor() {
    const project = `${GITLAB_BASE}${PROJECT_PATH}`;
    this.http
      .on("POST", `${project}/repository/commits`, (req) => {
        this.commitCalls++;
        if (this.commitCalls === this.failCommitAt) {
          return { status: 500, data: { message: "500 Internal Server Error" } };
        }
        const body = CommitBodySchema.parse(req.body);
        const id = `c${this.commitCalls}`;
        this.commits.push({ id, message: body.commit_message, actions: body.actions });
        return { status: 201, data: { id } };
      })
      .on("GET", `${project}/repository/tags`, () => ({
        status: 200,
        data: this.tags.map((name) => ({ name })),
        headers: { "X-Next-Page": "" },
      }))
      .on("POST", `${project}/repository/tags`, (req) => {
        if (this.failTag) return { status: 500, data: { message: "boom" } };
        const body = TagBodySchema.parse(req.body);
        if (this.tags.includes(body.tag_name)) {
          return { status: 400, data: { message: "Tag " + body.tag_name + " already exists" } };
        }
        this.tags.push(body.tag_name);
        this.tagRefs.set(body.tag_name, body.ref);
        return { status: 201, data: { name: body.tag_name } };
      })
      .on("POST", new RegExp(`^${escape(project)}/repository/commits/([^/]+)/revert$`), (_req, m) => {
        const sha = m[1] ?? "";
        if (this.failRevert.has(sha)) return { status: 400, data: { message: "conflict" } };
        this.reverted.push(sha);
        return { status: 201, data: { id: `revert-${sha}` } };
      })
      .on("POST", `${JENKINS_BASE}/job/index/buildWithParameters`, {
        status: 201,
        headers: { Location: QUEUE_URL },
      })
      .on("GET", `${QUEUE_URL}api/json`, {
        status: 200,
        data: { cancelled: false, executable: { url: BUILD_URL } },
      })
      .on("GET", `${BUILD_URL}api/json`, () => ({
        status: 200,
        data: { result: this.buildResult },
      }));
  }
}

const CommitBodySchema = z.object({
  branch: z.string(),
  commit_message: z.string(),
  actions: z.array(
    z.object({ action: z.string(), file_path: z.string(), content: z.string().optional() }),
  ),
});

const TagBodySchema = z.object({ tag_name: z.string(), ref: z.string(), message: z.string() });

function escape(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ---------------------------------------------------------------------------
// Fake AI providers
// ---------------------------------------------------------------------------

export class FakeEmbeddingProvider implements EmbeddingProvider {
  calls: string[] = [];
  private respond: (text: string, call: number) => number[] | Promise<number[]>;

  constructor(respond: (text: string, call: number) => number[] | Promise<number[]> = () => [0.1, 0.2, 0.3]) {
    this.respond = respond;
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.respond(text, this.calls.length);
  }
}

export class FakeKeywordProvider implements KeywordProvider {
  calls: string[] = [];
  private respond: (prompt: string, call: number) => string | Promise<string>;

  constructor(respond: (prompt: string, call: number) => string | Promise<string> = () => '["password", "reset"]') {
    this.respond = respond;
  }

  async complete(prompt: string): Promise<string> {
    this.calls.push(prompt);
    return this.respond(prompt, this.calls.length);
  }
}

/** Error shaped like an HTTP client error carrying a status code. */
export class StatusError extends Error {
  status: number;

  constructor(status: number, message = `status ${status}`) {
    super(message);
    this.status = status;
  }
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

export interface SinkEvent {
  level: "info" | "warning" | "error";
  step: string;
  message: string;
  percent: number;
}

export class RecordingProgressSink implements ProgressSink {
  events: SinkEvent[] = [];
  steps: { step: string; index: number; percent: number; eta: number | null }[] = [];
  stats: StatsUpdate[] = [];

  logInfo(step: string, message: string, percent: number): void {
    this.events.push({ level: "info", step, message, percent });
  }

  logWarning(step: string, message: string, percent: number): void {
    this.events.push({ level: "warning", step, message, percent });
  }

  logError(step: string, message: string, percent: number): void {
    this.events.push({ level: "error", step, message, percent });
  }

  updateStep(step: string, index: number, percent: number, eta: number | null): void {
    this.steps.push({ step, index, percent, eta });
  }

  updateStats(stats: StatsUpdate): void {
    this.stats.push(stats);
  }

  messages(level: SinkEvent["level"]): string[] {
    return this.events.filter((e) => e.level === level).map((e) => e.message);
  }
}

// ---------------------------------------------------------------------------
// Pre-configured publisher
// ---------------------------------------------------------------------------

export function testConfig(dir: string): RawConfig {
  return {
    storage: { provider: "disk", config: { basePath: join(dir, "storage") } },
    db: { provider: "sqlite", config: { path: ":memory:" } },
    manifest: { dir: join(dir, "manifests") },
    embedding: {
      endpoint: "https://aoai.test",
      apiKey: "test-secret",
      deployment: "embedding",
      retry: { maxAttempts: 3, backoffMs: 0 },
    },
    keywords: {
      endpoint: "https://aoai.test",
      apiKey: "test-secret",
      deployment: "chat",
      retry: { maxAttempts: 3, backoffMs: 0 },
    },
    gitlab: {
      apiBase: GITLAB_BASE,
      projectId: "group/content",
      token: "test-secret",
      targetDir: "index",
      commitMessage: "chore: update files",
    },
    jenkins: {
      baseUrl: JENKINS_BASE,
      job: "job/index",
      user: "deployer",
      apiToken: "test-secret",
      pollIntervalMs: 0,
      params: {
        gitUser: "deployer",
        gitToken: "test-secret",
        workEnv: "dv0",
        indexNameShort: "faq",
      },
    },
  };
}

export interface TestPublisher {
  publisher: IndexPublisher;
  remote: FakeRemote;
  embedding: FakeEmbeddingProvider;
  keywords: FakeKeywordProvider;
  storage: DiskStorage;
  db: SQLiteBackend;
}

export async function makePublisher(
  dir: string,
  opts: {
    configure?: (raw: RawConfig) => RawConfig;
    embedding?: FakeEmbeddingProvider;
    keywords?: FakeKeywordProvider;
    storage?: DiskStorage;
    now?: () => number;
  } = {},
): Promise<TestPublisher> {
  const raw = testConfig(dir);
  const config = loadConfig(opts.configure ? opts.configure(raw) : raw);
  const storage = opts.storage ?? new DiskStorage(join(dir, "storage"));
  const db = new SQLiteBackend(":memory:");
  const remote = new FakeRemote();
  const embedding = opts.embedding ?? new FakeEmbeddingProvider();
  const keywords = opts.keywords ?? new FakeKeywordProvider();
  const publisher = new IndexPublisher({
    config,
    storage,
    db,
    logger: silentLogger,
    embeddingProvider: embedding,
    keywordProvider: keywords,
    httpAdapter: remote.http.adapter,
    now: opts.now,
  });
  await publisher.initialize();
  return { publisher, remote, embedding, keywords, storage, db };
}
