/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";

import { EMBEDDING_RETRY, KEYWORD_RETRY } from "./core/retry.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { REQUIRED_COLUMNS } from "./reconcile/reconciler.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  provider: z.enum(["disk"]).default("disk"),
  config: z
    .object({ basePath: z.string().min(1).default("./data") })
    .default({}),
});

const DbConfigSchema = z.object({
  provider: z.enum(["sqlite", "postgres"]).default("sqlite"),
  config: z
    .object({
      path: z.string().min(1).optional(),
      connectionString: z.string().min(1).optional(),
    })
    .default({}),
});

const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().positive(),
  backoffMs: z.number().int().nonnegative(),
});

const AzureServiceSchema = z.object({
  endpoint: z.string().url(),
  apiKey: z.string().min(1),
  apiVersion: z.string().default("2024-07-01-preview"),
  deployment: z.string().min(1),
  timeoutMs: z.number().int().positive().default(30_000),
  concurrency: z.number().int().positive().default(4),
});

const InputConfigSchema = z.object({
  sheetName: z.string().min(1).default("rag"),
  requiredColumns: z.array(z.string().min(1)).default([...REQUIRED_COLUMNS]),
});

const ManifestConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dir: z.string().min(1).default("./manifests"),
});

const GitLabConfigSchema = z.object({
  apiBase: z.string().url(),
  projectId: z.string().min(1),
  token: z.string().min(1),
  branch: z.string().min(1).default("main"),
  targetDir: z.string().default(""),
  commitMessage: z.string().min(1).default("chore: update files"),
  batchSize: z.number().int().positive().default(100),
  tagMessage: z.string().min(1).default("auto tag"),
  initialTag: z.string().default("initial-tag"),
  timeZone: z.string().min(1).default("Asia/Tokyo"),
  timeoutMs: z.number().int().positive().default(30_000),
});

const JenkinsConfigSchema = z.object({
  baseUrl: z.string().url(),
  job: z.string().min(1),
  user: z.string().min(1),
  apiToken: z.string().min(1),
  jobToken: z.string().min(1).optional(),
  pollIntervalMs: z.number().int().nonnegative().default(2_000),
  queueTimeoutMs: z.number().int().positive().default(300_000),
  buildTimeoutMs: z.number().int().positive().default(1_800_000),
  timeoutMs: z.number().int().positive().default(30_000),
  params: z
    .object({
      gitUser: z.string().default(""),
      gitToken: z.string().default(""),
      workEnv: z.string().default(""),
      indexNameShort: z.string().default(""),
    })
    .default({}),
});

const FlowsConfigSchema = z.object({
  urls: z.array(z.string().url()).max(3).default([]),
  sendJson: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  db: DbConfigSchema.default({}),
  input: InputConfigSchema.default({}),
  manifest: ManifestConfigSchema.default({}),
  embedding: AzureServiceSchema.extend({
    retry: RetryPolicySchema.default({ ...EMBEDDING_RETRY }),
  }),
  keywords: AzureServiceSchema.extend({
    retry: RetryPolicySchema.default({ ...KEYWORD_RETRY }),
  }),
  gitlab: GitLabConfigSchema,
  jenkins: JenkinsConfigSchema,
  flows: FlowsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RawConfig = z.input<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Storage factories
// ---------------------------------------------------------------------------

function buildStorage(storage: Config["storage"]): StorageBackend {
  switch (storage.provider) {
    case "disk":
      return new DiskStorage(storage.config.basePath);
  }
}

// ---------------------------------------------------------------------------
// DB factories
// ---------------------------------------------------------------------------

function buildDb(db: Config["db"]): DatabaseBackend {
  switch (db.provider) {
    case "sqlite":
      return new SQLiteBackend(db.config.path ?? ":memory:");
    case "postgres":
      if (!db.config.connectionString) {
        throw new Error("postgres provider needs config.connectionString");
      }
      return new PostgresBackend(db.config.connectionString);
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

/** Deep-freeze a validated config so no component can change it. */
function freeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) freeze(child);
    Object.freeze(value);
  }
  return value;
}

export function loadConfig(raw: unknown): Readonly<Config> {
  return freeze(ConfigSchema.parse(raw));
}

export function parseConfig(raw: unknown): {
  config: Readonly<Config>;
  storage: StorageBackend;
  db: DatabaseBackend;
} {
  const config = loadConfig(raw);
  const storage = buildStorage(config.storage);
  const db = buildDb(config.db);
  return { config, storage, db };
}
