/**
 * Environment → raw configuration. The only module that reads the
 * environment; everything downstream receives the validated Config.
 */
import dotenv from "dotenv";
import { existsSync, readFileSync } from "node:fs";

import type { RawConfig } from "./config.js";

export type Env = Record<string, string | undefined>;

/** Keys that an index name may override with `<NAME>_<KEY>`. */
export const INDEX_SCOPED_KEYS = [
  "API_BASE",
  "PROJECT_ID",
  "GIT_USER",
  "GIT_TOKEN",
  "JENKINS_BASE",
  "JENKINS_JOB",
  "JENKINS_USER",
  "JENKINS_TOKEN",
  "JENKINS_JOB_TOKEN",
  "N8N_FLOW1_URL",
  "N8N_FLOW2_URL",
  "N8N_FLOW3_URL",
] as const;

/**
 * Merge an env file (default `.env` when present) under the process
 * environment. Variables already set in the process win.
 */
export function loadEnv(envFile?: string, base: Env = process.env): Env {
  const path = envFile ?? ".env";
  if (!existsSync(path)) {
    if (envFile) throw new Error(`env file not found: ${envFile}`);
    return { ...base };
  }
  return { ...dotenv.parse(readFileSync(path)), ...base };
}

function indexPrefixes(index: string): string[] {
  const variants = [index, index.toUpperCase(), index.toLowerCase()];
  const out: string[] = [];
  for (const v of [...variants, ...variants.map((x) => x.replace(/-/g, "_"))]) {
    if (!out.includes(v)) out.push(v);
  }
  return out;
}

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

/** Value of `key`, preferring an index-scoped variant when `index` is given. */
export function resolveEnv(env: Env, key: string, index?: string): string | undefined {
  if (index && (INDEX_SCOPED_KEYS as readonly string[]).includes(key)) {
    for (const prefix of indexPrefixes(index)) {
      const scoped = present(env[`${prefix}_${key}`]);
      if (scoped !== undefined) return scoped;
    }
  }
  return present(env[key]);
}

function int(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) throw new Error(`expected an integer, got ${value}`);
  return n;
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return !["false", "0", "no", "off"].includes(value.toLowerCase());
}

export interface EnvConfigOptions {
  index?: string;
  storagePath?: string;
  dbPath?: string;
  manifestDir?: string;
}

/** Build the raw (unvalidated) configuration from environment variables. */
export function configFromEnv(env: Env, opts: EnvConfigOptions = {}): RawConfig {
  const get = (key: string): string | undefined => resolveEnv(env, key, opts.index);
  const databaseUrl = get("DATABASE_URL");

  const flowUrls = ["N8N_FLOW1_URL", "N8N_FLOW2_URL", "N8N_FLOW3_URL"]
    .map(get)
    .filter((u): u is string => u !== undefined);

  return {
    storage: {
      provider: "disk",
      config: { basePath: opts.storagePath ?? get("STORAGE_PATH") },
    },
    db: databaseUrl
      ? { provider: "postgres", config: { connectionString: databaseUrl } }
      : { provider: "sqlite", config: { path: opts.dbPath ?? get("DB_PATH") ?? "./index-publisher.db" } },
    input: { sheetName: get("SHEET_NAME") },
    manifest: { dir: opts.manifestDir ?? get("MANIFEST_DIR") },
    embedding: {
      endpoint: get("AZURE_OPENAI_ENDPOINT") ?? "",
      apiKey: get("AZURE_OPENAI_API_KEY") ?? "",
      apiVersion: get("AZURE_OPENAI_API_VERSION"),
      deployment: get("AZURE_OPENAI_API_ENGINE_EMBEDDING") ?? "",
    },
    keywords: {
      endpoint: get("AOAI_ITB_ENDPOINT") ?? get("AZURE_OPENAI_ENDPOINT") ?? "",
      apiKey: get("AOAI_ITB_API_KEY") ?? get("AZURE_OPENAI_API_KEY") ?? "",
      apiVersion: get("AZURE_OPENAI_API_VERSION"),
      deployment: get("AZURE_OPENAI_API_ENGINE_GPT") ?? "",
    },
    gitlab: {
      apiBase: get("API_BASE") ?? "",
      projectId: get("PROJECT_ID") ?? "",
      token: get("GIT_TOKEN") ?? "",
      branch: get("BRANCH"),
      targetDir: get("TARGET_DIR"),
      commitMessage: get("COMMIT_MESSAGE"),
      batchSize: int(get("BATCH_SIZE")),
      tagMessage: get("TAG_MESSAGE"),
      timeZone: get("TIMEZONE"),
    },
    jenkins: {
      baseUrl: get("JENKINS_BASE") ?? "",
      job: get("JENKINS_JOB") ?? "",
      user: get("JENKINS_USER") ?? "",
      apiToken: get("JENKINS_TOKEN") ?? "",
      jobToken: get("JENKINS_JOB_TOKEN"),
      params: {
        gitUser: get("GIT_USER"),
        gitToken: get("GIT_TOKEN"),
        workEnv: get("WORK_ENV"),
        indexNameShort: get("INDEX_NAME_SHORT") ?? opts.index,
      },
    },
    flows: {
      urls: flowUrls,
      sendJson: bool(get("N8N_SEND_JSON")),
    },
  };
}
