#!/usr/bin/env node
/**
 * CLI entrypoint for index-publisher.
 *
 * Usage:
 *   index-publisher --input ./records.xlsx
 *   index-publisher --input ./batch.zip --index faq --env-file .env.faq
 */
import { parseArgs } from "node:util";

import { configFromEnv, loadEnv } from "./env.js";
import { IndexPublisher, PipelineFailedError } from "./index.js";
import { createLogger } from "./logger.js";
import type { LevelWithSilent } from "pino";

const USAGE = `
index-publisher: publish tabular content to a search index repository

Usage:
  index-publisher --input <path> [options]

Options:
  --input <path>          Workbook (.xlsx), JSON rows (.json), directory or .zip
  --env-file <file>       Environment file              (default: .env if present)
  --index <name>          Index name; selects <NAME>_<KEY> variables
  --storage-path <dir>    Staging directory             (default: ./data)
  --db-path <file>        SQLite run history database   (default: ./index-publisher.db)
  --manifest-dir <dir>    Identifier manifest directory (default: ./manifests)
  --log-level <level>     trace|debug|info|warn|error|silent (default: info)
  --help                  Show this help
`.trim();

const LEVELS: readonly LevelWithSilent[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLevel(value: string): value is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(value);
}

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    input: { type: "string" },
    "env-file": { type: "string" },
    index: { type: "string" },
    "storage-path": { type: "string" },
    "db-path": { type: "string" },
    "manifest-dir": { type: "string" },
    "log-level": { type: "string", default: "info" },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const level = values["log-level"] ?? "info";
if (!values.input || !isLevel(level)) {
  console.error(USAGE);
  process.exit(1);
}

const logger = createLogger(level);
const env = loadEnv(values["env-file"]);
const publisher = await IndexPublisher.fromConfig(
  configFromEnv(env, {
    index: values.index,
    storagePath: values["storage-path"],
    dbPath: values["db-path"],
    manifestDir: values["manifest-dir"],
  }),
  { logger },
);

try {
  const result = await publisher.run(values.input);
  console.log(`Run ${result.runId}`);
  console.log(`  Records:        ${result.recordCount}`);
  console.log(`  Files created:  ${result.jsonFilesCreated}`);
  console.log(`  Files deleted:  ${result.jsonFilesDeleted}`);
  if (result.keywordFailures > 0) {
    console.log(`  Keyword gaps:   ${result.keywordFailures}`);
  }
  if (result.tag) console.log(`  Tag:            ${result.tag.name}`);
  if (result.buildState) console.log(`  Build:          ${result.buildState}`);
  for (const flow of result.flows) {
    console.log(`  Flow ${flow.url}: ${flow.status}`);
  }
  if (result.manifestPath) console.log(`  Manifest:       ${result.manifestPath}`);
} catch (err) {
  if (err instanceof PipelineFailedError) {
    console.error(`Run ${err.runId} failed at ${err.kind}: ${err.detail}`);
    if (err.rollback) {
      console.error(`  Reverted: ${err.rollback.reverted.length} commits`);
    }
    if (err.manualActionRequired.length > 0) {
      console.error(`  Manual action required for: ${err.manualActionRequired.join(", ")}`);
    }
  } else {
    console.error(err);
  }
  process.exitCode = 1;
} finally {
  await publisher.close();
}
