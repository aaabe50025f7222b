/**
 * Copies or unpacks the run's input into staging storage.
 */
import { unzipSync } from "fflate";
import type { Stats } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import { basename, extname, join, posix } from "node:path";

import { SourceReadFailedException } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";
import { isSupportedSource } from "./registry.js";

/**
 * Stage `inputPath` (a source file, a directory of them, or a .zip bundle)
 * under `prefix`. Returns the staged keys of readable sources, sorted.
 */
export async function stageInput(
  inputPath: string,
  storage: StorageBackend,
  prefix: string,
): Promise<string[]> {
  let info: Stats;
  try {
    info = await stat(inputPath);
  } catch {
    throw new SourceReadFailedException(inputPath, "input path does not exist");
  }

  if (info.isDirectory()) {
    const entries = await readdir(inputPath, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      if (extname(entry.name).toLowerCase() === ".zip") {
        await unzipInto(join(inputPath, entry.name), storage, prefix);
      } else if (isSupportedSource(entry.name)) {
        await storage.write(
          `${prefix}${entry.name}`,
          await readFile(join(inputPath, entry.name)),
        );
      }
    }
  } else if (extname(inputPath).toLowerCase() === ".zip") {
    await unzipInto(inputPath, storage, prefix);
  } else {
    await storage.write(
      `${prefix}${basename(inputPath)}`,
      await readFile(inputPath),
    );
  }

  const keys = await storage.list(prefix.replace(/\/$/, ""));
  return keys.filter(isSupportedSource).sort();
}

/** Extract a zip bundle into storage under `prefix`. */
async function unzipInto(
  zipPath: string,
  storage: StorageBackend,
  prefix: string,
): Promise<void> {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(new Uint8Array(await readFile(zipPath)));
  } catch (err) {
    throw new SourceReadFailedException(basename(zipPath), String(err));
  }

  for (const [name, data] of Object.entries(files)) {
    // Skip directories (empty data with trailing /)
    if (name.endsWith("/") && data.length === 0) continue;
    if (name.startsWith("__MACOSX/")) continue;
    const normalised = posix.normalize(name);
    if (normalised.startsWith("..")) continue;
    await storage.write(`${prefix}${normalised}`, data);
  }
}
