/**
 * Source registry – maps file extensions to reader classes.
 */
import { posix } from "node:path";

import type { SourceReader, SourceReaderOptions } from "./reader.js";
import { JsonRowsSourceReader } from "./json-rows.js";
import { WorkbookSourceReader } from "./workbook.js";

export const SOURCE_REGISTRY: Record<
  string,
  new (opts: SourceReaderOptions) => SourceReader
> = {
  ".xlsx": WorkbookSourceReader,
  ".json": JsonRowsSourceReader,
};

export function isSupportedSource(key: string): boolean {
  const base = posix.basename(key);
  // Office lock files and dotfiles
  if (base.startsWith("~$") || base.startsWith(".")) return false;
  return posix.extname(base).toLowerCase() in SOURCE_REGISTRY;
}

export function getSourceReader(
  key: string,
  opts: SourceReaderOptions,
): SourceReader {
  const Reader = SOURCE_REGISTRY[posix.extname(key).toLowerCase()];
  if (!Reader) throw new Error(`Unsupported source type: ${key}`);
  return new Reader(opts);
}
