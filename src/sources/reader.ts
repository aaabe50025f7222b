/**
 * Source reader strategy interface.
 */
import type { TabularSource } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";

export interface SourceReaderOptions {
  /** Worksheet holding the rows in workbook sources. */
  sheetName: string;
}

/** Reads one staged file into header columns and rows. */
export interface SourceReader {
  read(key: string, storage: StorageBackend): Promise<TabularSource>;
}
