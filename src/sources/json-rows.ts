/**
 * JSON source reader: a top-level array of row objects, streamed.
 */
import { posix } from "node:path";
import { Readable } from "node:stream";
import streamJson from "stream-json";
import StreamArray from "stream-json/streamers/StreamArray.js";

import type { CellValue, RawRow, TabularSource } from "../core/types.js";
import { SourceReadFailedException } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";
import type { SourceReader } from "./reader.js";

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return JSON.stringify(value);
}

export class JsonRowsSourceReader implements SourceReader {
  async read(key: string, storage: StorageBackend): Promise<TabularSource> {
    const name = posix.basename(key);
    const columns: string[] = [];
    const seen = new Set<string>();
    const rows: RawRow[] = [];

    await new Promise<void>((resolve, reject) => {
      let rejected = false;
      const onError = (err: Error) => {
        if (!rejected) {
          rejected = true;
          reject(new SourceReadFailedException(name, err.message));
        }
      };

      const nodeStream = Readable.fromWeb(storage.readStream(key));
      const jsonParser = streamJson.parser();
      const arrayStream = StreamArray.streamArray();

      nodeStream.on("error", onError);
      jsonParser.on("error", onError);
      arrayStream.on("error", onError);

      const pipeline = nodeStream.pipe(jsonParser).pipe(arrayStream);

      pipeline.on("data", ({ key: index, value }: { key: number; value: unknown }) => {
        if (value === null || typeof value !== "object" || Array.isArray(value)) {
          onError(new Error(`element ${index} is not an object`));
          return;
        }
        const record: RawRow = {};
        for (const [column, cell] of Object.entries(value)) {
          if (!seen.has(column)) {
            seen.add(column);
            columns.push(column);
          }
          record[column] = toCellValue(cell);
        }
        rows.push(record);
      });

      pipeline.on("end", () => {
        if (!rejected) resolve();
      });
    });

    return { name, columns, rows };
  }
}
