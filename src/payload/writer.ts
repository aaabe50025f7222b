/**
 * Persists enriched artifacts into staging storage, one JSON file each.
 */
import { IncompleteArtifactException } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";
import { hasEmbedding, serializeArtifact } from "./models.js";
import type { ContentArtifact } from "./models.js";

export interface WrittenArtifact {
  id: string;
  key: string;
}

export class ArtifactWriter {
  private storage: StorageBackend;

  constructor(storage: StorageBackend) {
    this.storage = storage;
  }

  static keyFor(prefix: string, id: string): string {
    return `${prefix}${id}.json`;
  }

  /**
   * Write every artifact under `prefix`. Nothing is written when any artifact
   * lacks an embedding.
   */
  async writeAll(
    artifacts: readonly ContentArtifact[],
    prefix: string,
  ): Promise<WrittenArtifact[]> {
    const incomplete = artifacts.find((a) => !hasEmbedding(a));
    if (incomplete) throw new IncompleteArtifactException(incomplete.id);

    const written: WrittenArtifact[] = [];
    for (const artifact of artifacts) {
      const key = ArtifactWriter.keyFor(prefix, artifact.id);
      await this.storage.write(key, serializeArtifact(artifact));
      written.push({ id: artifact.id, key });
    }
    return written;
  }
}
