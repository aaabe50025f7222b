/**
 * Content artifact model and its published index document form.
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Plain TypeScript types
// ---------------------------------------------------------------------------

export interface ArtifactExtensions {
  extraField1: string;
  extraField2: string;
}

/** The unit published downstream. `id` also names its file and remote path. */
export interface ContentArtifact {
  id: string;
  threadId: string;
  groupId: string;
  /** YYYY-MM-DD */
  updatedOn: string;
  content: string;
  embedding: number[];
  keywords: string[];
  categoryIdLarge: string;
  categoryIdMedium: string;
  categoryIdSmall: string;
  effectiveStartDate: string;
  effectiveEndDate: string;
  extensions: ArtifactExtensions;
}

// ---------------------------------------------------------------------------
// Index document (wire format)
// ---------------------------------------------------------------------------

export const IndexDocumentSchema = z.object({
  rag_id: z.string().min(1),
  thread_id: z.string(),
  group_id: z.string(),
  update_timestamp: z.string(),
  content: z.string(),
  content_embedding: z.array(z.number()),
  content_keywords: z.array(z.string()),
  category_id_large: z.string(),
  category_id_medium: z.string(),
  category_id_small: z.string(),
  effective_start_date: z.string(),
  effective_end_date: z.string(),
  extra_field_1: z.string(),
  extra_field_2: z.string(),
});

export type IndexDocument = z.infer<typeof IndexDocumentSchema>;

export function toIndexDocument(artifact: ContentArtifact): IndexDocument {
  return {
    rag_id: artifact.id,
    thread_id: artifact.threadId,
    group_id: artifact.groupId,
    update_timestamp: artifact.updatedOn,
    content: artifact.content,
    content_embedding: artifact.embedding,
    content_keywords: artifact.keywords,
    category_id_large: artifact.categoryIdLarge,
    category_id_medium: artifact.categoryIdMedium,
    category_id_small: artifact.categoryIdSmall,
    effective_start_date: artifact.effectiveStartDate,
    effective_end_date: artifact.effectiveEndDate,
    extra_field_1: artifact.extensions.extraField1,
    extra_field_2: artifact.extensions.extraField2,
  };
}

export function fromIndexDocument(doc: IndexDocument): ContentArtifact {
  return {
    id: doc.rag_id,
    threadId: doc.thread_id,
    groupId: doc.group_id,
    updatedOn: doc.update_timestamp,
    content: doc.content,
    embedding: doc.content_embedding,
    keywords: doc.content_keywords,
    categoryIdLarge: doc.category_id_large,
    categoryIdMedium: doc.category_id_medium,
    categoryIdSmall: doc.category_id_small,
    effectiveStartDate: doc.effective_start_date,
    effectiveEndDate: doc.effective_end_date,
    extensions: { extraField1: doc.extra_field_1, extraField2: doc.extra_field_2 },
  };
}

/** Serialized file body: 4-space indented JSON, non-ASCII kept as is. */
export function serializeArtifact(artifact: ContentArtifact): string {
  return JSON.stringify(toIndexDocument(artifact), null, 4);
}

export function parseArtifact(text: string): ContentArtifact {
  return fromIndexDocument(IndexDocumentSchema.parse(JSON.parse(text)));
}

/** Only embedded artifacts may be written; keywords are optional. */
export function hasEmbedding(artifact: ContentArtifact): boolean {
  return artifact.embedding.length > 0;
}

/** Relative path of an artifact inside the content repository. */
export function artifactPath(targetDir: string, id: string): string {
  const dir = targetDir.replace(/^\/+|\/+$/g, "");
  return dir ? `${dir}/${id}.json` : `${id}.json`;
}
