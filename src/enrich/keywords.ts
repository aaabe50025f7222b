/**
 * Keyword enrichment. Tolerant: an artifact whose keywords cannot be obtained
 * keeps an empty list and the run continues.
 */
import { AzureOpenAI } from "openai";
import { z } from "zod";

import { KeywordParseException } from "../core/exceptions.js";
import { mapPool } from "../core/pool.js";
import { KEYWORD_RETRY, withRetry } from "../core/retry.js";
import type { RetryPolicy } from "../core/retry.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ContentArtifact } from "../payload/models.js";
import type { AzureServiceOptions, EnricherOptions, ProgressCallback } from "./embedding.js";

export const KEYWORD_PROMPT = `# Role
You are a natural language processing expert. Your job is to extract the important keywords from the given Content.

# Instructions
- Extract concise, relevant keywords from the Content for use in keyword search.
- Do not include the names of cited files or documents (such as info.txt or doc.pdf) in the keywords.
- Do not include text enclosed in "[" and "]" in the keywords.

## Important:
Outputs must strictly be in the form of a JSON array.

# Content
{content}

# Output format
["keyword1", "keyword2", "keyword3", ...]

# Output
## Please provide the keywords in the form of a JSON array:
`;

export function renderKeywordPrompt(content: string): string {
  return KEYWORD_PROMPT.replace("{content}", () => content);
}

/** Returns the raw model reply for the keyword prompt. */
export interface KeywordProvider {
  complete(prompt: string): Promise<string>;
}

export class AzureKeywordProvider implements KeywordProvider {
  private client: AzureOpenAI;
  private deployment: string;

  constructor(opts: AzureServiceOptions) {
    this.deployment = opts.deployment;
    this.client = new AzureOpenAI({
      endpoint: opts.endpoint,
      apiKey: opts.apiKey,
      apiVersion: opts.apiVersion,
      deployment: opts.deployment,
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.deployment,
      messages: [{ role: "user", content: prompt }],
    });
    return response.choices[0]?.message.content ?? "";
  }
}

// ---------------------------------------------------------------------------
// Reply parsing
// ---------------------------------------------------------------------------

const KeywordListSchema = z.array(z.string());
const FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

/** Parse a reply that must be a JSON array of strings, optionally code-fenced. */
export function parseKeywordResponse(reply: string): string[] {
  let text = reply.trim();
  const fenced = FENCE.exec(text);
  if (fenced) text = (fenced[1] ?? "").trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new KeywordParseException(String(err));
  }

  const result = KeywordListSchema.safeParse(parsed);
  if (!result.success) {
    throw new KeywordParseException(result.error.issues[0]?.message);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Enricher
// ---------------------------------------------------------------------------

export interface KeywordEnrichment {
  artifacts: ContentArtifact[];
  /** Ids that ended with an empty keyword list. */
  failedIds: string[];
}

export class KeywordEnricher {
  private provider: KeywordProvider;
  private policy: RetryPolicy;
  private concurrency: number;
  private log: Logger;

  constructor(opts: EnricherOptions<KeywordProvider>) {
    this.provider = opts.provider;
    this.policy = opts.policy ?? KEYWORD_RETRY;
    this.concurrency = opts.concurrency ?? 4;
    this.log = componentLogger(opts.logger ?? defaultLogger, "keywords");
  }

  async enrich(
    artifacts: readonly ContentArtifact[],
    onProgress?: ProgressCallback,
  ): Promise<KeywordEnrichment> {
    const outcomes = await mapPool(
      artifacts,
      (artifact) =>
        withRetry(this.policy, async () =>
          parseKeywordResponse(
            await this.provider.complete(renderKeywordPrompt(artifact.content)),
          ),
        ),
      { width: this.concurrency, onSettled: onProgress },
    );

    const failedIds: string[] = [];
    const enriched = outcomes.map((outcome) => {
      const artifact = outcome.item;
      if (outcome.status === "fulfilled") {
        return { ...artifact, keywords: outcome.value };
      }
      const reason = outcome.status === "rejected" ? String(outcome.reason) : "skipped";
      this.log.warn({ artifactId: artifact.id, err: reason }, "keyword extraction failed");
      failedIds.push(artifact.id);
      return { ...artifact, keywords: [] };
    });

    return { artifacts: enriched, failedIds };
  }
}
