/**
 * Release tags of the form NNN-YYYYMMDD.
 */
import { TagSequenceExhaustedException } from "../core/exceptions.js";
import type { ReleaseTag } from "../core/types.js";
import { componentLogger, logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ContentRepository } from "./gitlab.js";

export const TAG_PATTERN = /^(\d{3})-(\d{8})$/;
export const MAX_TAG_SEQUENCE = 999;

/** Calendar date `YYYYMMDD` of `now` in `timeZone`. */
export function dateInZone(now: Date, timeZone: string): string {
  // en-CA renders as YYYY-MM-DD.
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  })
    .format(now)
    .replaceAll("-", "");
}

/**
 * Compute the tag following `existing`. Names not matching the pattern are
 * ignored. Throws once the three-digit sequence is used up.
 */
export function nextTag(
  existing: readonly string[],
  today: string,
  ignore: readonly string[] = [],
): ReleaseTag {
  let max = 0;
  let previous: string | null = null;
  for (const name of existing) {
    if (ignore.includes(name)) continue;
    const m = TAG_PATTERN.exec(name);
    if (!m) continue;
    const seq = Number(m[1]);
    if (seq > max) {
      max = seq;
      previous = name;
    }
  }
  const sequence = max + 1;
  if (sequence > MAX_TAG_SEQUENCE) {
    throw new TagSequenceExhaustedException(previous ?? String(max));
  }
  return {
    name: `${String(sequence).padStart(3, "0")}-${today}`,
    sequence,
    date: today,
    previous,
  };
}

/** Split a tag name into its sequence and date parts. */
export function parseTag(name: string): { sequence: string; date: string } | null {
  const m = TAG_PATTERN.exec(name);
  if (!m || m[1] === undefined || m[2] === undefined) return null;
  return { sequence: m[1], date: m[2] };
}

export interface ReleaseTaggerOptions {
  repository: ContentRepository;
  tagMessage: string;
  initialTag: string;
  timeZone: string;
  now?: () => Date;
  logger?: Logger;
}

export class ReleaseTagger {
  private repository: ContentRepository;
  private tagMessage: string;
  private initialTag: string;
  private timeZone: string;
  private now: () => Date;
  private log: Logger;

  constructor(opts: ReleaseTaggerOptions) {
    this.repository = opts.repository;
    this.tagMessage = opts.tagMessage;
    this.initialTag = opts.initialTag;
    this.timeZone = opts.timeZone;
    this.now = opts.now ?? (() => new Date());
    this.log = componentLogger(opts.logger ?? defaultLogger, "tag");
  }

  /** Create the next release tag at `ref`. An existing tag of that name counts as created. */
  async tag(ref: string): Promise<ReleaseTag> {
    const existing = await this.repository.listTags();
    const tag = nextTag(existing, dateInZone(this.now(), this.timeZone), [this.initialTag]);
    const created = await this.repository.createTag(tag.name, ref, this.tagMessage);
    if (created) {
      this.log.info({ tag: tag.name, ref }, "tag created");
    } else {
      this.log.warn({ tag: tag.name, ref }, "tag already exists");
    }
    return tag;
  }
}
