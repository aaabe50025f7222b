/**
 * Explicit per-stage outcome. Stages never throw across the orchestrator
 * boundary; they return one of these instead.
 */

export type FatalErrorKind =
  | "validation"
  | "embedding"
  | "write"
  | "publish"
  | "tag"
  | "deploy";

/** Kinds that can occur once commits may already exist remotely. */
export const POST_PUBLICATION_KINDS: ReadonlySet<FatalErrorKind> = new Set([
  "publish",
  "tag",
  "deploy",
]);

export interface FatalError {
  kind: FatalErrorKind;
  detail: string;
  cause?: unknown;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FatalError };

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fatal<T>(
  kind: FatalErrorKind,
  detail: string,
  cause?: unknown,
): StageResult<T> {
  return { ok: false, error: { kind, detail, cause } };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Run `fn`, mapping any thrown error to a fatal result of `kind`. */
export async function guard<T>(
  kind: FatalErrorKind,
  fn: () => Promise<T>,
): Promise<StageResult<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fatal(kind, describeError(err), err);
  }
}
