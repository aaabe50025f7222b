/**
 * Transient vs permanent classification of AI service errors.
 */
import { isAxiosError } from "axios";

const TRANSIENT_MESSAGE =
  /timed? ?out|timeout|connection|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|service unavailable/i;

function statusOf(err: unknown): number | null {
  if (isAxiosError(err)) return err.response?.status ?? null;
  if (typeof err === "object" && err !== null && "status" in err) {
    return typeof err.status === "number" ? err.status : null;
  }
  return null;
}

/**
 * True for throttling, server-side and network failures. Other 4xx answers
 * and malformed replies are permanent.
 */
export function isTransientServiceError(err: unknown): boolean {
  const status = statusOf(err);
  if (status !== null) {
    return status === 408 || status === 429 || status >= 500;
  }
  // Request never got an answer.
  if (isAxiosError(err)) return true;
  return err instanceof Error && TRANSIENT_MESSAGE.test(err.message);
}
