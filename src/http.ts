/**
 * Shared axios factory for the remote clients.
 */
import axios from "axios";
import type { AxiosAdapter, AxiosInstance, CreateAxiosDefaults } from "axios";

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  auth?: { username: string; password: string };
  /** Replaces the network transport, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
}

export function createHttpClient(opts: HttpClientOptions = {}): AxiosInstance {
  const config: CreateAxiosDefaults = {
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
    headers: opts.headers,
    auth: opts.auth,
  };
  if (opts.adapter) config.adapter = opts.adapter;
  return axios.create(config);
}

/** Short description of an HTTP failure for logs and error details. */
export function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      const body =
        typeof err.response.data === "string"
          ? err.response.data
          : JSON.stringify(err.response.data);
      return `HTTP ${err.response.status}: ${body}`;
    }
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
