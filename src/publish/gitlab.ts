/**
 * Content repository client (GitLab REST v4).
 */
import { isAxiosError } from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";

import { createHttpClient } from "../http.js";

export type CommitAction =
  | { action: "create"; filePath: string; content: string }
  | { action: "delete"; filePath: string };

export interface GitLabClientOptions {
  apiBase: string;
  /** Numeric id or `group/project` path. */
  projectId: string;
  token: string;
  branch: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export interface ContentRepository {
  commit(actions: readonly CommitAction[], message: string): Promise<string>;
  listTags(): Promise<string[]>;
  /** Returns false when the tag already existed. */
  createTag(name: string, ref: string, message: string): Promise<boolean>;
  revert(commitId: string): Promise<string>;
}

const CommitResponseSchema = z.object({ id: z.string() });
const TagListSchema = z.array(z.object({ name: z.string() }));

export const TAGS_PER_PAGE = 100;

export function encodeProjectId(projectId: string): string {
  return projectId.includes("/") ? encodeURIComponent(projectId) : projectId;
}

export class GitLabClient implements ContentRepository {
  private http: AxiosInstance;
  private branch: string;
  private project: string;

  constructor(opts: GitLabClientOptions) {
    this.branch = opts.branch;
    this.project = `/projects/${encodeProjectId(opts.projectId)}`;
    this.http = createHttpClient({
      baseURL: opts.apiBase.replace(/\/+$/, ""),
      timeoutMs: opts.timeoutMs,
      headers: { "PRIVATE-TOKEN": opts.token },
      adapter: opts.adapter,
    });
  }

  async commit(actions: readonly CommitAction[], message: string): Promise<string> {
    const res = await this.http.post(`${this.project}/repository/commits`, {
      branch: this.branch,
      commit_message: message,
      actions: actions.map((a) =>
        a.action === "create"
          ? { action: "create", file_path: a.filePath, content: a.content }
          : { action: "delete", file_path: a.filePath },
      ),
    });
    return CommitResponseSchema.parse(res.data).id;
  }

  async listTags(): Promise<string[]> {
    const names: string[] = [];
    let page = "1";
    while (page) {
      const res = await this.http.get(`${this.project}/repository/tags`, {
        params: { per_page: TAGS_PER_PAGE, page },
      });
      for (const tag of TagListSchema.parse(res.data)) names.push(tag.name);
      const next = res.headers["x-next-page"];
      page = typeof next === "string" && next.trim() !== "0" ? next.trim() : "";
    }
    return names;
  }

  async createTag(name: string, ref: string, message: string): Promise<boolean> {
    try {
      await this.http.post(`${this.project}/repository/tags`, {
        tag_name: name,
        ref,
        message,
      });
      return true;
    } catch (err) {
      if (
        isAxiosError(err) &&
        err.response?.status === 400 &&
        JSON.stringify(err.response.data ?? "").includes("already exists")
      ) {
        return false;
      }
      throw err;
    }
  }

  async revert(commitId: string): Promise<string> {
    const res = await this.http.post(
      `${this.project}/repository/commits/${encodeURIComponent(commitId)}/revert`,
      { branch: this.branch },
    );
    return CommitResponseSchema.parse(res.data).id;
  }
}
