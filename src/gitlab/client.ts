import type { MergeGateway, MergeRequestGateway, TopicGateway } from "../core/gateway.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { GitLabCompare, GitLabMergeRequest, GitLabProject, GitLabTopic } from "../types/gitlab.js";

export type GitLabClientOptions = {
  /** Instance root, e.g. `https://gitlab.example.com`; `/api/v4` is appended. */
  baseUrl: string;
  /** Personal access token, sent as `PRIVATE-TOKEN` on every call. */
  token: string;
  /** Per-request timeout. Defaults to 15 s. */
  timeoutMs?: number;
  logger?: Logger;
};

/**
 * Error representing a non-success GitLab API response.
 */
export class GitLabApiError extends Error {
  readonly status: number;
  readonly method: string;
  readonly url: string;
  /** Raw response body text, as returned by GitLab. */
  readonly responseBody: string;

  constructor(status: number, method: string, url: string, responseBody: string) {
    super(`API request failed with status ${status}: ${responseBody}`);
    this.name = "GitLabApiError";
    this.status = status;
    this.method = method;
    this.url = url;
    this.responseBody = responseBody;
  }
}

type HttpMethod = "GET" | "POST" | "PUT";

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Re-throw `e` with the failing operation named in front of its message. */
function withContext(context: string, e: unknown): Error {
  return new Error(`${context}: ${errorMessage(e)}`, { cause: e });
}

/**
 * GitLab REST v4 client over the global `fetch`.
 */
export class GitLabClient implements MergeRequestGateway, TopicGateway, MergeGateway {
  private readonly apiRoot: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: GitLabClientOptions) {
    this.apiRoot = `${opts.baseUrl.replace(/\/+$/, "")}/api/v4`;
    this.token = opts.token;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.logger = opts.logger ?? silentLogger;
  }

  async getProject(projectPath: string): Promise<GitLabProject> {
    const endpoint = `${this.apiRoot}/projects/${encodeURIComponent(projectPath)}`;
    try {
      return await this.request<GitLabProject>("GET", endpoint);
    } catch (e) {
      throw withContext(`failed to get project ${projectPath}`, e);
    }
  }

  /** A 404 means the branch does not exist; any other non-200 is an error. */
  async branchExists(projectId: number, branch: string): Promise<boolean> {
    const endpoint = `${this.apiRoot}/projects/${projectId}/repository/branches/${encodeURIComponent(branch)}`;
    try {
      const response = await this.send("GET", endpoint);
      const body = await response.text();
      if (response.status === 404) return false;
      if (response.status !== 200) {
        throw new GitLabApiError(response.status, "GET", endpoint, body);
      }
      return true;
    } catch (e) {
      throw withContext(`failed to check branch ${branch}`, e);
    }
  }

  /** Compare with the target as base and the source as head. */
  async compareBranches(projectId: number, sourceBranch: string, targetBranch: string): Promise<GitLabCompare> {
    const query = new URLSearchParams({ from: targetBranch, to: sourceBranch });
    const endpoint = `${this.apiRoot}/projects/${projectId}/repository/compare?${query}`;
    try {
      return await this.request<GitLabCompare>("GET", endpoint);
    } catch (e) {
      throw withContext("failed to compare branches", e);
    }
  }

  async findOpenMergeRequests(projectId: number, sourceBranch: string, targetBranch: string): Promise<GitLabMergeRequest[]> {
    const query = new URLSearchParams({ state: "opened", source_branch: sourceBranch, target_branch: targetBranch });
    const endpoint = `${this.apiRoot}/projects/${projectId}/merge_requests?${query}`;
    try {
      return await this.request<GitLabMergeRequest[]>("GET", endpoint);
    } catch (e) {
      throw withContext("failed to find merge requests", e);
    }
  }

  async listOpenMergeRequestsByTarget(projectId: number, targetBranch: string): Promise<GitLabMergeRequest[]> {
    const query = new URLSearchParams({ state: "opened", target_branch: targetBranch });
    const endpoint = `${this.apiRoot}/projects/${projectId}/merge_requests?${query}`;
    try {
      return await this.request<GitLabMergeRequest[]>("GET", endpoint);
    } catch (e) {
      throw withContext("failed to list merge requests", e);
    }
  }

  async createMergeRequest(
    projectId: number,
    sourceBranch: string,
    targetBranch: string,
    title: string,
    description: string,
  ): Promise<GitLabMergeRequest> {
    const endpoint = `${this.apiRoot}/projects/${projectId}/merge_requests`;
    const payload = {
      source_branch: sourceBranch,
      target_branch: targetBranch,
      title,
      description,
    };
    try {
      return await this.request<GitLabMergeRequest>("POST", endpoint, payload);
    } catch (e) {
      throw withContext("failed to create merge request", e);
    }
  }

  async acceptMergeRequest(projectId: number, mergeRequestIid: number): Promise<GitLabMergeRequest> {
    const endpoint = `${this.apiRoot}/projects/${projectId}/merge_requests/${mergeRequestIid}/merge`;
    try {
      return await this.request<GitLabMergeRequest>("PUT", endpoint);
    } catch (e) {
      throw withContext("failed to accept merge request", e);
    }
  }

  async listTopics(page: number, perPage: number): Promise<GitLabTopic[]> {
    const query = new URLSearchParams({ page: String(page), per_page: String(perPage) });
    const endpoint = `${this.apiRoot}/topics?${query}`;
    try {
      return await this.request<GitLabTopic[]>("GET", endpoint);
    } catch (e) {
      throw withContext("failed to list topics", e);
    }
  }

  async listProjectsByTopic(topic: string, page: number, perPage: number): Promise<GitLabProject[]> {
    const query = new URLSearchParams({ topic, page: String(page), per_page: String(perPage) });
    const endpoint = `${this.apiRoot}/projects?${query}`;
    try {
      return await this.request<GitLabProject[]>("GET", endpoint);
    } catch (e) {
      throw withContext(`failed to list projects for topic ${topic}`, e);
    }
  }

  /** Fetch pages until GitLab returns an empty or short page. */
  async listAllProjectsByTopic(topic: string, perPage: number): Promise<GitLabProject[]> {
    const all: GitLabProject[] = [];
    for (let page = 1; ; page += 1) {
      const projects = await this.listProjectsByTopic(topic, page, perPage);
      if (projects.length === 0) break;
      all.push(...projects);
      if (projects.length < perPage) break;
    }
    return all;
  }

  private async request<T>(method: HttpMethod, endpoint: string, payload?: unknown): Promise<T> {
    const response = await this.send(method, endpoint, payload);
    const body = await response.text();

    if (!response.ok) {
      throw new GitLabApiError(response.status, method, endpoint, body);
    }

    try {
      return JSON.parse(body) as T;
    } catch (e) {
      throw withContext("failed to unmarshal response", e);
    }
  }

  private async send(method: HttpMethod, endpoint: string, payload?: unknown): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(endpoint, {
        method,
        headers: {
          "PRIVATE-TOKEN": this.token,
          "Content-Type": "application/json",
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      throw withContext("HTTP request failed", e);
    }

    this.logger.debug("HTTP", `${method} ${endpoint} -> ${response.status}`, { status: response.status });
    return response;
  }
}
