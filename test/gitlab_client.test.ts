import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { GitLabApiError, GitLabClient } from "../src/gitlab/client.js";
import { createLogger } from "../src/logging/logger.js";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function json(status: number, body: unknown): () => Promise<Response> {
  return async () =>
    new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function text(status: number, body: string): () => Promise<Response> {
  return async () => new Response(body, { status });
}

const API = "https://gitlab.test/api/v4";

describe("GitLabClient", () => {
  let fetchMock: Mock<FetchFn>;
  let client: GitLabClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal("fetch", fetchMock);
    client = new GitLabClient({ baseUrl: "https://gitlab.test/", token: "test-secret" });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function call(index: number): { url: string; init: RequestInit | undefined } {
    const [input, init] = fetchMock.mock.calls[index];
    return { url: String(input), init };
  }

  it("fetches a project by URL-encoded path with the token header", async () => {
    fetchMock.mockImplementationOnce(json(200, { id: 42, path_with_namespace: "team/api" }));

    const project = await client.getProject("team/api");

    expect(project.id).toBe(42);
    const { url, init } = call(0);
    expect(url).toBe(`${API}/projects/team%2Fapi`);
    expect(init).toMatchObject({
      method: "GET",
      headers: { "PRIVATE-TOKEN": "test-secret", "Content-Type": "application/json" },
      body: undefined,
    });
  });

  it("names the operation and carries status and body on API errors", async () => {
    fetchMock.mockImplementationOnce(text(403, '{"message":"403 Forbidden"}'));

    const err = await client.getProject("team/api").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(Error);
    if (!(err instanceof Error)) return;
    expect(err.message).toBe('failed to get project team/api: API request failed with status 403: {"message":"403 Forbidden"}');
    expect(err.cause).toBeInstanceOf(GitLabApiError);
    if (err.cause instanceof GitLabApiError) {
      expect(err.cause.status).toBe(403);
      expect(err.cause.method).toBe("GET");
      expect(err.cause.url).toBe(`${API}/projects/team%2Fapi`);
    }
  });

  it("wraps transport failures", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(client.getProject("team/api")).rejects.toThrow(
      "failed to get project team/api: HTTP request failed: fetch failed",
    );
  });

  it("rejects a body that is not JSON", async () => {
    fetchMock.mockImplementationOnce(text(200, "<html>login</html>"));

    await expect(client.getProject("team/api")).rejects.toThrow(
      /^failed to get project team\/api: failed to unmarshal response: /,
    );
  });

  describe("branchExists", () => {
    it("is true on 200", async () => {
      fetchMock.mockImplementationOnce(json(200, { name: "feature/x" }));

      await expect(client.branchExists(7, "feature/x")).resolves.toBe(true);
      expect(call(0).url).toBe(`${API}/projects/7/repository/branches/feature%2Fx`);
    });

    it("is false on 404", async () => {
      fetchMock.mockImplementationOnce(text(404, '{"message":"404 Branch Not Found"}'));

      await expect(client.branchExists(7, "main")).resolves.toBe(false);
    });

    it("fails on any other status", async () => {
      fetchMock.mockImplementationOnce(text(500, "oops"));

      await expect(client.branchExists(7, "main")).rejects.toThrow(
        "failed to check branch main: API request failed with status 500: oops",
      );
    });
  });

  it("compares with the target as base", async () => {
    fetchMock.mockImplementationOnce(json(200, { commit: null, commits: [], diffs: [] }));

    const compare = await client.compareBranches(7, "stage", "release");

    expect(compare.commits).toEqual([]);
    expect(call(0).url).toBe(`${API}/projects/7/repository/compare?from=release&to=stage`);
  });

  it("finds open merge requests for a branch pair", async () => {
    fetchMock.mockImplementationOnce(json(200, []));

    await expect(client.findOpenMergeRequests(7, "stage", "release")).resolves.toEqual([]);
    expect(call(0).url).toBe(
      `${API}/projects/7/merge_requests?state=opened&source_branch=stage&target_branch=release`,
    );
  });

  it("lists open merge requests by target", async () => {
    fetchMock.mockImplementationOnce(json(200, []));

    await client.listOpenMergeRequestsByTarget(7, "release");

    expect(call(0).url).toBe(`${API}/projects/7/merge_requests?state=opened&target_branch=release`);
  });

  it("creates a merge request with a JSON payload", async () => {
    fetchMock.mockImplementationOnce(json(201, { id: 1, iid: 3, web_url: "https://gitlab.test/x/-/merge_requests/3" }));

    const mr = await client.createMergeRequest(7, "stage", "release", "Merge stage into release", "auto");

    expect(mr.iid).toBe(3);
    const { url, init } = call(0);
    expect(url).toBe(`${API}/projects/7/merge_requests`);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      source_branch: "stage",
      target_branch: "release",
      title: "Merge stage into release",
      description: "auto",
    });
  });

  it("surfaces server-side validation failures on create", async () => {
    fetchMock.mockImplementationOnce(text(409, '{"message":["Another open merge request already exists"]}'));

    await expect(client.createMergeRequest(7, "stage", "release", "t", "d")).rejects.toThrow(
      'failed to create merge request: API request failed with status 409: {"message":["Another open merge request already exists"]}',
    );
  });

  it("accepts a merge request with PUT", async () => {
    fetchMock.mockImplementationOnce(json(200, { iid: 3, state: "merged" }));

    await client.acceptMergeRequest(7, 3);

    expect(call(0).url).toBe(`${API}/projects/7/merge_requests/3/merge`);
    expect(call(0).init?.method).toBe("PUT");
  });

  it("lists topics and projects page by page", async () => {
    fetchMock.mockImplementationOnce(json(200, [])).mockImplementationOnce(json(200, []));

    await client.listTopics(2, 20);
    await client.listProjectsByTopic("backend", 1, 50);

    expect(call(0).url).toBe(`${API}/topics?page=2&per_page=20`);
    expect(call(1).url).toBe(`${API}/projects?topic=backend&page=1&per_page=50`);
  });

  describe("listAllProjectsByTopic", () => {
    it("stops after a short page", async () => {
      fetchMock
        .mockImplementationOnce(json(200, [{ id: 1 }, { id: 2 }]))
        .mockImplementationOnce(json(200, [{ id: 3 }]));

      const projects = await client.listAllProjectsByTopic("backend", 2);

      expect(projects.map((p) => p.id)).toEqual([1, 2, 3]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(call(1).url).toBe(`${API}/projects?topic=backend&page=2&per_page=2`);
    });

    it("stops on an empty page", async () => {
      fetchMock
        .mockImplementationOnce(json(200, [{ id: 1 }, { id: 2 }]))
        .mockImplementationOnce(json(200, []));

      const projects = await client.listAllProjectsByTopic("backend", 2);

      expect(projects).toHaveLength(2);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("collects every project past the first full page", async () => {
      const tagged = Array.from({ length: 150 }, (_, i) => ({ id: i + 1 }));
      fetchMock.mockImplementation(async (input) => {
        const params = new URL(String(input)).searchParams;
        const perPage = Math.min(Number(params.get("per_page")), 100);
        const page = Number(params.get("page"));
        return new Response(JSON.stringify(tagged.slice((page - 1) * perPage, page * perPage)), { status: 200 });
      });

      const projects = await client.listAllProjectsByTopic("backend", 100);

      expect(projects).toHaveLength(150);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("fails the whole listing when a page fails", async () => {
      fetchMock.mockImplementationOnce(json(200, [{ id: 1 }])).mockImplementationOnce(text(502, "bad gateway"));

      await expect(client.listAllProjectsByTopic("backend", 1)).rejects.toThrow(
        "failed to list projects for topic backend: API request failed with status 502: bad gateway",
      );
    });
  });

  it("logs each response at debug level", async () => {
    const lines: string[] = [];
    const logger = createLogger({ format: "jsonl", verbose: true, stream: { write: (s: string) => lines.push(s) } });
    const logged = new GitLabClient({ baseUrl: "https://gitlab.test", token: "test-secret", logger });
    fetchMock.mockImplementationOnce(text(404, ""));

    await logged.branchExists(7, "main");

    expect(JSON.parse(lines[0])).toEqual({
      level: "debug",
      code: "HTTP",
      message: `GET ${API}/projects/7/repository/branches/main -> 404`,
      status: 404,
    });
  });
});
