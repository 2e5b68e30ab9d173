import type { TopicGateway } from "../core/gateway.js";
import type { GitLabProject, GitLabTopic } from "../types/gitlab.js";
import { EXIT } from "./exit-codes.js";
import { checkPage } from "./paging.js";

export type PageOpts = {
  page: number;
  perPage: number;
};

export type TopicsResult =
  | { ok: true; topics: GitLabTopic[] }
  | { ok: false; error: string; exitCode: number };

export type ProjectsResult =
  | { ok: true; topic: string; projects: GitLabProject[] }
  | { ok: false; error: string; exitCode: number };

/** One page of instance topics. */
export async function listTopics(opts: PageOpts, gateway: Pick<TopicGateway, "listTopics">): Promise<TopicsResult> {
  const invalid = checkPage(opts.page, opts.perPage);
  if (invalid) return { ok: false, error: invalid, exitCode: EXIT.INVALID_ARGS };

  try {
    return { ok: true, topics: await gateway.listTopics(opts.page, opts.perPage) };
  } catch (e: unknown) {
    return { ok: false, error: `Error fetching topics: ${e instanceof Error ? e.message : String(e)}`, exitCode: EXIT.FETCH_FAILED };
  }
}

/** One page of the projects tagged with a topic. */
export async function listProjects(
  opts: PageOpts & { topic?: string },
  gateway: Pick<TopicGateway, "listProjectsByTopic">,
): Promise<ProjectsResult> {
  const topic = opts.topic?.trim();
  if (!topic) return { ok: false, error: "--topic is required", exitCode: EXIT.INVALID_ARGS };

  const invalid = checkPage(opts.page, opts.perPage);
  if (invalid) return { ok: false, error: invalid, exitCode: EXIT.INVALID_ARGS };

  try {
    return { ok: true, topic, projects: await gateway.listProjectsByTopic(topic, opts.page, opts.perPage) };
  } catch (e: unknown) {
    return { ok: false, error: `Error fetching projects: ${e instanceof Error ? e.message : String(e)}`, exitCode: EXIT.FETCH_FAILED };
  }
}
