import type { MergeRequestGateway, TopicGateway } from "../core/gateway.js";
import { excludeProjectPaths } from "../core/projects.js";
import { emptySummary } from "../core/summary.js";
import type { ProjectResult, Summary } from "../types/result.js";
import { reconcile, validateBranches, type RunHooks } from "./bulk-mr.js";
import { EXIT } from "./exit-codes.js";
import { checkPerPage } from "./paging.js";

export type BulkMrTopicOpts = {
  origin?: string;
  target?: string;
  topic?: string;
  perPage: number;
  exclude?: string[];
  verbose?: boolean;
};

export type BulkMrTopicResult =
  | { ok: true; projects: string[]; results: ProjectResult[]; summary: Summary; exitCode: number }
  | { ok: false; error: string; exitCode: number };

/**
 * Open origin → target merge requests for every project tagged with a topic.
 */
export async function bulkMrTopic(
  opts: BulkMrTopicOpts,
  gateway: MergeRequestGateway & Pick<TopicGateway, "listAllProjectsByTopic">,
  hooks: RunHooks = {},
): Promise<BulkMrTopicResult> {
  const branches = validateBranches(opts.origin, opts.target);
  if (!branches.ok) return { ok: false, error: branches.error, exitCode: EXIT.INVALID_ARGS };

  const topic = opts.topic?.trim();
  if (!topic) return { ok: false, error: "--topic is required", exitCode: EXIT.INVALID_ARGS };

  const invalid = checkPerPage(opts.perPage);
  if (invalid) return { ok: false, error: invalid, exitCode: EXIT.INVALID_ARGS };

  let paths: string[];
  try {
    const projects = await gateway.listAllProjectsByTopic(topic, opts.perPage);
    paths = excludeProjectPaths(
      projects.map((p) => p.path_with_namespace),
      opts.exclude ?? [],
    );
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Error fetching projects: ${message}`, exitCode: EXIT.FETCH_FAILED };
  }

  hooks.onProjectsResolved?.(paths);

  if (paths.length === 0) {
    return {
      ok: true,
      projects: [],
      results: [],
      summary: emptySummary(),
      exitCode: EXIT.SUCCESS,
    };
  }

  const config = {
    originBranch: branches.origin,
    targetBranch: branches.target,
    projects: paths,
    verbose: opts.verbose ?? false,
  };
  const res = await reconcile(config, gateway, hooks.observer);
  if (!res.ok) return res;
  return { ...res, projects: paths };
}
