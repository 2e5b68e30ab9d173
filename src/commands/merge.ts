import type { MergeGateway } from "../core/gateway.js";
import { isDraft } from "../gitlab/draft.js";
import type { GitLabMergeRequest, GitLabProject } from "../types/gitlab.js";
import { EXIT } from "./exit-codes.js";
import { checkPerPage } from "./paging.js";

export type MergeCandidate = {
  project: GitLabProject;
  mergeRequest: GitLabMergeRequest;
};

/** `quit` means the input is gone (EOF); no further prompts are made. */
export type MergeDecision = "merge" | "skip" | "quit";

export type ConfirmMerge = (candidate: MergeCandidate) => Promise<MergeDecision>;

export type MergeEvent =
  | { kind: "merged"; candidate: MergeCandidate }
  | { kind: "skipped"; candidate: MergeCandidate }
  | { kind: "merge-failed"; candidate: MergeCandidate; error: string }
  | { kind: "list-failed"; project: GitLabProject; error: string };

export type MergeSummary = {
  projects: number;
  merged: number;
  skipped: number;
  errors: number;
};

export type MergeOpts = {
  target?: string;
  topic?: string;
  perPage: number;
};

export type MergeResult =
  | { ok: true; summary: MergeSummary; exitCode: number }
  | { ok: false; error: string; exitCode: number };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** `y` / `yes`, any case and surrounding whitespace, accepts; anything else skips. */
export function parseAnswer(answer: string): MergeDecision {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes" ? "merge" : "skip";
}

/**
 * Walk every project of a topic and offer each open, non-draft MR into
 * `target` for merging, one confirmation at a time.
 */
export async function mergeInteractive(
  opts: MergeOpts,
  gateway: MergeGateway,
  confirm: ConfirmMerge,
  onEvent: (event: MergeEvent) => void = () => undefined,
): Promise<MergeResult> {
  const target = opts.target?.trim();
  const topic = opts.topic?.trim();
  if (!target || !topic) {
    return { ok: false, error: "both --target and --topic are required", exitCode: EXIT.INVALID_ARGS };
  }

  const invalid = checkPerPage(opts.perPage);
  if (invalid) return { ok: false, error: invalid, exitCode: EXIT.INVALID_ARGS };

  let projects: GitLabProject[];
  try {
    projects = await gateway.listAllProjectsByTopic(topic, opts.perPage);
  } catch (e: unknown) {
    return { ok: false, error: `Failed to fetch projects: ${errorMessage(e)}`, exitCode: EXIT.FETCH_FAILED };
  }

  const summary: MergeSummary = { projects: projects.length, merged: 0, skipped: 0, errors: 0 };

  outer: for (const project of projects) {
    let open: GitLabMergeRequest[];
    try {
      open = await gateway.listOpenMergeRequestsByTarget(project.id, target);
    } catch (e: unknown) {
      summary.errors++;
      onEvent({ kind: "list-failed", project, error: errorMessage(e) });
      continue;
    }

    for (const mergeRequest of open.filter((mr) => !isDraft(mr))) {
      const candidate = { project, mergeRequest };
      const decision = await confirm(candidate);

      if (decision === "quit") break outer;

      if (decision === "skip") {
        summary.skipped++;
        onEvent({ kind: "skipped", candidate });
        continue;
      }

      try {
        await gateway.acceptMergeRequest(project.id, mergeRequest.iid);
        summary.merged++;
        onEvent({ kind: "merged", candidate });
      } catch (e: unknown) {
        summary.errors++;
        onEvent({ kind: "merge-failed", candidate, error: errorMessage(e) });
      }
    }
  }

  return { ok: true, summary, exitCode: summary.errors > 0 ? EXIT.RUN_FAILED : EXIT.SUCCESS };
}
