import type { GitLabCompare, GitLabMergeRequest } from "../types/gitlab.js";

const DRAFT_PREFIXES = ["draft:", "wip:"];

/**
 * A merge request is a draft when GitLab flags it as one, or when its title
 * carries the legacy `Draft:` / `WIP:` prefix (any case, leading whitespace ignored).
 */
export function isDraft(mr: Pick<GitLabMergeRequest, "draft" | "title">): boolean {
  if (mr.draft) return true;

  const title = mr.title.trim().toLowerCase();
  return DRAFT_PREFIXES.some((prefix) => title.startsWith(prefix));
}

/** Commits decide; file diffs are not consulted. */
export function hasChanges(compare: Pick<GitLabCompare, "commits">): boolean {
  return compare.commits.length > 0;
}
