/** GitLab REST v4 payloads, limited to the fields glmr reads. */

export type GitLabProject = {
  id: number;
  name: string;
  path_with_namespace: string;
  web_url: string;
  description: string | null;
  topics: string[];
};

export type GitLabTopic = {
  id: number;
  name: string;
  title: string;
  description: string | null;
  total_projects_count: number;
};

export type MergeRequestState = "opened" | "closed" | "merged" | "locked";

export type GitLabMergeRequest = {
  id: number;
  iid: number;
  project_id: number;
  title: string;
  web_url: string;
  state: MergeRequestState;
  draft: boolean;
  source_branch: string;
  target_branch: string;
};

export type GitLabCommit = {
  id: string;
  short_id: string;
  title: string;
};

export type GitLabDiff = {
  old_path: string;
  new_path: string;
  a_mode: string;
  b_mode: string;
  new_file: boolean;
  renamed_file: boolean;
  deleted_file: boolean;
};

/** Response of `GET /projects/:id/repository/compare`. */
export type GitLabCompare = {
  commit: GitLabCommit | null;
  commits: GitLabCommit[];
  diffs: GitLabDiff[];
};
