import type { GitLabCompare, GitLabMergeRequest, GitLabProject, GitLabTopic } from "../types/gitlab.js";

/**
 * What the reconciler needs from the hosting platform. Every method rejects on
 * transport or API failure, except `branchExists`, which resolves `false` for a
 * branch that does not exist.
 */
export interface MergeRequestGateway {
  getProject(projectPath: string): Promise<GitLabProject>;
  branchExists(projectId: number, branch: string): Promise<boolean>;
  /** Commits that `sourceBranch` adds on top of `targetBranch`. */
  compareBranches(projectId: number, sourceBranch: string, targetBranch: string): Promise<GitLabCompare>;
  findOpenMergeRequests(projectId: number, sourceBranch: string, targetBranch: string): Promise<GitLabMergeRequest[]>;
  createMergeRequest(
    projectId: number,
    sourceBranch: string,
    targetBranch: string,
    title: string,
    description: string,
  ): Promise<GitLabMergeRequest>;
}

export interface TopicGateway {
  listTopics(page: number, perPage: number): Promise<GitLabTopic[]>;
  listProjectsByTopic(topic: string, page: number, perPage: number): Promise<GitLabProject[]>;
  listAllProjectsByTopic(topic: string, perPage: number): Promise<GitLabProject[]>;
}

export interface MergeGateway {
  listAllProjectsByTopic(topic: string, perPage: number): Promise<GitLabProject[]>;
  listOpenMergeRequestsByTarget(projectId: number, targetBranch: string): Promise<GitLabMergeRequest[]>;
  acceptMergeRequest(projectId: number, mergeRequestIid: number): Promise<GitLabMergeRequest>;
}
