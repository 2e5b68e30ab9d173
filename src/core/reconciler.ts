import { hasChanges, isDraft } from "../gitlab/draft.js";
import type { Logger } from "../logging/logger.js";
import type { GitLabMergeRequest } from "../types/gitlab.js";
import { STATUS, type ProjectResult, type RunConfig, type Summary } from "../types/result.js";
import type { MergeRequestGateway } from "./gateway.js";
import { summarize } from "./summary.js";

/** Checkpoints reported to the observer while a project is reconciled. */
export type ReconcileEvent =
  | { kind: "check-branches"; project: string }
  | { kind: "check-merge-requests"; project: string }
  | { kind: "compare-branches"; project: string }
  | { kind: "create-merge-request"; project: string; commits: number };

export type ReconcileObserver = (event: ReconcileEvent) => void;

export type ReconcileOutcome = {
  results: ProjectResult[];
  summary: Summary;
};

type Attempt<T> = { ok: true; value: T } | { ok: false; message: string };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function attempt<T>(fn: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (e: unknown) {
    return { ok: false, message: errorMessage(e) };
  }
}

function failed(project: string, message: string): ProjectResult {
  return { project, status: STATUS.ERROR, errorMessage: message };
}

function referencing(mr: GitLabMergeRequest): Pick<ProjectResult, "mergeRequestId" | "mergeRequestIid" | "mergeRequestUrl"> {
  return { mergeRequestId: mr.id, mergeRequestIid: mr.iid, mergeRequestUrl: mr.web_url };
}

export function mergeRequestTitle(origin: string, target: string): string {
  return `Merge ${origin} into ${target}`;
}

export function mergeRequestDescription(origin: string, target: string): string {
  return (
    "This merge request was created automatically by glmr.\n\n" +
    `**Source Branch**: \`${origin}\`\n` +
    `**Target Branch**: \`${target}\``
  );
}

/**
 * Reconciler: decides, per project, whether an origin → target merge request
 * should be opened.
 *
 * Checks run cheapest first and the first terminal answer wins:
 * project → origin branch → target branch → open MRs → compare → create.
 * An existing open MR for the pair (draft or not) always prevents creation,
 * which keeps repeated runs idempotent.
 */
export class Reconciler {
  private readonly gateway: MergeRequestGateway;
  private readonly config: RunConfig;
  private readonly observer?: ReconcileObserver;

  constructor(gateway: MergeRequestGateway, config: RunConfig, observer?: ReconcileObserver) {
    this.gateway = gateway;
    this.config = config;
    this.observer = observer;
  }

  /** Reconcile every configured project, in order, one at a time. */
  async processProjects(): Promise<ReconcileOutcome> {
    const results: ProjectResult[] = [];
    for (const projectPath of this.config.projects) {
      results.push(await this.processProject(projectPath));
    }
    return { results, summary: summarize(results) };
  }

  /** Never rejects: anything thrown while deciding becomes this project's ERROR result. */
  async processProject(projectPath: string): Promise<ProjectResult> {
    try {
      return await this.decide(projectPath);
    } catch (e: unknown) {
      return failed(projectPath, errorMessage(e));
    }
  }

  private async decide(projectPath: string): Promise<ProjectResult> {
    const { originBranch: origin, targetBranch: target } = this.config;

    const project = await attempt(() => this.gateway.getProject(projectPath));
    if (!project.ok) return failed(projectPath, project.message);
    const projectId = project.value.id;

    this.notify({ kind: "check-branches", project: projectPath });

    const originExists = await attempt(() => this.gateway.branchExists(projectId, origin));
    if (!originExists.ok) return failed(projectPath, `failed to check origin branch: ${originExists.message}`);
    if (!originExists.value) {
      return {
        project: projectPath,
        status: STATUS.SKIPPED_NO_BRANCH,
        details: `Origin branch '${origin}' does not exist`,
      };
    }

    const targetExists = await attempt(() => this.gateway.branchExists(projectId, target));
    if (!targetExists.ok) return failed(projectPath, `failed to check target branch: ${targetExists.message}`);
    if (!targetExists.value) {
      return {
        project: projectPath,
        status: STATUS.SKIPPED_NO_BRANCH,
        details: `Target branch '${target}' does not exist`,
      };
    }

    this.notify({ kind: "check-merge-requests", project: projectPath });

    const open = await attempt(() => this.gateway.findOpenMergeRequests(projectId, origin, target));
    if (!open.ok) return failed(projectPath, `failed to find existing merge requests: ${open.message}`);
    if (open.value.length > 0) return this.classifyExisting(projectPath, open.value);

    this.notify({ kind: "compare-branches", project: projectPath });

    const compare = await attempt(() => this.gateway.compareBranches(projectId, origin, target));
    if (!compare.ok) return failed(projectPath, `failed to compare branches: ${compare.message}`);
    if (!hasChanges(compare.value)) {
      return {
        project: projectPath,
        status: STATUS.SKIPPED_NO_CHANGE,
        details: `No changes between ${origin} and ${target}`,
      };
    }

    this.notify({ kind: "create-merge-request", project: projectPath, commits: compare.value.commits.length });

    const created = await attempt(() =>
      this.gateway.createMergeRequest(
        projectId,
        origin,
        target,
        mergeRequestTitle(origin, target),
        mergeRequestDescription(origin, target),
      ),
    );
    if (!created.ok) return failed(projectPath, `failed to create merge request: ${created.message}`);

    const mr = created.value;
    return {
      project: projectPath,
      status: STATUS.CREATED,
      ...referencing(mr),
      details: `MR !${mr.iid}: ${mr.web_url}`,
    };
  }

  /**
   * The first non-draft MR ends the scan. With drafts only, the last draft seen
   * is reported (not the first, not the newest).
   */
  private classifyExisting(projectPath: string, open: GitLabMergeRequest[]): ProjectResult {
    for (const mr of open) {
      if (!isDraft(mr)) {
        return {
          project: projectPath,
          status: STATUS.SKIPPED_EXISTS,
          ...referencing(mr),
          details: `Open MR already exists: !${mr.iid}`,
        };
      }
    }

    // every open MR is a draft; the scan ended on the last one
    const draft = open[open.length - 1];
    return {
      project: projectPath,
      status: STATUS.SKIPPED_DRAFT,
      ...referencing(draft),
      details: `Draft MR exists: !${draft.iid} (${draft.title})`,
    };
  }

  private notify(event: ReconcileEvent): void {
    if (this.config.verbose && this.observer) this.observer(event);
  }
}

/** Observer that reports checkpoints as debug log lines. */
export function logReconcileEvents(logger: Logger): ReconcileObserver {
  return (event) => {
    switch (event.kind) {
      case "check-branches":
        logger.debug("CHECK_BRANCHES", "Checking branches...", { project: event.project });
        break;
      case "check-merge-requests":
        logger.debug("CHECK_MERGE_REQUESTS", "Checking existing merge requests...", { project: event.project });
        break;
      case "compare-branches":
        logger.debug("COMPARE_BRANCHES", "Comparing branches...", { project: event.project });
        break;
      case "create-merge-request":
        logger.debug(
          "CREATE_MERGE_REQUEST",
          `Found ${event.commits} commit(s) with changes, creating merge request...`,
          { project: event.project, commits: event.commits },
        );
        break;
    }
  };
}
