import type { MergeRequestGateway } from "../core/gateway.js";
import { expandProjectPaths } from "../core/projects.js";
import { Reconciler, type ReconcileObserver } from "../core/reconciler.js";
import { hasFailures } from "../core/summary.js";
import type { ProjectResult, RunConfig, Summary } from "../types/result.js";
import { EXIT } from "./exit-codes.js";

export type BulkMrOpts = {
  origin?: string;
  target?: string;
  projects: string[];
  group?: string;
  verbose?: boolean;
};

export type BulkMrResult =
  | { ok: true; results: ProjectResult[]; summary: Summary; exitCode: number }
  | { ok: false; error: string; exitCode: number };

export type RunHooks = {
  observer?: ReconcileObserver;
  /** Called once the final project list is known, before any project is reconciled. */
  onProjectsResolved?: (projects: readonly string[]) => void;
};

export type RunConfigResult =
  | { ok: true; config: RunConfig }
  | { ok: false; error: string };

/** Check the branch pair before anything is sent to GitLab. */
export function validateBranches(origin?: string, target?: string):
  | { ok: true; origin: string; target: string }
  | { ok: false; error: string } {
  if (origin === undefined || origin.trim() === "") return { ok: false, error: "--origin is required" };
  if (target === undefined || target.trim() === "") return { ok: false, error: "--target is required" };
  return { ok: true, origin, target };
}

export function buildRunConfig(opts: BulkMrOpts): RunConfigResult {
  const branches = validateBranches(opts.origin, opts.target);
  if (!branches.ok) return branches;

  if (opts.projects.length === 0) {
    return { ok: false, error: "at least one --project is required" };
  }

  return {
    ok: true,
    config: {
      originBranch: branches.origin,
      targetBranch: branches.target,
      projects: expandProjectPaths(opts.projects, opts.group),
      verbose: opts.verbose ?? false,
    },
  };
}

/** Reconcile an already-validated run; exit code reflects ERROR results only. */
export async function reconcile(
  config: RunConfig,
  gateway: MergeRequestGateway,
  observer?: ReconcileObserver,
): Promise<BulkMrResult> {
  const { results, summary } = await new Reconciler(gateway, config, observer).processProjects();
  return {
    ok: true,
    results,
    summary,
    exitCode: hasFailures(summary) ? EXIT.RUN_FAILED : EXIT.SUCCESS,
  };
}

/**
 * Open origin → target merge requests across an explicit list of projects.
 */
export async function bulkMr(
  opts: BulkMrOpts,
  gateway: MergeRequestGateway,
  hooks: RunHooks = {},
): Promise<BulkMrResult> {
  const built = buildRunConfig(opts);
  if (!built.ok) return { ok: false, error: built.error, exitCode: EXIT.INVALID_ARGS };

  hooks.onProjectsResolved?.(built.config.projects);
  return reconcile(built.config, gateway, hooks.observer);
}
