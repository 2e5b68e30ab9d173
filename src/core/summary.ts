import { STATUS, type ProjectResult, type ProjectStatus, type Summary } from "../types/result.js";

const COUNTER_FOR: Record<ProjectStatus, Exclude<keyof Summary, "total">> = {
  [STATUS.CREATED]: "created",
  [STATUS.SKIPPED_EXISTS]: "skippedExists",
  [STATUS.SKIPPED_DRAFT]: "skippedDraft",
  [STATUS.SKIPPED_NO_BRANCH]: "skippedNoBranch",
  [STATUS.SKIPPED_NO_CHANGE]: "skippedNoChange",
  [STATUS.ERROR]: "errors",
};

export function emptySummary(): Summary {
  return {
    total: 0,
    created: 0,
    skippedExists: 0,
    skippedDraft: 0,
    skippedNoBranch: 0,
    skippedNoChange: 0,
    errors: 0,
  };
}

/** Tally results in one pass. No weighting, no de-duplication by project path. */
export function summarize(results: readonly ProjectResult[]): Summary {
  return results.reduce((summary, result) => {
    const counter = COUNTER_FOR[result.status];
    return { ...summary, total: summary.total + 1, [counter]: summary[counter] + 1 };
  }, emptySummary());
}

/** Skips are successful outcomes; only ERROR results fail a run. */
export function hasFailures(summary: Summary): boolean {
  return summary.errors > 0;
}
