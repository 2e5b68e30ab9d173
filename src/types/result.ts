export const STATUS = {
  CREATED: "CREATED",
  SKIPPED_EXISTS: "SKIPPED_EXISTS",
  SKIPPED_DRAFT: "SKIPPED_DRAFT",
  SKIPPED_NO_BRANCH: "SKIPPED_NO_BRANCH",
  SKIPPED_NO_CHANGE: "SKIPPED_NO_CHANGE",
  ERROR: "ERROR",
} as const;

export type ProjectStatus = (typeof STATUS)[keyof typeof STATUS];

/** Outcome of reconciling one project. Only the fields relevant to `status` are set. */
export type ProjectResult = {
  project: string;
  status: ProjectStatus;
  mergeRequestId?: number;
  mergeRequestIid?: number;
  mergeRequestUrl?: string;
  details?: string;
  errorMessage?: string;
};

export type Summary = {
  total: number;
  created: number;
  skippedExists: number;
  skippedDraft: number;
  skippedNoBranch: number;
  skippedNoChange: number;
  errors: number;
};

export type RunConfig = {
  readonly originBranch: string;
  readonly targetBranch: string;
  readonly projects: readonly string[];
  readonly verbose: boolean;
};
