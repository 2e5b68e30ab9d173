/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  INVALID_ARGS: 2,
  FETCH_FAILED: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
