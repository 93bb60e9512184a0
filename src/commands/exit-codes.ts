/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  RUN_ABORTED: 2,
  INVALID_ARGS: 3,
  INPUT_INVALID: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
