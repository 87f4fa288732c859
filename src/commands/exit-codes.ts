/**
 * CLI exit codes. Unexpected errors escape to the CLI's top-level handler and
 * exit 1.
 */
export const EXIT = {
  SUCCESS: 0,
  DRIFT_DETECTED: 1,
  ACTION_FAILED: 2,
  INVALID_ARGS: 3,
  SANDBOX_UNAVAILABLE: 4,
  LOCK_FILE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
