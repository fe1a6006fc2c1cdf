/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  switch (exitCode) {
    case ExitCodes.SUCCESS:
      return 'SUCCESS';
    case ExitCodes.INVALID_ARGS:
      return 'INVALID_ARGS';
    case ExitCodes.NOT_FOUND:
      return 'NOT_FOUND';
    case ExitCodes.GENERAL_ERROR:
      return 'GENERAL_ERROR';
  }
}

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
