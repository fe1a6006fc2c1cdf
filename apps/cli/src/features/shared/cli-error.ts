import pc from 'picocolors';

import { exitCodeToErrorCode, exitWithCode, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The input file was not found. Double-check the path and try again.',
};

/**
 * Format a CLI error for stderr, with a tip for the error code when there is one
 */
export function formatCliError(error: Error, exitCode: ExitCode): string {
  let text = `\n${pc.red('✗')} Error: ${error.message}\n`;

  const tip = ERROR_TIPS[exitCodeToErrorCode(exitCode)];
  if (tip) {
    text += `\n${pc.dim(tip)}\n`;
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    text += `\n${pc.dim(error.stack)}\n\n`;
  }

  return text;
}

/**
 * Display a CLI error on stderr and exit.
 *
 * stdout is left untouched so it only ever carries command output.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  process.stderr.write(formatCliError(error, exitCode));
  exitWithCode(exitCode);
}
