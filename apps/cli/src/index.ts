#!/usr/bin/env node
import { getLogger } from '@txledger/logger';
import { Command, CommanderError } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('txledger')
    .description('Apply deposits, withdrawals and disputes to client accounts')
    .version('0.1.0')
    // Commander reports usage errors itself; only the exit code is ours
    .exitOverride();

  registerProcessCommand(program);

  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof CommanderError) {
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    }
    throw error;
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(ExitCodes.GENERAL_ERROR);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(ExitCodes.GENERAL_ERROR);
});
