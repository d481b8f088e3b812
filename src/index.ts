#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { UsageError } from './utils/errors.js';
import { getVersion } from './utils/package.js';

import { setupReportCommand } from './commands/report.js';
import { setupInodesCommand } from './commands/inodes.js';

/**
 * metalog-audit CLI - Main entry point
 *
 * Audits a METALOG written during system package builds: per-package file
 * counts and sizes, setuid/setgid files, duplicate entries and hard links
 * with conflicting metadata.
 */

const USAGE = 'usage: metalog-audit [report] <metalog path> [--inodes] [--root <dir>] [--config <file>] [--skip-malformed] [--verbose]';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('metalog-audit')
    .description('Audit a METALOG file for package sizes, setuid/setgid files and metadata conflicts')
    .version(getVersion())
    .showHelpAfterError();

  setupReportCommand(program);
  setupInodesCommand(program);

  return program;
}

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('error: an unexpected error occurred; set METALOG_AUDIT_VERBOSE=1 for details');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('error: an unexpected error occurred; set METALOG_AUDIT_VERBOSE=1 for details');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // Without a metalog path there is nothing to analyze
  if (argv.length <= 2) {
    throw new UsageError(USAGE);
  }

  await createProgram().parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('metalog-audit')
  )) {
  run().catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(error.message);
      process.exit(1);
    }
    logger.error('Fatal error in main execution', { error });
    console.error('error: fatal error occurred, exiting');
    process.exit(1);
  });
}
