#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import * as path from 'path';
import { isDirectory } from './utils/fs.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupAnalyzeCommand } from './commands/analyze.js';
import { setupRestoreCommand } from './commands/restore.js';

/**
 * luarestore CLI - Main entry point
 *
 * Restores decompiled Lua files in dependency order.
 */

const VERSION = '0.3.0';

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('luarestore')
  .description('Restore decompiled Lua sources in dependency order')
  .version(VERSION)
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'log discovery details')
  .configureHelp({
    sortSubcommands: true
  });

setupAnalyzeCommand(program);
setupRestoreCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string; verbose?: boolean }>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  // Only validate --cwd if provided (no directory changes)
  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    if (!(await isDirectory(resolvedCwd))) {
      logger.error('Invalid --cwd provided', { cwd: opts.cwd, resolved: resolvedCwd });
      console.error(`Invalid --cwd '${opts.cwd}': directory must exist`);
      process.exit(1);
    }
    logger.info(`Working directory will be: ${resolvedCwd}`);
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // If no arguments provided, show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('luarestore')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
