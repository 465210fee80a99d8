#!/usr/bin/env node
/**
 * modpipe CLI
 *
 * Main entry point for the modpipe command.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   modpipe --help
 *   modpipe run --config run.json
 *   modpipe run --config run.json --from-stage align
 *   modpipe status sample-42 --output-dir /data/sample-42
 *   modpipe stages
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('modpipe')
    .description('Checkpointed runner for the nanopore RNA modification calling workflow')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    // Subcommands read it back through getBaseCommand
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags');
      process.exit(EXIT_CODES.CONFIG_ERROR);
    }
  });

  registerCommands(program);

  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.CONFIG_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command; commands set
 * process.exitCode themselves.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exitCode = EXIT_CODES.FAILED;
  }
}

if (require.main === module) {
  void main();
}
