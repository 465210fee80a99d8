/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Mapping run reports and errors to exit codes
 * - Output utilities (log, warn, error)
 * - A pipeline Logger backed by the same output
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ModpipeError } from '../errors.js';
import type { RunReport } from '../pipeline/orchestrator.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  /** Every stage succeeded (or a dry run planned cleanly) */
  SUCCESS: 0,
  /** A stage failed after exhausting retries, or a checkpoint could not be written */
  FAILED: 1,
  /** Fatal configuration error */
  CONFIG_ERROR: 2,
  /** Cancelled; the run is partially completed and resumable */
  PARTIAL: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a run report, or an error thrown before a report existed, to an exit code.
 *
 * A run locked by another writer is reported as a configuration error: two
 * invocations pointing at one run id is an operator mistake, not a failure
 * of the run itself.
 */
export function exitCodeFor(outcome: unknown): ExitCode {
  if (isRunReport(outcome)) {
    switch (outcome.cause) {
      case 'completed':
        return EXIT_CODES.SUCCESS;
      case 'retries-exhausted':
      case 'persistence-error':
        return EXIT_CODES.FAILED;
      case 'configuration-error':
        return EXIT_CODES.CONFIG_ERROR;
      case 'cancelled':
        return EXIT_CODES.PARTIAL;
    }
  }

  if (outcome instanceof ModpipeError) {
    if (outcome.kind === 'configuration' || outcome.code === 'RUN_LOCKED') {
      return EXIT_CODES.CONFIG_ERROR;
    }
  }
  return EXIT_CODES.FAILED;
}

function isRunReport(value: unknown): value is RunReport {
  return (
    typeof value === 'object' &&
    value !== null &&
    'cause' in value &&
    'runId' in value &&
    'stagesExecuted' in value
  );
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access
 * consistent logging and options.
 *
 * @example
 * ```typescript
 * async function statusHandler(runId: string, options: StatusOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   base.section(`Run ${runId}`);
 *   base.keyValue('Status', state.status);
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Pipeline logger writing through this command's output */
  readonly logger: Logger;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }

    this.logger = {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => this.error(message, ...args),
    };
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible). In verbose mode an Error
   * argument also prints its stack.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`));
    if (this.options.verbose) {
      for (const arg of args) {
        if (arg instanceof Error) {
          console.error(chalk.dim(arg.stack ?? arg.message));
        }
      }
    }
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON (visible in quiet mode too).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a BaseCommand from global options.
 */
export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @returns The stored BaseCommand, or a default one when none was set (tests)
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
