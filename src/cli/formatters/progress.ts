/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { formatStageNumber, type StageDescriptor } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Write to this stream instead of stdout */
  stream?: NodeJS.WriteStream;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading checkpoint...');
 * spinner.start();
 * try {
 *   await store.load(runId);
 *   spinner.succeed('Checkpoint loaded');
 * } catch (err) {
 *   spinner.fail('Cannot load checkpoint');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const stream = options.stream ?? process.stdout;
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: stream.isTTY === true,
      stream,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  /**
   * Clear the current spinner frame so other output can be printed.
   */
  clear(): this {
    this.spinner.clear();
    return this;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * On a TTY each running stage gets a spinner; otherwise one plain line is
 * printed per transition so logs stay greppable.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay(registry.getOrderedStages());
 * progress.startStage('basecall', 1);
 * progress.failStage('basecall', 'dorado exited with code 1', true);
 * progress.startStage('basecall', 2);
 * progress.completeStage('basecall', 61_000);
 * ```
 */
export class StageProgressDisplay {
  private labels = new Map<string, string>();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(descriptors: readonly StageDescriptor[], isTTY = process.stdout.isTTY === true) {
    this.isTTY = isTTY;
    for (const descriptor of descriptors) {
      this.labels.set(descriptor.name, `Stage ${formatStageNumber(descriptor.ordinal)} ${descriptor.name}`);
    }
  }

  startStage(name: string, attempt: number): void {
    const label = this.labels.get(name);
    if (label === undefined) return;

    const text = attempt > 1 ? `${label} (attempt ${attempt})...` : `${label}...`;

    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(text);
      this.currentSpinner.start();
    } else {
      console.log(`[*] ${text}`);
    }
  }

  completeStage(name: string, durationMs: number): void {
    const label = this.labels.get(name);
    if (label === undefined) return;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${label} complete`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] ${label} (${formatDuration(durationMs)})`);
    }
  }

  /**
   * Report a failed attempt; one that will be retried is shown as a warning.
   */
  failStage(name: string, error: string, willRetry = false): void {
    const label = this.labels.get(name);
    if (label === undefined) return;

    const text = `${label} ${willRetry ? 'attempt failed, retrying' : 'failed'}: ${error}`;

    if (this.currentSpinner) {
      if (willRetry) {
        this.currentSpinner.warn(text);
      } else {
        this.currentSpinner.fail(text);
      }
      this.currentSpinner = null;
    } else {
      console.log(`[X] ${text}`);
    }
  }

  skipStage(name: string): void {
    const label = this.labels.get(name);
    if (label === undefined) return;

    if (!this.isTTY) {
      console.log(`[-] ${label} (already succeeded)`);
    }
  }

  /**
   * Stop any running spinner without marking the stage (cancellation).
   */
  interrupt(): void {
    if (this.currentSpinner) {
      this.currentSpinner.stop();
      this.currentSpinner = null;
    }
  }

  /**
   * Clear the spinner frame before writing tool output.
   */
  clearLine(): void {
    this.currentSpinner?.clear();
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(450);     // '450ms'
 * formatDuration(12_300);  // '12.3s'
 * formatDuration(125_000); // '2m 5s'
 * formatDuration(7_380_000); // '2h 3m'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    const remainingSeconds = Math.round(seconds % 60);
    return `${minutes}m ${remainingSeconds}s`;
  }

  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}
