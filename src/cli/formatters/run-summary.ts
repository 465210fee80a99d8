/**
 * Run Summary Formatters
 *
 * CLI output formatters for pipeline runs including:
 * - Final run report (success, failure, cancellation)
 * - Dry-run command plan
 * - Checkpointed run state for the status command
 * - Per-stage timing breakdown
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { RunReport } from '../../pipeline/orchestrator.js';
import { lastResultFor, type RunState, type StageResult } from '../../schemas/run-state.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Helpers
// ============================================================================

const STATUS_LABELS: Record<RunState['status'], string> = {
  pending: 'PENDING',
  running: 'RUNNING',
  succeeded: 'SUCCEEDED',
  failed: 'FAILED',
  'partially-completed': 'PARTIALLY COMPLETED',
};

function colorStatus(status: RunState['status']): string {
  const label = STATUS_LABELS[status];
  switch (status) {
    case 'succeeded':
      return chalk.green(label);
    case 'failed':
      return chalk.red(label);
    case 'partially-completed':
    case 'running':
      return chalk.yellow(label);
    case 'pending':
      return chalk.dim(label);
  }
}

/**
 * Indent every line of a captured output tail.
 */
function indentTail(tail: string, prefix = '    '): string[] {
  return tail
    .replace(/\n$/, '')
    .split('\n')
    .map((line) => `${prefix}${line}`);
}

// ============================================================================
// Run Report
// ============================================================================

/**
 * Format the final report of a run.
 *
 * @example
 * ```
 * === Run Failed ===
 * Run:      sample-42
 * Status:   FAILED (retries-exhausted)
 * Duration: 3m 12s
 * Stages:   1 executed, 2 skipped
 *
 * Failed stage: realign-signal (3 attempts)
 * Error:        Stage "realign-signal" failed after 3 attempt(s): nanopolish exited with code 1
 * Command:      /opt/conda/envs/nanopolish/bin/nanopolish eventalign ...
 * stderr (tail):
 *     [eventalign] error: index file not found
 *
 * Re-run with the same run id to resume from realign-signal.
 * ```
 */
export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [];

  const title =
    report.status === 'succeeded'
      ? chalk.green('=== Run Succeeded ===')
      : report.status === 'failed'
        ? chalk.red('=== Run Failed ===')
        : chalk.yellow('=== Run Stopped ===');
  lines.push(chalk.bold(title));
  lines.push(`Run:      ${chalk.cyan(report.runId)}`);
  lines.push(`Status:   ${colorStatus(report.status)} (${report.cause})`);
  lines.push(`Duration: ${formatDuration(report.durationMs)}`);
  lines.push(
    `Stages:   ${report.stagesExecuted.length} executed, ${report.stagesSkipped.length} skipped`
  );

  if (report.configChanged) {
    lines.push(chalk.yellow('Note:     configuration changed since this run started'));
  }

  if (report.failedStage !== null) {
    lines.push('');
    lines.push(
      `Failed stage: ${chalk.bold(report.failedStage)} (${report.attempts} attempt${
        report.attempts === 1 ? '' : 's'
      })`
    );
  } else if (report.error !== null) {
    lines.push('');
  }

  if (report.error !== null) {
    lines.push(`Error:        ${report.error.message}`);
  }

  const last = report.lastResult;
  if (last !== null && last.outcome !== 'succeeded' && report.status !== 'succeeded') {
    if (last.command !== null) {
      lines.push(`Command:      ${last.command}`);
    }
    if (last.stderrTail.length > 0) {
      lines.push(chalk.dim('stderr (tail):'));
      lines.push(...indentTail(last.stderrTail));
    }
    if (last.stdoutTail.length > 0) {
      lines.push(chalk.dim('stdout (tail):'));
      lines.push(...indentTail(last.stdoutTail));
    }
  }

  if (report.manifestPath !== null) {
    lines.push('');
    lines.push(`Manifest: ${report.manifestPath}`);
  }

  const resumePoint = report.state?.resumePoint ?? null;
  if (report.status !== 'succeeded' && resumePoint !== null && report.cause !== 'persistence-error') {
    lines.push('');
    lines.push(chalk.dim(`Re-run with the same run id to resume from ${resumePoint}.`));
  }

  return lines.join('\n');
}

/**
 * Format the commands a dry run would execute.
 */
export function formatDryRunPlan(report: RunReport): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`=== Dry Run: ${report.runId} ===`));
  if (report.stagesSkipped.length > 0) {
    lines.push(chalk.dim(`Skipping (already succeeded): ${report.stagesSkipped.join(', ')}`));
  }

  let current: string | null = null;
  for (const planned of report.plannedCommands) {
    if (planned.stage !== current) {
      current = planned.stage;
      lines.push('');
      lines.push(`${chalk.bold(planned.stage)} ${chalk.dim(`[${planned.contextId}]`)}`);
    }
    lines.push(`  $ ${planned.command}`);
  }

  if (report.plannedCommands.length === 0 && report.error === null) {
    lines.push('');
    lines.push('Nothing to do: every stage already succeeded.');
  }

  if (report.error !== null) {
    lines.push('');
    lines.push(chalk.red(`Error: ${report.error.message}`));
  }

  return lines.join('\n');
}

/**
 * Format a compact one-line run status.
 *
 * @example
 * ```
 * sample-42: SUCCEEDED (5 executed, 0 skipped, 2h 3m)
 * ```
 */
export function formatRunStatusLine(report: RunReport): string {
  return `${report.runId}: ${colorStatus(report.status)} (${report.stagesExecuted.length} executed, ${
    report.stagesSkipped.length
  } skipped, ${formatDuration(report.durationMs)})`;
}

// ============================================================================
// Run State
// ============================================================================

function describeResult(result: StageResult | undefined): string {
  if (result === undefined) {
    return chalk.dim('not started');
  }
  const attempt = `attempt ${result.attempt}`;
  switch (result.outcome) {
    case 'succeeded':
      return chalk.green(`succeeded (${attempt}, ${formatDuration(result.durationMs)})`);
    case 'cancelled':
      return chalk.yellow(`cancelled (${attempt})`);
    default:
      return chalk.red(`${result.outcome} (${attempt}): ${result.error?.message ?? 'no detail'}`);
  }
}

/**
 * Format a checkpointed run state, one line per stage.
 *
 * @param stageOrder - Stage names in execution order
 */
export function formatRunState(state: RunState, stageOrder: readonly string[]): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`=== Run ${state.runId} ===`));
  lines.push(`Status:       ${colorStatus(state.status)}`);
  lines.push(`Resume point: ${state.resumePoint ?? '-'}`);
  lines.push(`Invocations:  ${state.invocations}`);
  lines.push(`Updated:      ${state.updatedAt}`);
  lines.push('');

  const width = Math.max(...stageOrder.map((name) => name.length), 5);
  for (const name of stageOrder) {
    lines.push(`  ${name.padEnd(width)}  ${describeResult(lastResultFor(state, name))}`);
  }

  if (state.lastError !== null) {
    lines.push('');
    const where = state.lastError.stage !== null ? ` [${state.lastError.stage}]` : '';
    lines.push(chalk.red(`Last error${where}: ${state.lastError.message}`));
  }

  return lines.join('\n');
}

/**
 * Format per-stage timing of the latest attempt of each stage.
 */
export function formatTimingBreakdown(state: RunState, stageOrder: readonly string[]): string {
  const lines: string[] = [];
  const durations = stageOrder.map((name) => ({
    name,
    durationMs: lastResultFor(state, name)?.durationMs ?? 0,
  }));
  const total = durations.reduce((sum, entry) => sum + entry.durationMs, 0);
  const maxDuration = Math.max(...durations.map((entry) => entry.durationMs), 1);
  const barWidth = 30;

  lines.push(chalk.bold('=== Timing Breakdown ==='));
  lines.push('');

  for (const { name, durationMs } of durations) {
    const percentage = total > 0 ? Math.round((durationMs / total) * 100) : 0;
    const bar = chalk.green('█'.repeat(Math.round((durationMs / maxDuration) * barWidth)));
    lines.push(`${name.padEnd(20)} ${bar} ${formatDuration(durationMs).padStart(8)} (${percentage}%)`);
  }

  lines.push('');
  lines.push(`${'Total'.padEnd(20)} ${' '.repeat(barWidth)} ${formatDuration(total)}`);

  return lines.join('\n');
}
