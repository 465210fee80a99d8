/**
 * Run Command
 *
 * Starts a run, or resumes it when the run id already has a checkpoint.
 * SIGINT/SIGTERM cancel the active tool; the run is left
 * partially-completed and resumable.
 *
 * @module cli/commands/run
 */

import { Command } from 'commander';
import { getBaseCommand, exitCodeFor, type BaseCommand, type ExitCode } from '../base-command.js';
import { StageProgressDisplay } from '../formatters/progress.js';
import { formatDryRunPlan, formatRunStatusLine, formatRunSummary } from '../formatters/run-summary.js';
import { errorMessage } from '../../errors.js';
import type { RunConfigOverrides } from '../../config/index.js';
import {
  createOrchestrator,
  type OrchestratorCallbacks,
  type PipelineOrchestrator,
} from '../../pipeline/orchestrator.js';
import {
  loadConfigFromOptions,
  parseNonNegativeInt,
  parsePositiveInt,
  type ConfigOptions,
} from './shared.js';

// ============================================================================
// Types
// ============================================================================

export interface RunCommandOptions extends ConfigOptions {
  runId?: string;
  inputDir?: string;
  reference?: string;
  outputDir?: string;
  checkpointDir?: string;
  threads?: number;
  timeout?: number;
  maxAttempts?: number;
  backoff?: number;
  fromStage?: string;
  dryRun?: boolean;
  /** Echo tool output live (implied by --verbose) */
  showOutput?: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

function toOverrides(options: RunCommandOptions): RunConfigOverrides {
  return {
    runId: options.runId,
    inputDir: options.inputDir,
    reference: options.reference,
    outputDir: options.outputDir,
    checkpointDir: options.checkpointDir,
    threads: options.threads,
    stageTimeoutMs: options.timeout !== undefined ? options.timeout * 1000 : undefined,
    maxAttempts: options.maxAttempts,
    retryBackoffMs: options.backoff !== undefined ? options.backoff * 1000 : undefined,
  };
}

/**
 * Progress callbacks: a spinner per stage, or nothing in quiet mode.
 */
function createCallbacks(
  orchestrator: PipelineOrchestrator,
  base: BaseCommand,
  showOutput: boolean
): { callbacks: OrchestratorCallbacks; progress: StageProgressDisplay | null } {
  if (base.isQuiet()) {
    return { callbacks: {}, progress: null };
  }

  const progress = new StageProgressDisplay(orchestrator.registry.getOrderedStages());
  const callbacks: OrchestratorCallbacks = {
    onStageSkip: (stage) => progress.skipStage(stage.name),
    onStageStart: (stage, attempt) => progress.startStage(stage.name, attempt),
    onCommandStart: (_stage, command) => base.debug(`$ ${command}`),
    onStageComplete: (stage, result) => progress.completeStage(stage.name, result.durationMs),
    onAttemptFailed: (stage, result, willRetry) =>
      progress.failStage(stage.name, result.error?.message ?? result.outcome, willRetry),
  };

  if (showOutput) {
    callbacks.onOutput = (_stage, stream, chunk) => {
      progress.clearLine();
      (stream === 'stdout' ? process.stdout : process.stderr).write(chunk);
    };
  }

  return { callbacks, progress };
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Execute the run command.
 *
 * @returns The process exit code
 */
export async function handleRun(
  options: RunCommandOptions,
  base: BaseCommand,
  signal?: AbortSignal
): Promise<ExitCode> {
  let orchestrator: PipelineOrchestrator;
  try {
    const loaded = await loadConfigFromOptions(options, toOverrides(options));
    base.debug(`Configuration: ${loaded.configPath ?? '(command line only)'}`);
    base.debug(`Checkpoints:   ${loaded.checkpointRoot}`);
    orchestrator = createOrchestrator(loaded, { logger: base.logger });
  } catch (error) {
    base.error(errorMessage(error), error);
    return exitCodeFor(error);
  }

  const { callbacks, progress } = createCallbacks(
    orchestrator,
    base,
    options.showOutput === true || base.isVerbose()
  );

  try {
    const report = await orchestrator.execute({
      signal,
      fromStage: options.fromStage,
      dryRun: options.dryRun,
      callbacks,
    });
    progress?.interrupt();

    if (report.dryRun) {
      console.log(formatDryRunPlan(report));
    } else if (base.isQuiet()) {
      console.log(formatRunStatusLine(report));
    } else {
      base.blank();
      console.log(formatRunSummary(report));
    }
    return exitCodeFor(report);
  } catch (error) {
    progress?.interrupt();
    base.error(errorMessage(error), error);
    return exitCodeFor(error);
  }
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run (or resume) the modification calling pipeline')
    .option('-c, --config <path>', 'Run configuration file (JSON)')
    .option('--run-id <id>', 'Run identifier; reusing one resumes that run')
    .option('--input-dir <path>', 'Directory of raw signal files')
    .option('--reference <path>', 'Reference transcript FASTA')
    .option('--output-dir <path>', 'Output root for every artifact')
    .option('--checkpoint-dir <path>', 'Checkpoint root (default: <output-dir>/.modpipe)')
    .option('-t, --threads <count>', 'Threads passed to each tool', parsePositiveInt)
    .option('--timeout <seconds>', 'Per-command timeout in seconds', parsePositiveInt)
    .option('--max-attempts <count>', 'Attempts per stage', parsePositiveInt)
    .option('--backoff <seconds>', 'Delay between attempts in seconds', parseNonNegativeInt)
    .option('--from-stage <name>', 'Restart at this stage (upstream stages must have succeeded)')
    .option('--dry-run', 'Print the commands that would run without executing them')
    .option('--show-output', 'Echo tool output while it runs')
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      const controller = new AbortController();

      const onSignal = (signal: NodeJS.Signals): void => {
        if (!controller.signal.aborted) {
          base.warn(`Received ${signal}, stopping the active stage...`);
          controller.abort();
        }
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      try {
        process.exitCode = await handleRun(options, base, controller.signal);
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });
}

export default registerRunCommand;
