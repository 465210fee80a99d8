/**
 * Status Command
 *
 * Prints the checkpointed state of a run without taking its lock.
 *
 * @module cli/commands/status
 */

import { Command } from 'commander';
import { getBaseCommand, exitCodeFor, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatRunState, formatTimingBreakdown } from '../formatters/run-summary.js';
import { InvalidConfigError, errorMessage } from '../../errors.js';
import { getEnvConfig } from '../../config/index.js';
import { expandPath, getDefaultCheckpointRoot } from '../../storage/paths.js';
import { StageRegistry } from '../../pipeline/registry.js';
import { loadManifest } from '../../pipeline/manifest.js';
import { FileCheckpointStore } from '../../storage/checkpoint-store.js';
import { loadConfigFromOptions, type ConfigOptions } from './shared.js';

export interface StatusCommandOptions extends ConfigOptions {
  checkpointDir?: string;
  outputDir?: string;
  format?: 'table' | 'json';
  timing?: boolean;
}

interface RunLocation {
  runId: string;
  checkpointRoot: string;
  outputDir: string | null;
}

/**
 * Find a run's checkpoint root, from a configuration file when one is
 * given (or named by MODPIPE_CONFIG), else from the directory flags.
 */
async function locateRun(runId: string | undefined, options: StatusCommandOptions): Promise<RunLocation> {
  if (options.config !== undefined || getEnvConfig().defaultConfigPath !== undefined) {
    const loaded = await loadConfigFromOptions(options, {
      runId,
      checkpointDir: options.checkpointDir,
      outputDir: options.outputDir,
    });
    return {
      runId: loaded.config.runId,
      checkpointRoot: loaded.checkpointRoot,
      outputDir: loaded.config.outputDir,
    };
  }

  if (runId === undefined || (options.outputDir === undefined && options.checkpointDir === undefined)) {
    throw new InvalidConfigError(
      'status needs --config, or a run id with --output-dir or --checkpoint-dir'
    );
  }

  const outputDir = options.outputDir !== undefined ? expandPath(options.outputDir) : null;
  return {
    runId,
    checkpointRoot:
      options.checkpointDir !== undefined
        ? expandPath(options.checkpointDir)
        : getDefaultCheckpointRoot(outputDir ?? process.cwd()),
    outputDir,
  };
}

/**
 * Execute the status command.
 *
 * @param runId - Run to show, defaults to the configuration's run id
 * @returns The process exit code
 */
export async function handleStatus(
  runId: string | undefined,
  options: StatusCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  try {
    const location = await locateRun(runId, options);
    const store = new FileCheckpointStore(location.checkpointRoot);
    const state = await store.load(location.runId);

    if (state === null) {
      base.info(`Run "${location.runId}" has no checkpoint in ${location.checkpointRoot}`);
      return EXIT_CODES.SUCCESS;
    }

    if (options.format === 'json') {
      base.json(state);
      return EXIT_CODES.SUCCESS;
    }

    const stageOrder = new StageRegistry().stageNames();
    console.log(formatRunState(state, stageOrder));

    if (options.timing) {
      console.log();
      console.log(formatTimingBreakdown(state, stageOrder));
    }

    const manifest = location.outputDir !== null ? await loadManifest(location.outputDir) : null;
    if (manifest !== null) {
      base.blank();
      base.keyValue('Manifest', `${manifest.artifacts.length} artifacts (${manifest.createdAt})`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    base.error(errorMessage(error), error);
    return exitCodeFor(error);
  }
}

/**
 * Register the status command.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status [runId]')
    .description('Show the checkpointed state of a run')
    .option('-c, --config <path>', 'Run configuration file (JSON)')
    .option('--output-dir <path>', 'Output root of the run')
    .option('--checkpoint-dir <path>', 'Checkpoint root (default: <output-dir>/.modpipe)')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .option('--timing', 'Show a per-stage timing breakdown')
    .action(async (runId: string | undefined, options: StatusCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      process.exitCode = await handleStatus(runId, options, base);
    });
}

export default registerStatusCommand;
