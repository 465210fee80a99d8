/**
 * Stages Command
 *
 * Lists the stages in execution order with their runtime context and
 * the artifacts they consume and produce.
 *
 * @module cli/commands/stages
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, exitCodeFor, type BaseCommand, type ExitCode } from '../base-command.js';
import { errorMessage } from '../../errors.js';
import { StageRegistry } from '../../pipeline/registry.js';
import { buildStageId, type StageDescriptor } from '../../pipeline/types.js';
import { loadConfigFromOptions, type ConfigOptions } from './shared.js';

export interface StagesCommandOptions extends ConfigOptions {
  format?: 'table' | 'json';
}

interface StageRow {
  id: string;
  name: string;
  context: string;
  tools: string[];
  inputs: string[];
  outputs: string[];
  description: string;
}

function toRow(stage: StageDescriptor, stageContexts: Record<string, string>): StageRow {
  return {
    id: buildStageId(stage.ordinal, stage.name),
    name: stage.name,
    context: stageContexts[stage.name] ?? stage.context,
    tools: [...new Set(stage.commands.map((command) => command.tool))],
    inputs: [...stage.inputs],
    outputs: stage.outputs.map((output) => output.name),
    description: stage.description,
  };
}

/**
 * Execute the stages command.
 *
 * Context overrides are applied only when a configuration is given.
 */
export async function handleStages(options: StagesCommandOptions, base: BaseCommand): Promise<ExitCode> {
  try {
    let stageContexts: Record<string, string> = {};
    if (options.config !== undefined) {
      const loaded = await loadConfigFromOptions(options);
      stageContexts = loaded.config.stageContexts;
    }

    const rows = new StageRegistry()
      .getOrderedStages()
      .map((stage) => toRow(stage, stageContexts));

    if (options.format === 'json') {
      base.json(rows);
      return EXIT_CODES.SUCCESS;
    }

    for (const row of rows) {
      console.log(`${chalk.bold(row.id)} ${chalk.dim(`[${row.context}]`)} ${row.tools.join(', ')}`);
      console.log(`  ${row.description}`);
      console.log(chalk.dim(`  in:  ${row.inputs.join(', ') || '-'}`));
      console.log(chalk.dim(`  out: ${row.outputs.join(', ')}`));
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    base.error(errorMessage(error), error);
    return exitCodeFor(error);
  }
}

/**
 * Register the stages command.
 */
export function registerStagesCommand(program: Command): void {
  program
    .command('stages')
    .description('List pipeline stages, runtime contexts and artifacts')
    .option('-c, --config <path>', 'Run configuration file (applies stage context overrides)')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: StagesCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      process.exitCode = await handleStages(options, base);
    });
}

export default registerStagesCommand;
