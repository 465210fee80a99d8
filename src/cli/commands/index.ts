/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - run: Run or resume a pipeline run
 * - status: Show a run's checkpointed state
 * - stages: List stages, contexts and artifacts
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerStatusCommand } from './status.js';
import { registerStagesCommand } from './stages.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerStatusCommand(program);
  registerStagesCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'run', description: 'Run (or resume) the modification calling pipeline' },
    { name: 'status [runId]', description: 'Show the checkpointed state of a run' },
    { name: 'stages', description: 'List pipeline stages, runtime contexts and artifacts' },
  ];
}

export { registerRunCommand } from './run.js';
export { registerStatusCommand } from './status.js';
export { registerStagesCommand } from './stages.js';
