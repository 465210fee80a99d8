/**
 * Shared helpers for commands that load a run configuration.
 *
 * @module cli/commands/shared
 */

import { InvalidArgumentError } from 'commander';
import { getEnvConfig, loadRunConfig, type LoadedRunConfig, type RunConfigOverrides } from '../../config/index.js';

/**
 * Options every config-reading command accepts.
 */
export interface ConfigOptions {
  /** Run configuration file (JSON) */
  config?: string;
}

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Load the run configuration named by `--config` (or MODPIPE_CONFIG),
 * with command-line overrides applied.
 *
 * @throws InvalidConfigError when the file or the merged values are invalid
 */
export async function loadConfigFromOptions(
  options: ConfigOptions,
  overrides: RunConfigOverrides = {}
): Promise<LoadedRunConfig> {
  const env = getEnvConfig();
  return loadRunConfig({
    configPath: options.config ?? env.defaultConfigPath,
    overrides,
    condaRoot: env.condaRoot,
  });
}
