/**
 * Configuration Module
 *
 * Loads and validates the environment variables modpipe reads.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { InvalidConfigError } from '../errors.js';

const envSchema = z.object({
  // Default run configuration file used when --config is not given
  MODPIPE_CONFIG: z.string().min(1).optional(),

  // Directory holding the conda environments of the default contexts
  MODPIPE_CONDA_ROOT: z.string().min(1).optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Validated environment configuration.
 */
export interface EnvConfig {
  nodeEnv: Env['NODE_ENV'];
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  /** Run configuration path from MODPIPE_CONFIG */
  defaultConfigPath: string | undefined;

  /** Conda environments root */
  condaRoot: string;
}

/**
 * Parse an environment into configuration.
 *
 * @throws InvalidConfigError listing every invalid variable
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): EnvConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    throw new InvalidConfigError(
      'Invalid environment variables',
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env: Env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',
    defaultConfigPath: env.MODPIPE_CONFIG,
    condaRoot: env.MODPIPE_CONDA_ROOT ?? join(homedir(), 'miniconda3', 'envs'),
  };
}

let cached: EnvConfig | undefined;

/**
 * Application configuration singleton, parsed from process.env on first use.
 */
export function getEnvConfig(): EnvConfig {
  if (cached === undefined) {
    cached = parseEnvironment(process.env);
  }
  return cached;
}

export * from './loader.js';
