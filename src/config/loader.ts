/**
 * Run Configuration Loader
 *
 * Reads the JSON run configuration, applies command-line overrides,
 * validates the result and resolves every path to an absolute one.
 * Relative paths in the file are resolved against the file's directory;
 * relative paths given on the command line against the working directory.
 *
 * @module config/loader
 */

import * as crypto from 'node:crypto';
import * as path from 'node:path';
import { InvalidConfigError, errorMessage } from '../errors.js';
import {
  RunConfigSchema,
  createDefaultContexts,
  type RunConfig,
  type RuntimeContext,
} from '../schemas/run-config.js';
import { acceptSchemaVersion } from '../schemas/versions.js';
import { readJson } from '../storage/atomic.js';
import { expandPath, getDefaultCheckpointRoot } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Values supplied on the command line; each replaces the file's value.
 */
export interface RunConfigOverrides {
  runId?: string;
  inputDir?: string;
  reference?: string;
  outputDir?: string;
  checkpointDir?: string;
  threads?: number;
  stageTimeoutMs?: number;
  maxAttempts?: number;
  retryBackoffMs?: number;
}

export interface LoadRunConfigOptions {
  /** JSON configuration file; omit to build the config from overrides alone */
  configPath?: string;

  overrides?: RunConfigOverrides;

  /** Base for relative command-line paths (default: process.cwd()) */
  cwd?: string;

  /** Root for the default conda contexts */
  condaRoot: string;
}

export interface LoadedRunConfig {
  config: RunConfig;

  /** Absolute path of the file read, null when none */
  configPath: string | null;

  /** Where run state and locks live */
  checkpointRoot: string;

  /** SHA-256 over the settings that determine the artifacts */
  fingerprint: string;
}

const PATH_OVERRIDES: ReadonlySet<string> = new Set([
  'inputDir',
  'reference',
  'outputDir',
  'checkpointDir',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Fingerprint
// ============================================================================

/**
 * Hash of everything that changes what the stages produce. Retry and
 * timeout settings are left out: changing them between invocations does
 * not invalidate earlier outputs.
 */
export function fingerprintRunConfig(config: RunConfig): string {
  const material = {
    inputDir: config.inputDir,
    reference: config.reference,
    outputDir: config.outputDir,
    threads: config.threads,
    basecallModel: config.basecallModel,
    modifiedBases: config.modifiedBases,
    inferenceIterations: config.inferenceIterations,
    executables: Object.entries(config.executables).sort(([a], [b]) => a.localeCompare(b)),
    stageContexts: Object.entries(config.stageContexts).sort(([a], [b]) => a.localeCompare(b)),
    contexts: config.contexts,
  };
  return crypto.createHash('sha256').update(JSON.stringify(material)).digest('hex');
}

// ============================================================================
// Path Resolution
// ============================================================================

function resolveContextPaths(context: RuntimeContext, baseDir: string): RuntimeContext {
  const searchPaths = context.searchPaths.map((dir) => expandPath(dir, baseDir));
  if (context.kind === 'conda') {
    return { ...context, searchPaths, prefix: expandPath(context.prefix, baseDir) };
  }
  return { ...context, searchPaths };
}

/**
 * Make every path in a parsed config absolute.
 */
export function resolveConfigPaths(config: RunConfig, baseDir: string): RunConfig {
  const executables: Record<string, string> = {};
  for (const [tool, value] of Object.entries(config.executables)) {
    executables[tool] = value.includes('/') ? expandPath(value, baseDir) : value;
  }

  return {
    ...config,
    inputDir: expandPath(config.inputDir, baseDir),
    reference: expandPath(config.reference, baseDir),
    outputDir: expandPath(config.outputDir, baseDir),
    checkpointDir:
      config.checkpointDir === undefined ? undefined : expandPath(config.checkpointDir, baseDir),
    executables,
    contexts: config.contexts.map((context) => resolveContextPaths(context, baseDir)),
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load, merge, validate and resolve a run configuration.
 *
 * @throws InvalidConfigError when the file is unreadable or the merged
 *   configuration fails validation
 *
 * @example
 * ```typescript
 * const { config, checkpointRoot } = await loadRunConfig({
 *   configPath: 'run.json',
 *   overrides: { threads: 16 },
 *   condaRoot: '/opt/conda/envs',
 * });
 * ```
 */
export async function loadRunConfig(options: LoadRunConfigOptions): Promise<LoadedRunConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ? expandPath(options.configPath, cwd) : null;

  let fileData: Record<string, unknown> = {};
  if (configPath !== null) {
    let raw: unknown;
    try {
      raw = acceptSchemaVersion(await readJson(configPath), 'runConfig');
    } catch (error) {
      throw new InvalidConfigError(`Cannot read run configuration: ${errorMessage(error)}`);
    }
    if (!isRecord(raw)) {
      throw new InvalidConfigError(`Run configuration must be a JSON object: ${configPath}`);
    }
    fileData = raw;
  }

  const fileDir = configPath !== null ? path.dirname(configPath) : cwd;

  // Command-line paths are made absolute here so they are not re-based on the file's directory
  const overrides: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value === undefined) continue;
    overrides[key] =
      typeof value === 'string' && PATH_OVERRIDES.has(key)
        ? expandPath(value, cwd)
        : value;
  }

  const parseResult = RunConfigSchema.safeParse({ ...fileData, ...overrides });
  if (!parseResult.success) {
    throw new InvalidConfigError(
      'Invalid run configuration',
      parseResult.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  let config = resolveConfigPaths(parseResult.data, fileDir);
  if (config.contexts.length === 0) {
    config = { ...config, contexts: createDefaultContexts(options.condaRoot) };
  }

  return {
    config,
    configPath,
    checkpointRoot: config.checkpointDir ?? getDefaultCheckpointRoot(config.outputDir),
    fingerprint: fingerprintRunConfig(config),
  };
}
