/**
 * Run Configuration Schema
 *
 * A run is described by a JSON configuration file. The file is validated
 * here, then path-resolved and merged with CLI overrides by the config
 * loader (src/config/loader.ts).
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { IdentifierSchema, RunIdSchema, StageNameSchema } from './common.js';

// ============================================================================
// Runtime Context Schemas
// ============================================================================

const ContextBaseShape = {
  /** Context identifier referenced by stages (e.g. "nanopolish") */
  id: IdentifierSchema,

  /** Extra directories searched for executables, highest priority first */
  searchPaths: z.array(z.string().min(1)).default([]),

  /** Environment variable overrides applied to every process in this context */
  env: z.record(z.string(), z.string()).default({}),

  /** Contexts that must never be active at the same time as this one */
  conflictsWith: z.array(IdentifierSchema).default([]),
};

/**
 * The host environment as-is (PATH plus any search paths).
 */
export const SystemContextSchema = z.object({
  kind: z.literal('system'),
  ...ContextBaseShape,
});

/**
 * An isolated conda/mamba environment addressed by its prefix directory.
 * Executables are looked up in `<prefix>/bin`.
 */
export const CondaContextSchema = z.object({
  kind: z.literal('conda'),
  ...ContextBaseShape,

  /** Absolute environment prefix (e.g. /opt/conda/envs/nanopolish) */
  prefix: z.string().min(1),

  /** Environment name, defaults to the last prefix segment */
  envName: z.string().min(1).optional(),
});

export const RuntimeContextSchema = z.discriminatedUnion('kind', [
  SystemContextSchema,
  CondaContextSchema,
]);

export type SystemContext = z.infer<typeof SystemContextSchema>;
export type CondaContext = z.infer<typeof CondaContextSchema>;
export type RuntimeContext = z.infer<typeof RuntimeContextSchema>;

// ============================================================================
// Main Run Config Schema
// ============================================================================

/** Six hours: long enough for basecalling a full flow cell on one GPU */
export const DEFAULT_STAGE_TIMEOUT_MS = 6 * 60 * 60 * 1000;

/** Largest delay a Node.js timer honours; longer delays fire immediately */
export const MAX_TIMER_MS = 2_147_483_647;

/** Floor for diagnostic tails so failure reports stay useful */
export const MIN_DIAGNOSTIC_TAIL_BYTES = 1024;

export const RunConfigSchema = z.object({
  /** Schema version for forward compatibility */
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.runConfig),

  /** Unique run identifier; re-using it resumes the run */
  runId: RunIdSchema,

  /** Directory holding the raw signal files (fast5) */
  inputDir: z.string().min(1),

  /** Reference transcript sequences (FASTA) */
  reference: z.string().min(1),

  /** Root directory for every artifact produced by the run */
  outputDir: z.string().min(1),

  /** Checkpoint directory, defaults to `<outputDir>/.modpipe` */
  checkpointDir: z.string().min(1).optional(),

  /** Thread/process count passed through to the external tools */
  threads: z.number().int().positive().default(4),

  /** Wall-clock timeout applied to each command of a stage */
  stageTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(DEFAULT_STAGE_TIMEOUT_MS),

  /** Per-stage timeout overrides */
  stageTimeouts: z.record(StageNameSchema, z.number().int().positive().max(MAX_TIMER_MS)).default({}),

  /** Maximum attempts per stage (1 = no retries) */
  maxAttempts: z.number().int().min(1).max(20).default(3),

  /** Fixed delay between attempts */
  retryBackoffMs: z.number().int().nonnegative().max(MAX_TIMER_MS).default(30_000),

  /** Bytes of stdout/stderr tail kept per command */
  diagnosticTailBytes: z.number().int().min(MIN_DIAGNOSTIC_TAIL_BYTES).default(16_384),

  /** Delay between SIGTERM and SIGKILL when terminating a process group */
  killGraceMs: z.number().int().nonnegative().max(MAX_TIMER_MS).default(2000),

  /** Basecalling model name or complex (e.g. "sup", "rna004_130bps_sup@v5.1.0") */
  basecallModel: z.string().min(1).default('sup'),

  /** Modified-base profile passed to the basecaller */
  modifiedBases: z.string().min(1).default('m6A_DRACH'),

  /** Iterations for the modification inference step */
  inferenceIterations: z.number().int().positive().default(1000),

  /** Explicit executable paths keyed by tool (e.g. { "dorado": "/opt/dorado/bin/dorado" }) */
  executables: z.record(IdentifierSchema, z.string().min(1)).default({}),

  /** Runtime context definitions; defaults are filled in by the loader */
  contexts: z.array(RuntimeContextSchema).default([]),

  /** Stage → runtime context overrides */
  stageContexts: z.record(StageNameSchema, IdentifierSchema).default({}),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Context ids used by the built-in workflow.
 */
export const DEFAULT_CONTEXT_IDS = {
  ont: 'ont',
  nanopolish: 'nanopolish',
  m6anet: 'm6anet',
} as const;

/**
 * Build the default runtime contexts: the host environment for the
 * vendor tools, plus two mutually exclusive conda environments for the
 * event aligner and the inference tool.
 *
 * @param condaRoot - Directory containing conda environments (e.g. ~/miniconda3/envs)
 */
export function createDefaultContexts(condaRoot: string): RuntimeContext[] {
  const join = (name: string): string => `${condaRoot.replace(/\/+$/, '')}/${name}`;

  return [
    {
      kind: 'system',
      id: DEFAULT_CONTEXT_IDS.ont,
      searchPaths: [],
      env: {},
      conflictsWith: [],
    },
    {
      kind: 'conda',
      id: DEFAULT_CONTEXT_IDS.nanopolish,
      prefix: join('nanopolish'),
      searchPaths: [],
      env: {},
      conflictsWith: [DEFAULT_CONTEXT_IDS.m6anet],
    },
    {
      kind: 'conda',
      id: DEFAULT_CONTEXT_IDS.m6anet,
      prefix: join('m6anet'),
      searchPaths: [],
      env: {},
      conflictsWith: [DEFAULT_CONTEXT_IDS.nanopolish],
    },
  ];
}
