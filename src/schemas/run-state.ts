/**
 * Run State Schema
 *
 * The checkpointed record of a pipeline run. A run state is created at
 * run start, mutated by the orchestrator after every stage attempt and
 * persisted after every mutation.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, RunIdSchema, StageNameSchema } from './common.js';

// ============================================================================
// Status Enums
// ============================================================================

/**
 * Run status values
 * - pending: created, no stage attempted yet
 * - running: a stage is executing (or the process died while it was)
 * - succeeded: every stage validated
 * - failed: retries exhausted, or a fatal error before any stage succeeded
 * - partially-completed: stopped early but resumable
 */
export const RunStatusSchema = z.enum([
  'pending',
  'running',
  'succeeded',
  'failed',
  'partially-completed',
]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

/**
 * Outcome of a single stage attempt.
 */
export const StageOutcomeSchema = z.enum([
  'succeeded',
  'process-failure',
  'validation-failure',
  'configuration-error',
  'cancelled',
]);

export type StageOutcome = z.infer<typeof StageOutcomeSchema>;

// ============================================================================
// Validation Outcome
// ============================================================================

export const ValidationOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ok') }),
  z.object({
    kind: z.literal('missing-artifact'),
    artifact: z.string(),
    path: z.string(),
  }),
  z.object({
    kind: z.literal('empty-artifact'),
    artifact: z.string(),
    path: z.string(),
  }),
  z.object({
    kind: z.literal('format-error'),
    artifact: z.string(),
    path: z.string(),
    detail: z.string(),
  }),
]);

export type ValidationOutcome = z.infer<typeof ValidationOutcomeSchema>;

// ============================================================================
// Stage Result
// ============================================================================

export const ErrorRecordSchema = z.object({
  /** Stable error code (e.g. "CONTEXT_CONFLICT") */
  code: z.string(),
  message: z.string(),
});

export type ErrorRecord = z.infer<typeof ErrorRecordSchema>;

export const StageResultSchema = z.object({
  stage: StageNameSchema,

  /** Position of the stage in the pipeline (1-based) */
  ordinal: z.number().int().positive(),

  /** Attempt number for this stage, counted across every invocation of the run */
  attempt: z.number().int().positive(),

  startedAt: ISO8601TimestampSchema,
  endedAt: ISO8601TimestampSchema,
  durationMs: z.number().int().nonnegative(),

  outcome: StageOutcomeSchema,

  /** Exit code of the last command run, null if it never exited normally */
  exitCode: z.number().int().nullable(),

  /** Signal that terminated the last command, if any */
  signal: z.string().nullable(),

  timedOut: z.boolean(),

  /** Command line of the last command run (for the failure report) */
  command: z.string().nullable(),

  stdoutTail: z.string(),
  stderrTail: z.string(),

  /** Output validation result, null when validation did not run */
  validation: ValidationOutcomeSchema.nullable(),

  error: ErrorRecordSchema.nullable(),
});

export type StageResult = z.infer<typeof StageResultSchema>;

// ============================================================================
// Run State
// ============================================================================

export const RunStateSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.runState),
  runId: RunIdSchema,
  status: RunStatusSchema,

  /** Next stage to execute, null when the run has completed */
  resumePoint: StageNameSchema.nullable(),

  createdAt: ISO8601TimestampSchema,
  updatedAt: ISO8601TimestampSchema,

  /** Number of times the run has been started or resumed */
  invocations: z.number().int().nonnegative(),

  /** SHA-256 of the run configuration that last drove this run */
  configFingerprint: z.string(),

  /** Append-only history of stage attempts */
  stageResults: z.array(StageResultSchema),

  /** Error that stopped the run, if any */
  lastError: ErrorRecordSchema.extend({ stage: StageNameSchema.nullable() }).nullable(),
});

export type RunState = z.infer<typeof RunStateSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a fresh run state positioned at the first stage.
 */
export function createRunState(params: {
  runId: string;
  firstStage: string | null;
  configFingerprint: string;
}): RunState {
  const now = new Date().toISOString();

  return {
    schemaVersion: SCHEMA_VERSIONS.runState,
    runId: params.runId,
    status: 'pending',
    resumePoint: params.firstStage,
    createdAt: now,
    updatedAt: now,
    invocations: 0,
    configFingerprint: params.configFingerprint,
    stageResults: [],
    lastError: null,
  };
}

/**
 * Get the authoritative (most recent) result for a stage.
 */
export function lastResultFor(state: RunState, stage: string): StageResult | undefined {
  for (let i = state.stageResults.length - 1; i >= 0; i--) {
    if (state.stageResults[i].stage === stage) {
      return state.stageResults[i];
    }
  }
  return undefined;
}

/**
 * Count recorded attempts for a stage across the run's whole history.
 */
export function countAttempts(state: RunState, stage: string): number {
  return state.stageResults.filter((r) => r.stage === stage).length;
}
