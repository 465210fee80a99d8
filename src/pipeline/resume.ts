/**
 * Resume Planning
 *
 * Where a run picks up is a pure function of its checkpointed state and
 * the static stage order: the first stage whose last recorded attempt is
 * not a validated success. Everything from there on runs again, even
 * stages that succeeded before, since their inputs are about to change.
 *
 * @module pipeline/resume
 */

import { lastResultFor, type RunState, type StageResult } from '../schemas/run-state.js';
import { ConfigurationError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ResumePlan {
  /** First stage to execute, null when every stage already succeeded */
  resumePoint: string | null;

  /** Stages with a validated success that will not run */
  stagesToSkip: string[];

  /** Stages that will run, in order */
  stagesToExecute: string[];

  /** True when `fromStage` moved the start before the natural resume point */
  forced: boolean;
}

export interface ResumeOptions {
  /** Restart at this stage; every stage before it must have succeeded */
  fromStage?: string;
}

// ============================================================================
// Functions
// ============================================================================

/**
 * A stage result counts only if the tool succeeded and its outputs passed
 * validation.
 */
export function isValidatedSuccess(result: StageResult | undefined): boolean {
  return result?.outcome === 'succeeded' && result.validation?.kind === 'ok';
}

/**
 * Index of the first stage without a validated success, or
 * `stageOrder.length` when all succeeded.
 */
export function findResumeIndex(state: RunState | null, stageOrder: readonly string[]): number {
  if (state === null) {
    return 0;
  }
  const index = stageOrder.findIndex((stage) => !isValidatedSuccess(lastResultFor(state, stage)));
  return index === -1 ? stageOrder.length : index;
}

/**
 * Compute which stages run and which are skipped.
 *
 * @throws ConfigurationError when `fromStage` is unknown or a stage before
 *   it has no validated success
 *
 * @example
 * ```typescript
 * // convert-format, basecall and align succeeded in an earlier invocation
 * computeResumePlan(state, order);
 * // { resumePoint: 'realign-signal',
 * //   stagesToSkip: ['convert-format', 'basecall', 'align'],
 * //   stagesToExecute: ['realign-signal', 'infer-modification'], forced: false }
 * ```
 */
export function computeResumePlan(
  state: RunState | null,
  stageOrder: readonly string[],
  options: ResumeOptions = {}
): ResumePlan {
  const naturalIndex = findResumeIndex(state, stageOrder);
  let startIndex = naturalIndex;

  if (options.fromStage !== undefined) {
    const fromIndex = stageOrder.indexOf(options.fromStage);
    if (fromIndex === -1) {
      throw new ConfigurationError(
        `Unknown stage "${options.fromStage}" (stages: ${stageOrder.join(', ')})`,
        'INVALID_FROM_STAGE'
      );
    }
    if (fromIndex > naturalIndex) {
      throw new ConfigurationError(
        `Cannot start at "${options.fromStage}": upstream stage "${stageOrder[naturalIndex]}" has no validated success`,
        'INVALID_FROM_STAGE'
      );
    }
    startIndex = fromIndex;
  }

  return {
    resumePoint: startIndex < stageOrder.length ? stageOrder[startIndex] : null,
    stagesToSkip: stageOrder.slice(0, startIndex),
    stagesToExecute: stageOrder.slice(startIndex),
    forced: startIndex < naturalIndex,
  };
}
