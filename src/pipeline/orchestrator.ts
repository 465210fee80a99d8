/**
 * Pipeline Orchestrator
 *
 * Drives a run through its stages: load or create the checkpointed run
 * state, work out where to resume, then for each remaining stage check
 * inputs, resolve runtime contexts, run the commands, validate outputs and
 * persist the attempt. Failed attempts are retried with a fixed backoff;
 * configuration errors stop the run at once.
 *
 * Run status transitions: pending → running → succeeded | failed | partially-completed
 *
 * @module pipeline/orchestrator
 */

import * as fs from 'node:fs/promises';
import {
  ConfigurationError,
  ModpipeError,
  PersistenceError,
  ProcessFailure,
  ValidationFailure,
  errorMessage,
} from '../errors.js';
import { fingerprintRunConfig, type LoadedRunConfig } from '../config/loader.js';
import type { RunConfig } from '../schemas/run-config.js';
import {
  countAttempts,
  createRunState,
  lastResultFor,
  type ErrorRecord,
  type RunState,
  type RunStatus,
  type StageResult,
  type ValidationOutcome,
} from '../schemas/run-state.js';
import { FileCheckpointStore, type CheckpointStore } from '../storage/checkpoint-store.js';
import { getStageOutputDir } from '../storage/paths.js';
import { ContextResolver, type ExecutionPlan } from '../runtime/contexts.js';
import {
  CONDA_STDERR_NOISE,
  LocalProcessRunner,
  formatCommand,
  type OutputStream,
  type ProcessOutcome,
  type ProcessRunner,
} from '../runtime/process-runner.js';
import { generateManifest, saveManifest } from './manifest.js';
import { StageRegistry, renderCommand } from './registry.js';
import {
  computeResumePlan,
  findResumeIndex,
  isValidatedSuccess,
  type ResumePlan,
} from './resume.js';
import { ArtifactValidator, describeValidationOutcome } from './validator.js';
import {
  silentLogger,
  type ArtifactTable,
  type Logger,
  type StageDescriptor,
  type StageParameters,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Why a run stopped.
 */
export type RunCause =
  | 'completed'
  | 'retries-exhausted'
  | 'configuration-error'
  | 'cancelled'
  | 'persistence-error';

/**
 * Turns a (context, tool) pair into something the runner can spawn.
 */
export interface PlanResolver {
  resolve(contextId: string, tool: string): Promise<ExecutionPlan>;
}

/**
 * Callbacks for stage lifecycle events
 */
export interface OrchestratorCallbacks {
  /** Called before each attempt of a stage */
  onStageStart?: (stage: StageDescriptor, attempt: number) => void;
  /** Called before each command is spawned */
  onCommandStart?: (stage: StageDescriptor, command: string) => void;
  /** Called after an attempt that did not succeed */
  onAttemptFailed?: (stage: StageDescriptor, result: StageResult, willRetry: boolean) => void;
  /** Called when a stage completes with validated outputs */
  onStageComplete?: (stage: StageDescriptor, result: StageResult) => void;
  /** Called for each stage skipped because it already succeeded */
  onStageSkip?: (stage: StageDescriptor) => void;
  /** Live tool output */
  onOutput?: (stage: StageDescriptor, stream: OutputStream, chunk: string) => void;
}

export interface ExecuteOptions {
  /** Aborting cancels the running command and stops the run */
  signal?: AbortSignal;

  /** Restart at this stage (every earlier stage must have succeeded) */
  fromStage?: string;

  /** Render and resolve commands without running anything */
  dryRun?: boolean;

  callbacks?: OrchestratorCallbacks;
}

export interface PlannedCommand {
  stage: string;
  contextId: string;
  command: string;
}

/**
 * Summary of one invocation.
 */
export interface RunReport {
  runId: string;
  status: RunStatus;
  cause: RunCause;
  dryRun: boolean;

  /** Stages that succeeded during this invocation */
  stagesExecuted: string[];

  /** Stages skipped because an earlier invocation already validated them */
  stagesSkipped: string[];

  /** Stage that stopped the run, null on success */
  failedStage: string | null;

  /** Attempts made on the last stage in this invocation */
  attempts: number;

  /** Most recent stage result, carries the diagnostic tails */
  lastResult: StageResult | null;

  error: ErrorRecord | null;

  /** Commands a dry run would execute */
  plannedCommands: PlannedCommand[];

  manifestPath: string | null;

  /** The configuration differs from the one that started the run */
  configChanged: boolean;

  durationMs: number;

  /** Final run state, null when it could not be loaded */
  state: RunState | null;
}

export interface OrchestratorOptions {
  config: RunConfig;
  store: CheckpointStore;
  resolver: PlanResolver;
  runner: ProcessRunner;

  /** Stage descriptors, defaults to the built-in workflow */
  registry?: StageRegistry;

  logger?: Logger;

  /** Defaults to fingerprintRunConfig(config) */
  configFingerprint?: string;

  /** Backoff between attempts; resolves false when aborted */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

type StageRunOutcome =
  | { kind: 'succeeded' }
  | { kind: 'stopped'; cause: RunCause; error: ErrorRecord };

interface RunSession {
  state: RunState;
  startedAt: number;
  stagesExecuted: string[];
  stagesSkipped: string[];
  attempts: number;
  lastResult: StageResult | null;
  configChanged: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Wait `ms` milliseconds unless the signal aborts first.
 *
 * @returns true if the full delay elapsed
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function toErrorRecord(error: unknown): ErrorRecord {
  if (error instanceof ModpipeError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'UNEXPECTED_ERROR', message: errorMessage(error) };
}

const CANCELLED: ErrorRecord = { code: 'CANCELLED', message: 'Run cancelled' };

/**
 * Final status for a run that stopped for `cause`.
 */
export function statusForCause(cause: RunCause, hasPriorSuccess: boolean): RunStatus {
  switch (cause) {
    case 'completed':
      return 'succeeded';
    case 'cancelled':
      return 'partially-completed';
    case 'configuration-error':
      return hasPriorSuccess ? 'partially-completed' : 'failed';
    case 'retries-exhausted':
    case 'persistence-error':
      return 'failed';
  }
}

function describeProcessFailure(tool: string, outcome: ProcessOutcome, timeoutMs: number): string {
  if (outcome.spawnError !== null) {
    return outcome.spawnError;
  }
  if (outcome.timedOut) {
    return `${tool} timed out after ${timeoutMs} ms`;
  }
  if (outcome.signal !== null) {
    return `${tool} was killed by ${outcome.signal}`;
  }
  return `${tool} exited with code ${outcome.exitCode ?? 'unknown'}`;
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * @example
 * ```typescript
 * const resolver = new ContextResolver({ contexts: config.contexts, cwd: config.outputDir });
 * const orchestrator = new PipelineOrchestrator({
 *   config,
 *   store: new FileCheckpointStore(checkpointRoot),
 *   resolver,
 *   runner: new LocalProcessRunner(resolver.activations),
 * });
 * const report = await orchestrator.execute({ signal: controller.signal });
 * ```
 */
export class PipelineOrchestrator {
  private readonly config: RunConfig;
  private readonly store: CheckpointStore;
  private readonly resolver: PlanResolver;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly fingerprint: string;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<boolean>;

  readonly registry: StageRegistry;

  /** Every artifact path of the run, computed once */
  readonly artifacts: ArtifactTable;

  private readonly validator: ArtifactValidator;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.store = options.store;
    this.resolver = options.resolver;
    this.runner = options.runner;
    this.logger = options.logger ?? silentLogger;
    this.fingerprint = options.configFingerprint ?? fingerprintRunConfig(options.config);
    this.wait = options.sleep ?? sleep;
    this.registry = options.registry ?? new StageRegistry();
    this.artifacts = this.registry.resolveArtifacts({
      inputDir: options.config.inputDir,
      reference: options.config.reference,
      outputDir: options.config.outputDir,
    });
    this.validator = new ArtifactValidator(this.artifacts);
  }

  get runId(): string {
    return this.config.runId;
  }

  /** Runtime context a stage runs in, after config overrides */
  contextFor(stage: StageDescriptor): string {
    return this.config.stageContexts[stage.name] ?? stage.context;
  }

  stageDir(stage: StageDescriptor): string {
    return getStageOutputDir(this.config.outputDir, stage.ordinal, stage.name);
  }

  timeoutFor(stage: StageDescriptor): number {
    return this.config.stageTimeouts[stage.name] ?? this.config.stageTimeoutMs;
  }

  private parameters(): StageParameters {
    return {
      threads: this.config.threads,
      basecallModel: this.config.basecallModel,
      modifiedBases: this.config.modifiedBases,
      inferenceIterations: this.config.inferenceIterations,
    };
  }

  private assertStageContexts(): void {
    for (const name of Object.keys(this.config.stageContexts)) {
      if (!this.registry.has(name)) {
        throw new ConfigurationError(
          `stageContexts names unknown stage "${name}"`,
          'UNKNOWN_STAGE'
        );
      }
    }
  }

  // ==========================================================================
  // Entry Point
  // ==========================================================================

  /**
   * Run (or resume) the pipeline.
   *
   * Every outcome after the writer lock is taken is reported, not thrown.
   *
   * @throws RunLockedError if another live process is writing this run
   * @throws PersistenceError if the lock cannot be taken or released
   */
  async execute(options: ExecuteOptions = {}): Promise<RunReport> {
    if (options.dryRun) {
      return this.planDryRun(options);
    }

    await this.store.acquire(this.runId);
    try {
      return await this.executeLocked(options);
    } finally {
      await this.store.release(this.runId);
    }
  }

  // ==========================================================================
  // Run Lifecycle
  // ==========================================================================

  private async executeLocked(options: ExecuteOptions): Promise<RunReport> {
    const startedAt = Date.now();
    const stageOrder = this.registry.stageNames();

    let loaded: RunState | null;
    try {
      loaded = await this.store.load(this.runId);
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.logger.error(error.message);
        return this.emptyReport('persistence-error', toErrorRecord(error), startedAt);
      }
      throw error;
    }

    const configChanged = loaded !== null && loaded.configFingerprint !== this.fingerprint;
    if (configChanged) {
      this.logger.warn(
        `Run configuration changed since run "${this.runId}" started; earlier outputs are reused as-is`
      );
    }

    const session: RunSession = {
      state:
        loaded ??
        createRunState({
          runId: this.runId,
          firstStage: stageOrder[0] ?? null,
          configFingerprint: this.fingerprint,
        }),
      startedAt,
      stagesExecuted: [],
      stagesSkipped: [],
      attempts: 0,
      lastResult: null,
      configChanged,
    };

    try {
      let plan: ResumePlan;
      try {
        this.assertStageContexts();
        plan = computeResumePlan(session.state, stageOrder, { fromStage: options.fromStage });
      } catch (error) {
        if (error instanceof ConfigurationError) {
          this.logger.error(error.message);
          return await this.finish(session, 'configuration-error', toErrorRecord(error), null);
        }
        throw error;
      }

      await this.persist(session, {
        ...session.state,
        status: 'running',
        resumePoint: plan.resumePoint,
        invocations: session.state.invocations + 1,
        configFingerprint: this.fingerprint,
        lastError: null,
      });

      for (const name of plan.stagesToSkip) {
        session.stagesSkipped.push(name);
        options.callbacks?.onStageSkip?.(this.registry.get(name));
      }
      if (plan.forced) {
        this.logger.info(`Restarting run "${this.runId}" at stage "${plan.resumePoint}"`);
      } else if (plan.stagesToSkip.length > 0 && plan.resumePoint !== null) {
        this.logger.info(`Resuming run "${this.runId}" at stage "${plan.resumePoint}"`);
      }

      for (const name of plan.stagesToExecute) {
        const stage = this.registry.get(name);
        const outcome = await this.runStage(stage, session, options);
        if (outcome.kind === 'stopped') {
          return await this.finish(session, outcome.cause, outcome.error, stage.name);
        }
      }

      return await this.finish(session, 'completed', null, null);
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.logger.error(error.message);
        return this.report(session, 'persistence-error', 'failed', toErrorRecord(error), null, null);
      }
      throw error;
    }
  }

  private async persist(session: RunSession, state: RunState): Promise<void> {
    const next: RunState = { ...state, updatedAt: new Date().toISOString() };
    await this.store.save(next);
    session.state = next;
  }

  private async finish(
    session: RunSession,
    cause: RunCause,
    error: ErrorRecord | null,
    failedStage: string | null
  ): Promise<RunReport> {
    const stageOrder = this.registry.stageNames();
    const hasPriorSuccess = stageOrder.some((name) =>
      isValidatedSuccess(lastResultFor(session.state, name))
    );
    const status = statusForCause(cause, hasPriorSuccess);

    let manifestPath: string | null = null;
    if (cause === 'completed') {
      try {
        const manifest = await generateManifest(
          this.runId,
          stageOrder,
          this.artifacts,
          this.config.outputDir
        );
        manifestPath = await saveManifest(this.config.outputDir, manifest);
      } catch (failure) {
        const error = new PersistenceError(
          `Cannot write manifest: ${errorMessage(failure)}`,
          'MANIFEST_WRITE_FAILED',
          { cause: failure }
        );
        await this.persist(session, {
          ...session.state,
          status: 'failed',
          resumePoint: null,
          lastError: { ...toErrorRecord(error), stage: null },
        });
        throw error;
      }
    }

    const resumeIndex = findResumeIndex(session.state, stageOrder);
    await this.persist(session, {
      ...session.state,
      status,
      resumePoint: resumeIndex < stageOrder.length ? stageOrder[resumeIndex] : null,
      lastError: error === null ? null : { ...error, stage: failedStage },
    });

    return this.report(session, cause, status, error, failedStage, manifestPath);
  }

  private report(
    session: RunSession,
    cause: RunCause,
    status: RunStatus,
    error: ErrorRecord | null,
    failedStage: string | null,
    manifestPath: string | null
  ): RunReport {
    return {
      runId: this.runId,
      status,
      cause,
      dryRun: false,
      stagesExecuted: session.stagesExecuted,
      stagesSkipped: session.stagesSkipped,
      failedStage,
      attempts: session.attempts,
      lastResult: session.lastResult,
      error,
      plannedCommands: [],
      manifestPath,
      configChanged: session.configChanged,
      durationMs: Date.now() - session.startedAt,
      state: session.state,
    };
  }

  private emptyReport(cause: RunCause, error: ErrorRecord, startedAt: number): RunReport {
    return {
      runId: this.runId,
      status: 'failed',
      cause,
      dryRun: false,
      stagesExecuted: [],
      stagesSkipped: [],
      failedStage: null,
      attempts: 0,
      lastResult: null,
      error,
      plannedCommands: [],
      manifestPath: null,
      configChanged: false,
      durationMs: Date.now() - startedAt,
      state: null,
    };
  }

  // ==========================================================================
  // Stage Execution
  // ==========================================================================

  private async resolvePlans(stage: StageDescriptor): Promise<ExecutionPlan[]> {
    const contextId = this.contextFor(stage);
    const plans: ExecutionPlan[] = [];
    for (const command of stage.commands) {
      plans.push(await this.resolver.resolve(contextId, command.tool));
    }
    return plans;
  }

  private async runStage(
    stage: StageDescriptor,
    session: RunSession,
    options: ExecuteOptions
  ): Promise<StageRunOutcome> {
    const callbacks = options.callbacks ?? {};
    session.attempts = 0;

    let plans: ExecutionPlan[];
    const preflightStart = new Date();
    try {
      await this.validator.checkInputs(stage);
      plans = await this.resolvePlans(stage);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.logger.error(`Stage "${stage.name}": ${error.message}`);
      const result = this.buildResult(stage, session, preflightStart, {
        outcome: 'configuration-error',
        error: toErrorRecord(error),
      });
      await this.record(session, result);
      callbacks.onAttemptFailed?.(stage, result, false);
      return { kind: 'stopped', cause: 'configuration-error', error: toErrorRecord(error) };
    }

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        return this.cancelStage(stage, session, new Date());
      }

      callbacks.onStageStart?.(stage, countAttempts(session.state, stage.name) + 1);
      const result = await this.runAttempt(stage, plans, session, options);
      await this.record(session, result);
      session.attempts = attempt;

      switch (result.outcome) {
        case 'succeeded':
          session.stagesExecuted.push(stage.name);
          callbacks.onStageComplete?.(stage, result);
          return { kind: 'succeeded' };
        case 'cancelled':
          return { kind: 'stopped', cause: 'cancelled', error: CANCELLED };
        case 'configuration-error':
          callbacks.onAttemptFailed?.(stage, result, false);
          return {
            kind: 'stopped',
            cause: 'configuration-error',
            error: result.error ?? { code: 'CONFIGURATION_ERROR', message: 'Configuration error' },
          };
        case 'process-failure':
        case 'validation-failure':
          break;
      }

      const willRetry = attempt < this.config.maxAttempts;
      const message = result.error?.message ?? result.outcome;
      if (result.outcome === 'validation-failure') {
        this.logger.warn(
          `Stage "${stage.name}" attempt ${result.attempt}: tool exited 0 but ${message}`
        );
      } else {
        this.logger.warn(`Stage "${stage.name}" attempt ${result.attempt} failed: ${message}`);
      }
      callbacks.onAttemptFailed?.(stage, result, willRetry);

      if (willRetry) {
        this.logger.info(
          `Retrying "${stage.name}" in ${this.config.retryBackoffMs} ms (attempt ${attempt + 1} of ${this.config.maxAttempts})`
        );
        const backoffStart = new Date();
        const waited = await this.wait(this.config.retryBackoffMs, options.signal);
        if (!waited) {
          return this.cancelStage(stage, session, backoffStart);
        }
      }
    }

    const last = session.lastResult;
    return {
      kind: 'stopped',
      cause: 'retries-exhausted',
      error: {
        code: last?.error?.code ?? 'RETRIES_EXHAUSTED',
        message: `Stage "${stage.name}" failed after ${this.config.maxAttempts} attempt(s): ${
          last?.error?.message ?? 'unknown failure'
        }`,
      },
    };
  }

  /**
   * Record the pending attempt of a stage as cancelled and stop the run.
   */
  private async cancelStage(
    stage: StageDescriptor,
    session: RunSession,
    startedAt: Date
  ): Promise<StageRunOutcome> {
    const result = this.buildResult(stage, session, startedAt, {
      outcome: 'cancelled',
      error: CANCELLED,
    });
    await this.record(session, result);
    return { kind: 'stopped', cause: 'cancelled', error: CANCELLED };
  }

  private async record(session: RunSession, result: StageResult): Promise<void> {
    session.lastResult = result;
    await this.persist(session, {
      ...session.state,
      stageResults: [...session.state.stageResults, result],
    });
  }

  /**
   * Remove outputs left by an earlier attempt so validation only ever sees
   * what this attempt wrote.
   */
  private async clearOutputs(stage: StageDescriptor): Promise<void> {
    for (const output of stage.outputs) {
      const ref = this.artifacts.get(output.name);
      if (ref !== undefined) {
        await fs.rm(ref.path, { recursive: true, force: true });
      }
    }
  }

  private async runAttempt(
    stage: StageDescriptor,
    plans: readonly ExecutionPlan[],
    session: RunSession,
    options: ExecuteOptions
  ): Promise<StageResult> {
    const startedAt = new Date();
    const stageDir = this.stageDir(stage);
    const timeoutMs = this.timeoutFor(stage);
    const callbacks = options.callbacks ?? {};

    try {
      await fs.mkdir(stageDir, { recursive: true });
      await this.clearOutputs(stage);
    } catch (error) {
      return this.buildResult(stage, session, startedAt, {
        outcome: 'process-failure',
        error: {
          code: 'PROCESS_FAILURE',
          message: `Cannot prepare ${stageDir}: ${errorMessage(error)}`,
        },
      });
    }

    let last: ProcessOutcome | null = null;

    for (const [index, template] of stage.commands.entries()) {
      const plan = plans[index];
      const rendered = renderCommand(stage.name, template, {
        artifacts: this.artifacts,
        parameters: this.parameters(),
        stageDir,
      });
      const command = formatCommand(plan.executablePath, rendered.args, rendered.stdoutPath);
      callbacks.onCommandStart?.(stage, command);
      this.logger.debug(`[${stage.name}] $ ${command}`);

      try {
        last = await this.runner.run(plan, rendered.args, {
          timeoutMs,
          tailBytes: this.config.diagnosticTailBytes,
          killGraceMs: this.config.killGraceMs,
          signal: options.signal,
          stdoutPath: rendered.stdoutPath,
          stderrNoise: CONDA_STDERR_NOISE,
          onOutput: callbacks.onOutput
            ? (stream, chunk) => callbacks.onOutput?.(stage, stream, chunk)
            : undefined,
        });
      } catch (error) {
        if (error instanceof ConfigurationError) {
          return this.buildResult(stage, session, startedAt, {
            outcome: 'configuration-error',
            error: toErrorRecord(error),
            command,
          });
        }
        throw error;
      }

      if (last.cancelled) {
        return this.buildResult(stage, session, startedAt, {
          outcome: 'cancelled',
          process: last,
          error: CANCELLED,
        });
      }

      if (last.spawnError !== null || last.timedOut || last.exitCode !== 0) {
        const failure = new ProcessFailure(
          stage.name,
          describeProcessFailure(template.tool, last, timeoutMs)
        );
        return this.buildResult(stage, session, startedAt, {
          outcome: 'process-failure',
          process: last,
          error: toErrorRecord(failure),
        });
      }
    }

    const validation = await this.validator.validate(stage);
    if (validation.kind !== 'ok') {
      const failure = new ValidationFailure(stage.name, describeValidationOutcome(validation));
      return this.buildResult(stage, session, startedAt, {
        outcome: 'validation-failure',
        process: last,
        validation,
        error: toErrorRecord(failure),
      });
    }

    return this.buildResult(stage, session, startedAt, {
      outcome: 'succeeded',
      process: last,
      validation,
    });
  }

  private buildResult(
    stage: StageDescriptor,
    session: RunSession,
    startedAt: Date,
    fields: {
      outcome: StageResult['outcome'];
      process?: ProcessOutcome | null;
      validation?: ValidationOutcome;
      error?: ErrorRecord;
      command?: string;
    }
  ): StageResult {
    const endedAt = new Date();
    const process = fields.process ?? null;

    return {
      stage: stage.name,
      ordinal: stage.ordinal,
      attempt: countAttempts(session.state, stage.name) + 1,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: Math.max(0, endedAt.getTime() - startedAt.getTime()),
      outcome: fields.outcome,
      exitCode: process?.exitCode ?? null,
      signal: process?.signal ?? null,
      timedOut: process?.timedOut ?? false,
      command: process?.command ?? fields.command ?? null,
      stdoutTail: process?.stdoutTail ?? '',
      stderrTail: process?.stderrTail ?? '',
      validation: fields.validation ?? null,
      error: fields.error ?? null,
    };
  }

  // ==========================================================================
  // Dry Run
  // ==========================================================================

  private async planDryRun(options: ExecuteOptions): Promise<RunReport> {
    const startedAt = Date.now();
    const stageOrder = this.registry.stageNames();
    const plannedCommands: PlannedCommand[] = [];

    const base = (state: RunState | null): RunReport => ({
      ...this.emptyReport('completed', { code: 'OK', message: '' }, startedAt),
      status: state?.status ?? 'pending',
      dryRun: true,
      error: null,
      state,
    });

    let state: RunState | null;
    try {
      state = await this.store.load(this.runId);
    } catch (error) {
      if (error instanceof PersistenceError) {
        return { ...base(null), cause: 'persistence-error', error: toErrorRecord(error) };
      }
      throw error;
    }

    try {
      this.assertStageContexts();
      const plan = computeResumePlan(state, stageOrder, { fromStage: options.fromStage });

      for (const name of plan.stagesToSkip) {
        options.callbacks?.onStageSkip?.(this.registry.get(name));
      }

      for (const name of plan.stagesToExecute) {
        const stage = this.registry.get(name);
        const plans = await this.resolvePlans(stage);
        stage.commands.forEach((template, index) => {
          const rendered = renderCommand(stage.name, template, {
            artifacts: this.artifacts,
            parameters: this.parameters(),
            stageDir: this.stageDir(stage),
          });
          plannedCommands.push({
            stage: stage.name,
            contextId: plans[index].contextId,
            command: formatCommand(plans[index].executablePath, rendered.args, rendered.stdoutPath),
          });
        });
      }

      return {
        ...base(state),
        stagesSkipped: plan.stagesToSkip,
        plannedCommands,
      };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return {
          ...base(state),
          cause: 'configuration-error',
          plannedCommands,
          error: toErrorRecord(error),
        };
      }
      throw error;
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Wire an orchestrator to the file checkpoint store, the context resolver
 * and the local process runner for a loaded configuration.
 */
export function createOrchestrator(
  loaded: LoadedRunConfig,
  options: { logger?: Logger; registry?: StageRegistry; baseEnv?: NodeJS.ProcessEnv } = {}
): PipelineOrchestrator {
  const resolver = new ContextResolver({
    contexts: loaded.config.contexts,
    executables: loaded.config.executables,
    cwd: loaded.config.outputDir,
    baseEnv: options.baseEnv,
  });

  return new PipelineOrchestrator({
    config: loaded.config,
    store: new FileCheckpointStore(loaded.checkpointRoot),
    resolver,
    runner: new LocalProcessRunner(resolver.activations),
    registry: options.registry,
    logger: options.logger,
    configFingerprint: loaded.fingerprint,
  });
}
