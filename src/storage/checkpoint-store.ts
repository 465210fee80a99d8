/**
 * Checkpoint Store
 *
 * Durable record of run progress. One JSON file per run holds the full
 * RunState; every save replaces it atomically, so a load after any crash
 * returns either the previous or the new state.
 *
 * @module storage/checkpoint-store
 */

import { PersistenceError, RunLockedError, errorMessage } from '../errors.js';
import { RunStateSchema, type RunState } from '../schemas/run-state.js';
import { acceptSchemaVersion } from '../schemas/versions.js';
import { atomicWriteJson, readJsonIfExists } from './atomic.js';
import { acquireLock, isLockStale, readLock, releaseLock } from './lock.js';
import { getLockPath, getRunStatePath } from './paths.js';

// ============================================================================
// Interface
// ============================================================================

/**
 * Persistence contract used by the orchestrator.
 */
export interface CheckpointStore {
  /**
   * Load the run state for a run.
   * @returns The state, or null when the run has never been checkpointed
   * @throws PersistenceError if the checkpoint exists but is unreadable
   */
  load(runId: string): Promise<RunState | null>;

  /**
   * Persist the run state atomically.
   * @throws RunLockedError if another live writer holds the run's lock
   * @throws PersistenceError on any I/O failure
   */
  save(state: RunState): Promise<void>;

  /**
   * Become the exclusive writer of a run.
   * @throws RunLockedError if another live writer holds the lock
   */
  acquire(runId: string): Promise<void>;

  /** Give up the writer lock (no-op if not held). */
  release(runId: string): Promise<void>;
}

// ============================================================================
// File Implementation
// ============================================================================

/**
 * Checkpoint store backed by JSON files under a checkpoint root.
 *
 * @example
 * ```typescript
 * const store = new FileCheckpointStore('/data/out/.modpipe');
 * await store.acquire('run-1');
 * try {
 *   const state = (await store.load('run-1')) ?? createRunState(...);
 *   await store.save({ ...state, status: 'running' });
 * } finally {
 *   await store.release('run-1');
 * }
 * ```
 */
export class FileCheckpointStore implements CheckpointStore {
  /** Lock tokens held by this store, keyed by run id */
  private readonly heldLocks = new Map<string, string>();

  constructor(readonly root: string) {}

  async load(runId: string): Promise<RunState | null> {
    const filePath = getRunStatePath(this.root, runId);

    let raw: unknown;
    try {
      raw = await readJsonIfExists(filePath);
    } catch (error) {
      throw new PersistenceError(
        `Cannot read checkpoint for run "${runId}": ${errorMessage(error)}`,
        'CHECKPOINT_UNREADABLE',
        { cause: error }
      );
    }

    if (raw === null) {
      return null;
    }

    let migrated: unknown;
    try {
      migrated = acceptSchemaVersion(raw, 'runState');
    } catch (error) {
      throw new PersistenceError(errorMessage(error), 'CHECKPOINT_UNREADABLE', { cause: error });
    }

    const parsed = RunStateSchema.safeParse(migrated);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new PersistenceError(
        `Checkpoint for run "${runId}" is invalid: ${issues.join('; ')}`,
        'CHECKPOINT_INVALID'
      );
    }

    if (parsed.data.runId !== runId) {
      throw new PersistenceError(
        `Checkpoint at ${filePath} belongs to run "${parsed.data.runId}", not "${runId}"`,
        'CHECKPOINT_INVALID'
      );
    }

    return parsed.data;
  }

  async save(state: RunState): Promise<void> {
    const parsed = RunStateSchema.safeParse(state);
    if (!parsed.success) {
      throw new PersistenceError(
        `Refusing to save invalid run state: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        'CHECKPOINT_INVALID'
      );
    }

    await this.assertWriter(state.runId);

    try {
      await atomicWriteJson(getRunStatePath(this.root, state.runId), parsed.data);
    } catch (error) {
      throw new PersistenceError(errorMessage(error), 'CHECKPOINT_WRITE_FAILED', { cause: error });
    }
  }

  async acquire(runId: string): Promise<void> {
    if (this.heldLocks.has(runId)) {
      return;
    }
    try {
      const info = await acquireLock(getLockPath(this.root, runId), runId);
      this.heldLocks.set(runId, info.token);
    } catch (error) {
      if (error instanceof RunLockedError) {
        throw error;
      }
      throw new PersistenceError(
        `Cannot lock run "${runId}": ${errorMessage(error)}`,
        'LOCK_FAILED',
        { cause: error }
      );
    }
  }

  async release(runId: string): Promise<void> {
    const token = this.heldLocks.get(runId);
    if (token === undefined) {
      return;
    }
    this.heldLocks.delete(runId);
    try {
      await releaseLock(getLockPath(this.root, runId), token);
    } catch (error) {
      throw new PersistenceError(
        `Cannot release lock for run "${runId}": ${errorMessage(error)}`,
        'LOCK_FAILED',
        { cause: error }
      );
    }
  }

  /**
   * Check whether this store currently holds the writer lock for a run.
   */
  holds(runId: string): boolean {
    return this.heldLocks.has(runId);
  }

  /**
   * Refuse to write when a different live writer owns the run.
   */
  private async assertWriter(runId: string): Promise<void> {
    let existing: Awaited<ReturnType<typeof readLock>>;
    try {
      existing = await readLock(getLockPath(this.root, runId));
    } catch (error) {
      throw new PersistenceError(
        `Cannot read lock for run "${runId}": ${errorMessage(error)}`,
        'LOCK_FAILED',
        { cause: error }
      );
    }

    if (existing === null || existing === 'corrupt') {
      return;
    }

    const ours = this.heldLocks.get(runId);
    if (existing.token !== ours && !isLockStale(existing)) {
      throw new RunLockedError(runId, existing.pid);
    }
  }
}
