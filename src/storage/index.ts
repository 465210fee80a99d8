/**
 * Storage Layer
 *
 * File-based persistence for run checkpoints and writer locks.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  CHECKPOINT_DIR_NAME,
  validateIdSecurity,
  expandPath,
  getDefaultCheckpointRoot,
  getRunCheckpointDir,
  getRunStatePath,
  getLockPath,
  getManifestPath,
  getStageOutputDir,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, readJsonIfExists, fileExists } from './atomic.js';

// Writer lock
export {
  LockInfoSchema,
  acquireLock,
  releaseLock,
  readLock,
  isLockStale,
  isProcessAlive,
  type LockInfo,
} from './lock.js';

// Checkpoint store
export { FileCheckpointStore, type CheckpointStore } from './checkpoint-store.js';
