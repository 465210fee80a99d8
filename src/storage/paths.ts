/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for checkpoints and run outputs.
 * Every path of a run is derived once from its output root.
 *
 * Directory Structure:
 * ```
 * <outputDir>/                                   # Output root of one run
 * ├── manifest.json                              # Written when the run succeeds
 * ├── 01_convert-format/                         # Artifacts of stage 1
 * ├── 02_basecall/
 * ├── ...
 * └── .modpipe/                                  # Default checkpoint root
 *     └── <run_id>/
 *         ├── run-state.json                     # Checkpointed RunState
 *         └── writer.lock                        # Exclusive writer lock
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** Directory name of the default checkpoint root inside the output root */
export const CHECKPOINT_DIR_NAME = '.modpipe';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'runId')
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Expand a leading `~` and resolve to an absolute path.
 *
 * @example
 * ```typescript
 * expandPath('~/data/run1'); // '/home/user/data/run1'
 * expandPath('out', '/work'); // '/work/out'
 * ```
 */
export function expandPath(p: string, baseDir: string = process.cwd()): string {
  if (p === '~') {
    return os.homedir();
  }
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return path.resolve(baseDir, p);
}

/**
 * Gets the checkpoint root for an output directory.
 */
export function getDefaultCheckpointRoot(outputDir: string): string {
  return path.join(outputDir, CHECKPOINT_DIR_NAME);
}

/**
 * Gets the checkpoint directory for a specific run.
 *
 * @throws {Error} If runId is empty or unsafe
 */
export function getRunCheckpointDir(checkpointRoot: string, runId: string): string {
  validateIdSecurity(runId, 'runId');
  return path.join(checkpointRoot, runId);
}

/**
 * Gets the run state file path for a run.
 */
export function getRunStatePath(checkpointRoot: string, runId: string): string {
  return path.join(getRunCheckpointDir(checkpointRoot, runId), 'run-state.json');
}

/**
 * Gets the writer lock file path for a run.
 */
export function getLockPath(checkpointRoot: string, runId: string): string {
  return path.join(getRunCheckpointDir(checkpointRoot, runId), 'writer.lock');
}

/**
 * Gets the output manifest path.
 */
export function getManifestPath(outputDir: string): string {
  return path.join(outputDir, 'manifest.json');
}

/**
 * Gets the artifact directory of a stage: `NN_stage-name`.
 *
 * @example
 * ```typescript
 * getStageOutputDir('/out', 3, 'align'); // '/out/03_align'
 * ```
 */
export function getStageOutputDir(outputDir: string, ordinal: number, stageName: string): string {
  return path.join(outputDir, `${ordinal.toString().padStart(2, '0')}_${stageName}`);
}
