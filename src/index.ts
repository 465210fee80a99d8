/**
 * modpipe
 *
 * Checkpointed orchestrator for a nanopore RNA modification calling
 * workflow: pod5 conversion, basecalling, alignment, signal realignment
 * and modification inference, each run by an external tool inside its
 * own runtime context.
 *
 * @module modpipe
 */

export * from './errors.js';
export * from './schemas/index.js';
export * from './config/index.js';
export * from './storage/index.js';
export * from './runtime/index.js';
export * from './pipeline/index.js';
