/**
 * Runtime Layer
 *
 * Runtime context resolution and external process execution.
 *
 * @module runtime
 */

export {
  ContextResolver,
  ContextActivations,
  detectInheritedContexts,
  type ExecutionPlan,
  type ContextCatalog,
  type ContextResolverOptions,
} from './contexts.js';

export {
  LocalProcessRunner,
  formatCommand,
  CONDA_STDERR_NOISE,
  DEFAULT_KILL_GRACE_MS,
  type ProcessRunner,
  type ProcessOutcome,
  type RunOptions,
  type OutputStream,
} from './process-runner.js';

export { TailBuffer, LineFilter } from './tail-buffer.js';
