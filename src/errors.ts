/**
 * Error Taxonomy
 *
 * Every failure the orchestrator can meet falls into one of four families:
 *
 * - ConfigurationError: unknown or conflicting runtime context, missing
 *   executable, malformed stage descriptor, invalid run config. Fatal.
 * - ProcessFailure: non-zero exit or timeout of an external tool. Retried.
 * - ValidationFailure: tool exited 0 but its declared outputs are missing,
 *   empty or malformed. Retried, logged apart from ProcessFailure.
 * - PersistenceError: checkpoint could not be written or read. Fatal.
 *
 * @module errors
 */

/**
 * Families of failure, used for exit-code mapping and stage outcomes.
 */
export type ErrorKind = 'configuration' | 'process' | 'validation' | 'persistence';

/**
 * Base class for all orchestrator errors.
 */
export abstract class ModpipeError extends Error {
  abstract readonly kind: ErrorKind;

  /** Stable machine-readable code (e.g. "CONTEXT_NOT_FOUND") */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends ModpipeError {
  readonly kind = 'configuration' as const;

  constructor(message: string, code = 'CONFIGURATION_ERROR', options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class ContextNotFoundError extends ConfigurationError {
  constructor(readonly contextId: string) {
    super(`Runtime context not found: ${contextId}`, 'CONTEXT_NOT_FOUND');
  }
}

export class ContextConflictError extends ConfigurationError {
  constructor(
    readonly contextId: string,
    readonly activeContextId: string
  ) {
    super(
      `Runtime context "${contextId}" cannot be used while "${activeContextId}" is active`,
      'CONTEXT_CONFLICT'
    );
  }
}

export class ExecutableNotFoundError extends ConfigurationError {
  constructor(
    readonly tool: string,
    readonly contextId: string,
    readonly searched: string[]
  ) {
    super(
      `Executable for "${tool}" not found in context "${contextId}" (searched: ${
        searched.length > 0 ? searched.join(', ') : 'nothing'
      })`,
      'EXECUTABLE_NOT_FOUND'
    );
  }
}

export class StageDescriptorError extends ConfigurationError {
  constructor(
    readonly stage: string,
    detail: string
  ) {
    super(`Invalid stage descriptor "${stage}": ${detail}`, 'STAGE_DESCRIPTOR_INVALID');
  }
}

export class MissingInputError extends ConfigurationError {
  constructor(
    readonly stage: string,
    readonly artifact: string,
    readonly path: string
  ) {
    super(
      `Stage "${stage}" cannot start: input "${artifact}" not found at ${path}`,
      'MISSING_INPUT'
    );
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, 'INVALID_CONFIG');
  }
}

// ============================================================================
// Stage Failures
// ============================================================================

export class ProcessFailure extends ModpipeError {
  readonly kind = 'process' as const;

  constructor(
    readonly stage: string,
    message: string
  ) {
    super('PROCESS_FAILURE', message);
  }
}

export class ValidationFailure extends ModpipeError {
  readonly kind = 'validation' as const;

  constructor(
    readonly stage: string,
    message: string
  ) {
    super('VALIDATION_FAILURE', message);
  }
}

// ============================================================================
// Persistence Errors
// ============================================================================

export class PersistenceError extends ModpipeError {
  readonly kind = 'persistence' as const;

  constructor(message: string, code = 'PERSISTENCE_ERROR', options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class RunLockedError extends PersistenceError {
  constructor(
    readonly runId: string,
    readonly holderPid: number
  ) {
    super(`Run "${runId}" is locked by another writer (PID ${holderPid})`, 'RUN_LOCKED');
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize an unknown thrown value to a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
