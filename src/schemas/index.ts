/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used by the orchestrator.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, acceptSchemaVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  RunIdSchema,
  StageNameSchema,
  IdentifierSchema,
  RUN_ID_PATTERN,
  STAGE_NAME_PATTERN,
  IDENTIFIER_PATTERN,
  type ISO8601Timestamp,
} from './common.js';

// ============================================================================
// Run Configuration
// ============================================================================

export {
  RunConfigSchema,
  RuntimeContextSchema,
  SystemContextSchema,
  CondaContextSchema,
  DEFAULT_CONTEXT_IDS,
  DEFAULT_STAGE_TIMEOUT_MS,
  MIN_DIAGNOSTIC_TAIL_BYTES,
  MAX_TIMER_MS,
  createDefaultContexts,
  type RunConfig,
  type RunConfigInput,
  type RuntimeContext,
  type SystemContext,
  type CondaContext,
} from './run-config.js';

// ============================================================================
// Run State
// ============================================================================

export {
  RunStateSchema,
  RunStatusSchema,
  StageResultSchema,
  StageOutcomeSchema,
  ValidationOutcomeSchema,
  ErrorRecordSchema,
  createRunState,
  lastResultFor,
  countAttempts,
  type RunState,
  type RunStatus,
  type StageResult,
  type StageOutcome,
  type ValidationOutcome,
  type ErrorRecord,
} from './run-state.js';

// ============================================================================
// Manifest
// ============================================================================

export {
  RunManifestSchema,
  ManifestArtifactEntrySchema,
  createEmptyManifest,
  addArtifactToManifest,
  type RunManifest,
  type ManifestArtifactEntry,
} from './manifest.js';
