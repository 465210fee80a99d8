/**
 * Pipeline Infrastructure
 *
 * Stage descriptors, artifact validation, resume planning and the
 * orchestrator that drives a run through the five-stage workflow.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  type ArtifactKind,
  type ArtifactDeclaration,
  type ArtifactRef,
  type ArtifactTable,
  type CommandTemplate,
  type StageParameters,
  type RenderedCommand,
  type ValidationRule,
  type BamRecordsRule,
  type FastqRecordsRule,
  type IndexNewerThanRule,
  type DelimitedHeaderRule,
  type StageDescriptor,
  type Logger,
  PARAMETER_PLACEHOLDERS,
  STAGE_DIR_PLACEHOLDER,
  silentLogger,
  formatStageNumber,
  buildStageId,
} from './types.js';

// Built-in workflow
export {
  RUN_INPUT_NAMES,
  BUILTIN_STAGES,
  convertFormatStage,
  basecallStage,
  alignStage,
  realignSignalStage,
  inferModificationStage,
} from './stages.js';

// Stage dependencies
export {
  type DependencyGraph,
  extractPlaceholders,
  collectReferences,
  buildDependencyGraph,
  topologicalOrder,
  getImmediateUpstream,
  getUpstreamStages,
  getDownstreamStages,
  dependsOn,
} from './dependencies.js';

// Registry
export {
  type RunLayout,
  type RenderContext,
  StageRegistry,
  validateDescriptors,
  renderCommand,
} from './registry.js';

// Artifact validation
export {
  OK,
  checkArtifact,
  checkBamRecords,
  checkFastqRecords,
  checkDelimitedHeader,
  checkIndexNewerThan,
  scanBamPrefix,
} from './checks.js';
export { ArtifactValidator, describeValidationOutcome } from './validator.js';

// Resume planning
export {
  type ResumePlan,
  type ResumeOptions,
  isValidatedSuccess,
  findResumeIndex,
  computeResumePlan,
} from './resume.js';

// Manifest generation
export {
  type ManifestVerificationResult,
  calculateFileHash,
  createArtifactEntry,
  generateManifest,
  saveManifest,
  loadManifest,
  verifyManifest,
} from './manifest.js';

// Orchestrator
export {
  type RunCause,
  type PlanResolver,
  type OrchestratorCallbacks,
  type ExecuteOptions,
  type PlannedCommand,
  type RunReport,
  type OrchestratorOptions,
  PipelineOrchestrator,
  createOrchestrator,
  sleep,
  statusForCause,
} from './orchestrator.js';
