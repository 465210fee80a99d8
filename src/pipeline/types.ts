/**
 * Pipeline Type Definitions
 *
 * Stage descriptors are plain data: which tool to run with which arguments,
 * in which runtime context, consuming and producing which artifacts, and
 * how to tell a real output from a silent failure.
 *
 * @module pipeline/types
 */

// ============================================================================
// Artifacts
// ============================================================================

export type ArtifactKind = 'file' | 'directory';

/**
 * An output a stage declares, relative to its own output directory.
 */
export interface ArtifactDeclaration {
  /** Logical name, referenced as `{name}` in command templates */
  readonly name: string;

  /** Path relative to the stage output directory (e.g. "calls.bam") */
  readonly path: string;

  readonly kind: ArtifactKind;

  /** Smallest acceptable size in bytes; files only */
  readonly minSizeBytes?: number;
}

/**
 * A resolved artifact: absolute path plus the stage that produces it
 * (null for run inputs supplied by the user).
 */
export interface ArtifactRef {
  readonly name: string;
  readonly path: string;
  readonly kind: ArtifactKind;
  readonly minSizeBytes?: number;
  readonly producer: string | null;
}

/** Every artifact of a run, computed once at run start */
export type ArtifactTable = ReadonlyMap<string, ArtifactRef>;

// ============================================================================
// Commands
// ============================================================================

/**
 * One external command of a stage.
 *
 * Arguments may contain `{placeholder}` tokens naming an artifact or a run
 * parameter (see PARAMETER_PLACEHOLDERS); they are substituted at run time.
 */
export interface CommandTemplate {
  /** Tool key, looked up in the runtime context (e.g. "samtools") */
  readonly tool: string;

  readonly args: readonly string[];

  /** Artifact that receives the command's stdout */
  readonly stdoutTo?: string;
}

/**
 * Run parameters available to command templates.
 */
export interface StageParameters {
  threads: number;
  basecallModel: string;
  modifiedBases: string;
  inferenceIterations: number;
}

/** Placeholder name → parameter */
export const PARAMETER_PLACEHOLDERS = {
  threads: 'threads',
  basecall_model: 'basecallModel',
  modified_bases: 'modifiedBases',
  inference_iterations: 'inferenceIterations',
} as const satisfies Record<string, keyof StageParameters>;

/** Expands to the stage's own output directory */
export const STAGE_DIR_PLACEHOLDER = 'stage_dir';

/**
 * A command with every placeholder substituted.
 */
export interface RenderedCommand {
  tool: string;
  args: string[];
  stdoutPath?: string;
}

// ============================================================================
// Validation Rules
// ============================================================================

/** BGZF container with a BAM header and at least one alignment record */
export interface BamRecordsRule {
  readonly check: 'bam-records';
  readonly artifact: string;
}

/** At least `minRecords` complete four-line FASTQ records */
export interface FastqRecordsRule {
  readonly check: 'fastq-records';
  readonly artifact: string;
  readonly minRecords: number;
}

/** Index file modified no earlier than the file it indexes */
export interface IndexNewerThanRule {
  readonly check: 'index-newer-than';
  readonly artifact: string;
  readonly target: string;
}

/** Delimited text with required header columns and a minimum row count */
export interface DelimitedHeaderRule {
  readonly check: 'delimited-header';
  readonly artifact: string;
  readonly delimiter: string;
  readonly columns: readonly string[];
  readonly minRows: number;
}

export type ValidationRule =
  | BamRecordsRule
  | FastqRecordsRule
  | IndexNewerThanRule
  | DelimitedHeaderRule;

// ============================================================================
// Stage Descriptor
// ============================================================================

/**
 * Static description of one pipeline stage. Frozen once registered.
 */
export interface StageDescriptor {
  /** Kebab-case stage name (e.g. "realign-signal") */
  readonly name: string;

  /** Position in the workflow, also used for output directory names */
  readonly ordinal: number;

  readonly description: string;

  /** Runtime context id the commands run in */
  readonly context: string;

  /** Executed in order; each must exit 0 */
  readonly commands: readonly CommandTemplate[];

  /** Artifacts that must exist before the stage starts */
  readonly inputs: readonly string[];

  readonly outputs: readonly ArtifactDeclaration[];

  readonly validation: readonly ValidationRule[];
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline components.
 * Lets the orchestrator log at various levels without depending on a
 * specific logger.
 */
export interface Logger {
  /** Log debug-level message (hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

const noop = (): void => {};

/** Logger that discards everything */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a stage ordinal as a two-digit string with leading zero.
 * @returns Two-digit string (e.g., "01", "05")
 */
export function formatStageNumber(ordinal: number): string {
  return ordinal.toString().padStart(2, '0');
}

/**
 * Build a stage ID from ordinal and name.
 * @returns Stage ID in format NN_stage-name
 */
export function buildStageId(ordinal: number, name: string): string {
  return `${formatStageNumber(ordinal)}_${name}`;
}
