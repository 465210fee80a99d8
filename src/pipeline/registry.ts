/**
 * Stage Descriptor Registry
 *
 * Validates stage descriptors once, at load time, and serves them in
 * dependency order. A registry that constructs successfully guarantees
 * that every command can be rendered: all placeholders and artifact
 * references resolve and each artifact has exactly one producer.
 *
 * @module pipeline/registry
 */

import * as path from 'node:path';
import { IDENTIFIER_PATTERN, STAGE_NAME_PATTERN } from '../schemas/common.js';
import { StageDescriptorError } from '../errors.js';
import { getStageOutputDir } from '../storage/paths.js';
import {
  buildDependencyGraph,
  collectReferences,
  extractPlaceholders,
  topologicalOrder,
  type DependencyGraph,
} from './dependencies.js';
import { BUILTIN_STAGES, RUN_INPUT_NAMES } from './stages.js';
import {
  PARAMETER_PLACEHOLDERS,
  STAGE_DIR_PLACEHOLDER,
  type ArtifactRef,
  type ArtifactTable,
  type CommandTemplate,
  type RenderedCommand,
  type StageDescriptor,
  type StageParameters,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Locations of the user-supplied run inputs and the output root.
 */
export interface RunLayout {
  inputDir: string;
  reference: string;
  outputDir: string;
}

const RUN_INPUTS: ReadonlySet<string> = new Set(Object.values(RUN_INPUT_NAMES));

const RESERVED_PLACEHOLDERS: ReadonlySet<string> = new Set([
  ...Object.keys(PARAMETER_PLACEHOLDERS),
  STAGE_DIR_PLACEHOLDER,
]);

function isParameterPlaceholder(name: string): name is keyof typeof PARAMETER_PLACEHOLDERS {
  return name in PARAMETER_PLACEHOLDERS;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function cloneDescriptor(stage: StageDescriptor): StageDescriptor {
  return {
    ...stage,
    commands: stage.commands.map((command) => ({ ...command, args: [...command.args] })),
    inputs: [...stage.inputs],
    outputs: stage.outputs.map((output) => ({ ...output })),
    validation: stage.validation.map((rule) =>
      rule.check === 'delimited-header' ? { ...rule, columns: [...rule.columns] } : { ...rule }
    ),
  };
}

// ============================================================================
// Descriptor Validation
// ============================================================================

/**
 * Check one descriptor in isolation.
 */
function validateShape(stage: StageDescriptor): void {
  const fail = (detail: string): never => {
    throw new StageDescriptorError(stage.name, detail);
  };

  if (!STAGE_NAME_PATTERN.test(stage.name)) {
    fail('name must be kebab-case');
  }
  if (!Number.isInteger(stage.ordinal) || stage.ordinal < 1) {
    fail('ordinal must be a positive integer');
  }
  if (stage.context.length === 0) {
    fail('runtime context is required');
  }
  if (stage.commands.length === 0) {
    fail('at least one command is required');
  }
  if (stage.outputs.length === 0) {
    fail('at least one output artifact is required');
  }

  for (const command of stage.commands) {
    if (command.tool.length === 0) {
      fail('command tool is required');
    }
  }

  for (const output of stage.outputs) {
    if (!IDENTIFIER_PATTERN.test(output.name)) {
      fail(`artifact name "${output.name}" is not a valid identifier`);
    }
    if (RESERVED_PLACEHOLDERS.has(output.name) || RUN_INPUTS.has(output.name)) {
      fail(`artifact name "${output.name}" is reserved`);
    }
    if (path.isAbsolute(output.path) || output.path.split('/').includes('..')) {
      fail(`artifact "${output.name}" must stay inside the stage directory`);
    }
    if (output.minSizeBytes !== undefined && output.kind === 'directory') {
      fail(`artifact "${output.name}" is a directory and cannot declare a minimum size`);
    }
  }
}

/**
 * Validate a set of descriptors and return them in execution order.
 *
 * @throws StageDescriptorError when
 * - stage names or ordinals repeat
 * - an artifact has two producers
 * - an input or command references an artifact that is neither a run
 *   input nor declared by the stage itself or an earlier stage
 * - a placeholder is unknown
 * - a stdout target or validation rule names an artifact the stage does not produce
 */
export function validateDescriptors(descriptors: readonly StageDescriptor[]): {
  ordered: StageDescriptor[];
  graph: DependencyGraph;
  producers: Map<string, string>;
} {
  const byName = new Map<string, StageDescriptor>();
  const ordinals = new Map<number, string>();
  const producers = new Map<string, string>();

  for (const stage of descriptors) {
    validateShape(stage);

    if (byName.has(stage.name)) {
      throw new StageDescriptorError(stage.name, 'stage name is declared more than once');
    }
    byName.set(stage.name, stage);

    const clash = ordinals.get(stage.ordinal);
    if (clash !== undefined) {
      throw new StageDescriptorError(stage.name, `ordinal ${stage.ordinal} is already used by "${clash}"`);
    }
    ordinals.set(stage.ordinal, stage.name);

    for (const output of stage.outputs) {
      const existing = producers.get(output.name);
      if (existing !== undefined) {
        throw new StageDescriptorError(
          stage.name,
          `artifact "${output.name}" is already produced by "${existing}"`
        );
      }
      producers.set(output.name, stage.name);
    }
  }

  const ordinalOf = (name: string): number => byName.get(name)?.ordinal ?? Number.MAX_SAFE_INTEGER;

  for (const stage of descriptors) {
    const own = new Set(stage.outputs.map((output) => output.name));
    const fail = (detail: string): never => {
      throw new StageDescriptorError(stage.name, detail);
    };

    for (const name of collectReferences(stage)) {
      if (RESERVED_PLACEHOLDERS.has(name) || RUN_INPUTS.has(name) || own.has(name)) {
        continue;
      }
      const producer = producers.get(name);
      if (producer === undefined) {
        fail(`unknown artifact or placeholder "{${name}}"`);
      } else if (ordinalOf(producer) > stage.ordinal) {
        fail(`references "${name}" produced by later stage "${producer}"`);
      }
    }

    for (const input of stage.inputs) {
      if (own.has(input)) {
        fail(`input "${input}" is also one of its own outputs`);
      }
      if (RESERVED_PLACEHOLDERS.has(input)) {
        fail(`input "${input}" is a parameter, not an artifact`);
      }
    }

    for (const command of stage.commands) {
      if (command.stdoutTo !== undefined) {
        const target = stage.outputs.find((output) => output.name === command.stdoutTo);
        if (target === undefined || target.kind !== 'file') {
          fail(`stdout target "${command.stdoutTo}" must be one of its own file outputs`);
        }
      }
    }

    for (const rule of stage.validation) {
      if (!own.has(rule.artifact)) {
        fail(`validation rule "${rule.check}" targets "${rule.artifact}", which the stage does not produce`);
      }
      if (rule.check === 'index-newer-than' && !own.has(rule.target) && !producers.has(rule.target)) {
        fail(`validation rule "index-newer-than" targets unknown artifact "${rule.target}"`);
      }
    }
  }

  const graph = buildDependencyGraph(descriptors, producers);
  const order = topologicalOrder(graph, ordinalOf);
  const ordered = order.map((name) => byName.get(name)).filter(
    (stage): stage is StageDescriptor => stage !== undefined
  );

  return { ordered, graph, producers };
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Ordered, frozen set of stage descriptors.
 *
 * @example
 * ```typescript
 * const registry = new StageRegistry();
 * registry.getOrderedStages().map((s) => s.name);
 * // ['convert-format', 'basecall', 'align', 'realign-signal', 'infer-modification']
 * ```
 */
export class StageRegistry {
  private readonly ordered: readonly StageDescriptor[];
  private readonly byName: ReadonlyMap<string, StageDescriptor>;
  private readonly producers: ReadonlyMap<string, string>;

  /** Artifact-level dependency graph between stages */
  readonly graph: DependencyGraph;

  constructor(descriptors: readonly StageDescriptor[] = BUILTIN_STAGES) {
    const { ordered, graph, producers } = validateDescriptors(descriptors);
    this.ordered = deepFreeze(ordered.map(cloneDescriptor));
    this.byName = new Map(this.ordered.map((stage) => [stage.name, stage]));
    this.producers = producers;
    this.graph = graph;
  }

  getOrderedStages(): readonly StageDescriptor[] {
    return this.ordered;
  }

  stageNames(): string[] {
    return this.ordered.map((stage) => stage.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): StageDescriptor {
    const stage = this.byName.get(name);
    if (stage === undefined) {
      throw new Error(`Unknown stage: ${name}`);
    }
    return stage;
  }

  /** Position of a stage in execution order */
  indexOf(name: string): number {
    return this.ordered.findIndex((stage) => stage.name === name);
  }

  producerOf(artifact: string): string | null {
    return this.producers.get(artifact) ?? null;
  }

  /**
   * Compute the absolute path of every artifact for one run.
   */
  resolveArtifacts(layout: RunLayout): ArtifactTable {
    const table = new Map<string, ArtifactRef>();
    const add = (ref: ArtifactRef): void => {
      table.set(ref.name, Object.freeze(ref));
    };

    add({ name: RUN_INPUT_NAMES.inputDir, path: layout.inputDir, kind: 'directory', producer: null });
    add({ name: RUN_INPUT_NAMES.reference, path: layout.reference, kind: 'file', producer: null });

    for (const stage of this.ordered) {
      const stageDir = getStageOutputDir(layout.outputDir, stage.ordinal, stage.name);
      for (const output of stage.outputs) {
        add({
          name: output.name,
          path: path.join(stageDir, output.path),
          kind: output.kind,
          minSizeBytes: output.minSizeBytes,
          producer: stage.name,
        });
      }
    }

    return table;
  }
}

// ============================================================================
// Command Rendering
// ============================================================================

export interface RenderContext {
  artifacts: ArtifactTable;
  parameters: StageParameters;
  stageDir: string;
}

/**
 * Substitute every placeholder of a command template.
 *
 * @throws StageDescriptorError for a placeholder with no value
 */
export function renderCommand(
  stage: string,
  template: CommandTemplate,
  context: RenderContext
): RenderedCommand {
  const lookup = (name: string): string => {
    if (name === STAGE_DIR_PLACEHOLDER) {
      return context.stageDir;
    }
    if (isParameterPlaceholder(name)) {
      return String(context.parameters[PARAMETER_PLACEHOLDERS[name]]);
    }
    const artifact = context.artifacts.get(name);
    if (artifact === undefined) {
      throw new StageDescriptorError(stage, `unknown artifact or placeholder "{${name}}"`);
    }
    return artifact.path;
  };

  const args = template.args.map((arg) =>
    extractPlaceholders(arg).length === 0
      ? arg
      : arg.replace(/\{([A-Za-z][A-Za-z0-9_-]*)\}/g, (_match, name: string) => lookup(name))
  );

  let stdoutPath: string | undefined;
  if (template.stdoutTo !== undefined) {
    stdoutPath = lookup(template.stdoutTo);
  }

  return { tool: template.tool, args, stdoutPath };
}
