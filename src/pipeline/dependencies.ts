/**
 * Stage Dependency Graph
 *
 * Stages depend on each other through artifacts: a stage that consumes an
 * artifact depends on the stage that produces it. The resulting DAG drives:
 * - Stage ordering
 * - Upstream/downstream stage discovery (from-stage checks, `stages` listing)
 * - Cycle detection at registry load time
 *
 * @module pipeline/dependencies
 */

import { StageDescriptorError } from '../errors.js';
import type { StageDescriptor } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface DependencyGraph {
  /** Stage names in declaration order */
  readonly stages: readonly string[];

  /** Stage → stages producing something it consumes */
  readonly upstream: ReadonlyMap<string, ReadonlySet<string>>;
}

const PLACEHOLDER_PATTERN = /\{([A-Za-z][A-Za-z0-9_-]*)\}/g;

// ============================================================================
// Reference Extraction
// ============================================================================

/**
 * Placeholder names used in one argument.
 *
 * @example
 * extractPlaceholders('{stage_dir}/inference'); // ['stage_dir']
 */
export function extractPlaceholders(arg: string): string[] {
  return Array.from(arg.matchAll(PLACEHOLDER_PATTERN), (match) => match[1]);
}

/**
 * Every name a stage refers to: declared inputs, placeholders in its
 * commands and stdout targets.
 */
export function collectReferences(stage: StageDescriptor): Set<string> {
  const names = new Set<string>(stage.inputs);
  for (const command of stage.commands) {
    for (const arg of command.args) {
      for (const name of extractPlaceholders(arg)) {
        names.add(name);
      }
    }
    if (command.stdoutTo !== undefined) {
      names.add(command.stdoutTo);
    }
  }
  return names;
}

// ============================================================================
// Graph Construction
// ============================================================================

/**
 * Build the stage DAG.
 *
 * @param producers - Artifact name → producing stage name
 */
export function buildDependencyGraph(
  descriptors: readonly StageDescriptor[],
  producers: ReadonlyMap<string, string>
): DependencyGraph {
  const upstream = new Map<string, Set<string>>();

  for (const stage of descriptors) {
    const deps = new Set<string>();
    for (const name of collectReferences(stage)) {
      const producer = producers.get(name);
      if (producer !== undefined && producer !== stage.name) {
        deps.add(producer);
      }
    }
    upstream.set(stage.name, deps);
  }

  return { stages: descriptors.map((stage) => stage.name), upstream };
}

/**
 * Order stages so every stage comes after its dependencies. Ties are broken
 * by `rank` (lower first), so a linear workflow keeps its declared order.
 *
 * @throws StageDescriptorError on a dependency cycle
 */
export function topologicalOrder(
  graph: DependencyGraph,
  rank: (stage: string) => number
): string[] {
  const remaining = new Map<string, Set<string>>();
  for (const stage of graph.stages) {
    remaining.set(stage, new Set(graph.upstream.get(stage)));
  }

  const ordered: string[] = [];
  while (remaining.size > 0) {
    const ready = [...remaining.entries()]
      .filter(([, deps]) => deps.size === 0)
      .map(([stage]) => stage)
      .sort((a, b) => rank(a) - rank(b));

    if (ready.length === 0) {
      const stuck = [...remaining.keys()].sort((a, b) => rank(a) - rank(b));
      throw new StageDescriptorError(stuck[0], `dependency cycle among ${stuck.join(', ')}`);
    }

    const next = ready[0];
    ordered.push(next);
    remaining.delete(next);
    for (const deps of remaining.values()) {
      deps.delete(next);
    }
  }

  return ordered;
}

// ============================================================================
// Dependency Queries
// ============================================================================

function assertKnownStage(graph: DependencyGraph, stage: string): void {
  if (!graph.upstream.has(stage)) {
    throw new Error(`Unknown stage: ${stage}`);
  }
}

/**
 * Stages that `stage` consumes artifacts from directly.
 *
 * @example
 * getImmediateUpstream(graph, 'align'); // ['basecall']
 */
export function getImmediateUpstream(graph: DependencyGraph, stage: string): string[] {
  assertKnownStage(graph, stage);
  return graph.stages.filter((name) => graph.upstream.get(stage)?.has(name));
}

/**
 * All stages `stage` depends on, directly or transitively, in declaration
 * order.
 *
 * @example
 * getUpstreamStages(graph, 'align'); // ['convert-format', 'basecall']
 */
export function getUpstreamStages(graph: DependencyGraph, stage: string): string[] {
  assertKnownStage(graph, stage);

  const seen = new Set<string>();
  const pending = [...(graph.upstream.get(stage) ?? [])];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    pending.push(...(graph.upstream.get(current) ?? []));
  }

  return graph.stages.filter((name) => seen.has(name));
}

/**
 * All stages that depend on `stage`, directly or transitively.
 */
export function getDownstreamStages(graph: DependencyGraph, stage: string): string[] {
  assertKnownStage(graph, stage);
  return graph.stages.filter(
    (name) => name !== stage && getUpstreamStages(graph, name).includes(stage)
  );
}

/**
 * Check if one stage depends on another (directly or transitively).
 * A stage does not depend on itself.
 */
export function dependsOn(graph: DependencyGraph, stage: string, upstream: string): boolean {
  return getUpstreamStages(graph, stage).includes(upstream);
}
