/**
 * Tests for the Stage Dependency Graph
 *
 * @module pipeline/dependencies.test
 */

import { describe, it, expect } from '@jest/globals';
import { StageDescriptorError } from '../errors.js';
import {
  buildDependencyGraph,
  collectReferences,
  dependsOn,
  extractPlaceholders,
  getDownstreamStages,
  getImmediateUpstream,
  getUpstreamStages,
  topologicalOrder,
  type DependencyGraph,
} from './dependencies.js';
import { BUILTIN_STAGES, alignStage, inferModificationStage } from './stages.js';

function builtinGraph(): DependencyGraph {
  const producers = new Map<string, string>();
  for (const stage of BUILTIN_STAGES) {
    for (const output of stage.outputs) {
      producers.set(output.name, stage.name);
    }
  }
  return buildDependencyGraph(BUILTIN_STAGES, producers);
}

function rankBy(order: Record<string, number>): (name: string) => number {
  return (name) => order[name] ?? 99;
}

function graphOf(edges: Record<string, string[]>): DependencyGraph {
  return {
    stages: Object.keys(edges),
    upstream: new Map(Object.entries(edges).map(([stage, deps]) => [stage, new Set(deps)])),
  };
}

describe('pipeline/dependencies', () => {
  // ==========================================================================
  // Reference Extraction
  // ==========================================================================

  describe('extractPlaceholders', () => {
    it('should find every placeholder in an argument', () => {
      expect(extractPlaceholders('{stage_dir}/inference')).toEqual(['stage_dir']);
      expect(extractPlaceholders('{a}:{b}')).toEqual(['a', 'b']);
    });

    it('should ignore literal text and malformed braces', () => {
      expect(extractPlaceholders('map-ont')).toEqual([]);
      expect(extractPlaceholders('{1abc}')).toEqual([]);
      expect(extractPlaceholders('{}')).toEqual([]);
    });
  });

  describe('collectReferences', () => {
    it('should include inputs, placeholders and stdout targets', () => {
      const refs = collectReferences(alignStage);

      expect([...refs].sort()).toEqual(
        ['aligned_sam', 'reads_fastq', 'reference', 'sorted_bam', 'threads'].sort()
      );
    });

    it('should include the stage_dir placeholder', () => {
      expect(collectReferences(inferModificationStage).has('stage_dir')).toBe(true);
    });
  });

  // ==========================================================================
  // Built-in Graph
  // ==========================================================================

  describe('built-in workflow graph', () => {
    const graph = builtinGraph();

    it('should form a linear chain', () => {
      expect(getImmediateUpstream(graph, 'convert-format')).toEqual([]);
      expect(getImmediateUpstream(graph, 'basecall')).toEqual(['convert-format']);
      expect(getImmediateUpstream(graph, 'align')).toEqual(['basecall']);
      expect(getImmediateUpstream(graph, 'infer-modification')).toEqual(['realign-signal']);
    });

    it('should let realign-signal consume both basecall and align outputs', () => {
      expect(getImmediateUpstream(graph, 'realign-signal')).toEqual(['basecall', 'align']);
    });

    it('should list all transitive upstream stages in declaration order', () => {
      expect(getUpstreamStages(graph, 'realign-signal')).toEqual([
        'convert-format',
        'basecall',
        'align',
      ]);
    });

    it('should list downstream stages', () => {
      expect(getDownstreamStages(graph, 'align')).toEqual(['realign-signal', 'infer-modification']);
      expect(getDownstreamStages(graph, 'infer-modification')).toEqual([]);
    });

    it('should answer dependsOn transitively but not reflexively', () => {
      expect(dependsOn(graph, 'infer-modification', 'convert-format')).toBe(true);
      expect(dependsOn(graph, 'basecall', 'align')).toBe(false);
      expect(dependsOn(graph, 'align', 'align')).toBe(false);
    });

    it('should keep the declared order when sorted', () => {
      const rank = (name: string): number => BUILTIN_STAGES.findIndex((s) => s.name === name);
      expect(topologicalOrder(graph, rank)).toEqual(BUILTIN_STAGES.map((s) => s.name));
    });

    it('should throw for unknown stages', () => {
      expect(() => getUpstreamStages(graph, 'qc')).toThrow('Unknown stage: qc');
      expect(() => getImmediateUpstream(graph, 'qc')).toThrow('Unknown stage: qc');
      expect(() => getDownstreamStages(graph, 'qc')).toThrow('Unknown stage: qc');
    });
  });

  // ==========================================================================
  // Topological Order
  // ==========================================================================

  describe('topologicalOrder', () => {
    it('should place dependencies first regardless of rank', () => {
      const graph = graphOf({ a: ['b'], b: [], c: ['a'] });
      const rank = rankBy({ a: 0, b: 1, c: 2 });

      expect(topologicalOrder(graph, rank)).toEqual(['b', 'a', 'c']);
    });

    it('should break ties by rank', () => {
      const graph = graphOf({ x: [], y: [], z: ['x', 'y'] });
      const rank = rankBy({ x: 2, y: 1, z: 0 });

      expect(topologicalOrder(graph, rank)).toEqual(['y', 'x', 'z']);
    });

    it('should report a cycle as a descriptor error', () => {
      const graph = graphOf({ a: ['b'], b: ['a'] });

      expect(() => topologicalOrder(graph, () => 0)).toThrow(StageDescriptorError);
      expect(() => topologicalOrder(graph, () => 0)).toThrow('dependency cycle among a, b');
    });
  });
});
