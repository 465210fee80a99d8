/**
 * Output Manifest Schema
 *
 * A successful run writes manifest.json into its output root, listing every
 * artifact the stages produced with size and SHA-256 (files only).
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, RunIdSchema, StageNameSchema } from './common.js';

// ============================================================================
// Artifact Entry Schema
// ============================================================================

export const ManifestArtifactEntrySchema = z.object({
  /** Logical artifact name (e.g. "sorted_bam") */
  artifact: z.string().min(1),

  /** Stage that produced the artifact */
  stage: StageNameSchema,

  /** Path relative to the output root */
  path: z.string().min(1),

  kind: z.enum(['file', 'directory']),

  /** File size in bytes, or total size of direct entries for directories */
  sizeBytes: z.number().int().nonnegative(),

  /** SHA-256 of the file contents; null for directories */
  sha256: z
    .string()
    .regex(/^[a-f0-9]{64}$/, 'Must be a valid SHA-256 hash')
    .nullable(),
});

export type ManifestArtifactEntry = z.infer<typeof ManifestArtifactEntrySchema>;

// ============================================================================
// Main Manifest Schema
// ============================================================================

export const RunManifestSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.manifest),
  runId: RunIdSchema,
  createdAt: ISO8601TimestampSchema,

  /** Stages in execution order */
  stages: z.array(StageNameSchema),

  artifacts: z.array(ManifestArtifactEntrySchema),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create an empty manifest for a run
 */
export function createEmptyManifest(runId: string, stages: string[]): RunManifest {
  return {
    schemaVersion: SCHEMA_VERSIONS.manifest,
    runId,
    createdAt: new Date().toISOString(),
    stages,
    artifacts: [],
  };
}

/**
 * Add an artifact entry to a manifest
 */
export function addArtifactToManifest(
  manifest: RunManifest,
  entry: ManifestArtifactEntry
): RunManifest {
  return {
    ...manifest,
    artifacts: [...manifest.artifacts, entry],
  };
}
