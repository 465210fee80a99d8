/**
 * Manifest Generation Module
 *
 * A successful run writes manifest.json into its output root, listing
 * every artifact with its size and SHA-256 so downstream users can verify
 * the outputs they received.
 *
 * @module pipeline/manifest
 */

import * as crypto from 'node:crypto';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  RunManifestSchema,
  addArtifactToManifest,
  createEmptyManifest,
  type ManifestArtifactEntry,
  type RunManifest,
} from '../schemas/manifest.js';
import { atomicWriteJson, readJsonIfExists } from '../storage/atomic.js';
import { getManifestPath } from '../storage/paths.js';
import type { ArtifactRef, ArtifactTable } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of verifying a manifest's integrity
 */
export interface ManifestVerificationResult {
  /** Whether every file hash matches */
  valid: boolean;
  artifacts: Array<{
    artifact: string;
    expectedHash: string;
    actualHash: string;
    matches: boolean;
  }>;
}

// ============================================================================
// Hash Calculation
// ============================================================================

/**
 * Calculate the SHA-256 of a file, streaming so multi-gigabyte BAMs are
 * never held in memory.
 *
 * @returns 64-character lowercase hex digest
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return hash.digest('hex');
}

// ============================================================================
// Entry Creation
// ============================================================================

/**
 * Create a manifest entry for one produced artifact.
 * Directories record the total size of their direct file entries.
 */
export async function createArtifactEntry(
  ref: ArtifactRef,
  outputDir: string
): Promise<ManifestArtifactEntry> {
  if (ref.producer === null) {
    throw new Error(`Artifact "${ref.name}" is a run input, not an output`);
  }

  const relative = path.relative(outputDir, ref.path);

  if (ref.kind === 'directory') {
    const entries = await fs.readdir(ref.path, { withFileTypes: true });
    const sizes = await Promise.all(
      entries
        .filter((entry) => entry.isFile())
        .map(async (entry) => (await fs.stat(path.join(ref.path, entry.name))).size)
    );
    return {
      artifact: ref.name,
      stage: ref.producer,
      path: relative,
      kind: 'directory',
      sizeBytes: sizes.reduce((sum, size) => sum + size, 0),
      sha256: null,
    };
  }

  const [sha256, stats] = await Promise.all([calculateFileHash(ref.path), fs.stat(ref.path)]);
  return {
    artifact: ref.name,
    stage: ref.producer,
    path: relative,
    kind: 'file',
    sizeBytes: stats.size,
    sha256,
  };
}

// ============================================================================
// Manifest Generation
// ============================================================================

/**
 * Generate the manifest for a completed run.
 *
 * @param stages - Stage names in execution order
 */
export async function generateManifest(
  runId: string,
  stages: string[],
  artifacts: ArtifactTable,
  outputDir: string
): Promise<RunManifest> {
  let manifest = createEmptyManifest(runId, stages);

  for (const stage of stages) {
    for (const ref of artifacts.values()) {
      if (ref.producer === stage) {
        manifest = addArtifactToManifest(manifest, await createArtifactEntry(ref, outputDir));
      }
    }
  }

  return manifest;
}

// ============================================================================
// Manifest Persistence
// ============================================================================

/**
 * Save a manifest to the output root.
 *
 * @returns Path where the manifest was saved
 */
export async function saveManifest(outputDir: string, manifest: RunManifest): Promise<string> {
  const manifestPath = getManifestPath(outputDir);
  await atomicWriteJson(manifestPath, manifest);
  return manifestPath;
}

/**
 * Load the manifest of an output root.
 *
 * @returns The manifest, or null if the run has not completed
 */
export async function loadManifest(outputDir: string): Promise<RunManifest | null> {
  const raw = await readJsonIfExists(getManifestPath(outputDir));
  return raw === null ? null : RunManifestSchema.parse(raw);
}

// ============================================================================
// Manifest Verification
// ============================================================================

/**
 * Verify manifest integrity by recalculating file hashes.
 *
 * @throws If the manifest doesn't exist
 */
export async function verifyManifest(outputDir: string): Promise<ManifestVerificationResult> {
  const manifest = await loadManifest(outputDir);
  if (!manifest) {
    throw new Error(`Manifest not found in ${outputDir}`);
  }

  const results: ManifestVerificationResult['artifacts'] = [];

  for (const entry of manifest.artifacts) {
    if (entry.sha256 === null) continue;

    let actualHash: string;
    try {
      actualHash = await calculateFileHash(path.join(outputDir, entry.path));
    } catch {
      // Missing or unreadable counts as a mismatch
      actualHash = '<file_not_found>';
    }

    results.push({
      artifact: entry.artifact,
      expectedHash: entry.sha256,
      actualHash,
      matches: actualHash === entry.sha256,
    });
  }

  return {
    valid: results.every((result) => result.matches),
    artifacts: results,
  };
}
