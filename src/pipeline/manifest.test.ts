/**
 * Tests for Manifest Generation Module
 *
 * @module pipeline/manifest.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  calculateFileHash,
  createArtifactEntry,
  generateManifest,
  loadManifest,
  saveManifest,
  verifyManifest,
} from './manifest.js';
import { StageRegistry } from './registry.js';
import { getManifestPath } from '../storage/paths.js';
import type { ArtifactRef, ArtifactTable, StageDescriptor } from './types.js';

const sha256 = (content: string): string => crypto.createHash('sha256').update(content).digest('hex');

const TWO_STAGES: StageDescriptor[] = [
  {
    name: 'extract',
    ordinal: 1,
    description: 'extract reads',
    context: 'ont',
    commands: [{ tool: 'cat', args: ['{input_dir}'], stdoutTo: 'reads' }],
    inputs: ['input_dir'],
    outputs: [{ name: 'reads', path: 'reads.txt', kind: 'file' }],
    validation: [],
  },
  {
    name: 'summarize',
    ordinal: 2,
    description: 'summarize reads',
    context: 'ont',
    commands: [{ tool: 'wc', args: ['{reads}', '{stage_dir}/parts'] }],
    inputs: ['reads'],
    outputs: [
      { name: 'summary', path: 'summary.csv', kind: 'file' },
      { name: 'parts', path: 'parts', kind: 'directory' },
    ],
    validation: [],
  },
];

describe('pipeline/manifest', () => {
  let tempDir: string;
  let outputDir: string;
  let artifacts: ArtifactTable;

  function refOf(name: string): ArtifactRef {
    const ref = artifacts.get(name);
    if (ref === undefined) {
      throw new Error(`no artifact ${name}`);
    }
    return ref;
  }

  async function produce(name: string, content: string): Promise<void> {
    const target = refOf(name).path;
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }

  async function produceAll(): Promise<void> {
    await produce('reads', 'ACGT\n');
    await produce('summary', 'reads,4\n');
    await fs.mkdir(refOf('parts').path, { recursive: true });
    await fs.writeFile(path.join(refOf('parts').path, 'a.bin'), '123');
    await fs.writeFile(path.join(refOf('parts').path, 'b.bin'), '45');
    await fs.mkdir(path.join(refOf('parts').path, 'nested'));
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-test-'));
    outputDir = path.join(tempDir, 'out');
    artifacts = new StageRegistry(TWO_STAGES).resolveArtifacts({
      inputDir: path.join(tempDir, 'in'),
      reference: path.join(tempDir, 'ref.fa'),
      outputDir,
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // calculateFileHash
  // ==========================================================================

  describe('calculateFileHash', () => {
    it('should match Node crypto SHA-256 directly', async () => {
      const filePath = path.join(tempDir, 'verify.txt');
      await fs.writeFile(filePath, 'contig\tposition\n');

      expect(await calculateFileHash(filePath)).toBe(sha256('contig\tposition\n'));
    });

    it('should handle empty file', async () => {
      const filePath = path.join(tempDir, 'empty.txt');
      await fs.writeFile(filePath, '');

      expect(await calculateFileHash(filePath)).toBe(
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
      );
    });

    it('should throw for non-existent file', async () => {
      await expect(calculateFileHash(path.join(tempDir, 'missing'))).rejects.toThrow();
    });
  });

  // ==========================================================================
  // createArtifactEntry
  // ==========================================================================

  describe('createArtifactEntry', () => {
    it('should hash files and record paths relative to the output root', async () => {
      await produceAll();

      expect(await createArtifactEntry(refOf('reads'), outputDir)).toEqual({
        artifact: 'reads',
        stage: 'extract',
        path: path.join('01_extract', 'reads.txt'),
        kind: 'file',
        sizeBytes: 5,
        sha256: sha256('ACGT\n'),
      });
    });

    it('should sum direct file sizes of a directory without hashing', async () => {
      await produceAll();

      expect(await createArtifactEntry(refOf('parts'), outputDir)).toEqual({
        artifact: 'parts',
        stage: 'summarize',
        path: path.join('02_summarize', 'parts'),
        kind: 'directory',
        sizeBytes: 5,
        sha256: null,
      });
    });

    it('should refuse run inputs', async () => {
      await expect(createArtifactEntry(refOf('input_dir'), outputDir)).rejects.toThrow(
        'Artifact "input_dir" is a run input, not an output'
      );
    });
  });

  // ==========================================================================
  // generateManifest / saveManifest / loadManifest
  // ==========================================================================

  describe('generateManifest', () => {
    it('should list artifacts in stage order', async () => {
      await produceAll();

      const manifest = await generateManifest('run-1', ['extract', 'summarize'], artifacts, outputDir);

      expect(manifest.runId).toBe('run-1');
      expect(manifest.stages).toEqual(['extract', 'summarize']);
      expect(manifest.artifacts.map((entry) => entry.artifact)).toEqual(['reads', 'summary', 'parts']);
    });

    it('should fail when an artifact is missing', async () => {
      await produce('reads', 'ACGT\n');

      await expect(
        generateManifest('run-1', ['extract', 'summarize'], artifacts, outputDir)
      ).rejects.toThrow();
    });
  });

  describe('saveManifest and loadManifest', () => {
    it('should round-trip through manifest.json', async () => {
      await produceAll();
      const manifest = await generateManifest('run-1', ['extract', 'summarize'], artifacts, outputDir);

      const savedPath = await saveManifest(outputDir, manifest);

      expect(savedPath).toBe(getManifestPath(outputDir));
      expect(await loadManifest(outputDir)).toEqual(manifest);
    });

    it('should return null before a run completes', async () => {
      expect(await loadManifest(outputDir)).toBeNull();
    });
  });

  // ==========================================================================
  // verifyManifest
  // ==========================================================================

  describe('verifyManifest', () => {
    beforeEach(async () => {
      await produceAll();
      await saveManifest(
        outputDir,
        await generateManifest('run-1', ['extract', 'summarize'], artifacts, outputDir)
      );
    });

    it('should pass for untouched outputs', async () => {
      const result = await verifyManifest(outputDir);

      expect(result.valid).toBe(true);
      expect(result.artifacts.map((entry) => entry.artifact)).toEqual(['reads', 'summary']);
    });

    it('should detect a modified file', async () => {
      await fs.writeFile(refOf('summary').path, 'reads,5\n');

      const result = await verifyManifest(outputDir);

      expect(result.valid).toBe(false);
      expect(result.artifacts.find((entry) => entry.artifact === 'summary')?.matches).toBe(false);
    });

    it('should treat a deleted file as a mismatch', async () => {
      await fs.rm(refOf('reads').path);

      const result = await verifyManifest(outputDir);

      expect(result.artifacts[0]).toMatchObject({
        artifact: 'reads',
        actualHash: '<file_not_found>',
        matches: false,
      });
    });

    it('should throw without a manifest', async () => {
      await fs.rm(getManifestPath(outputDir));
      await expect(verifyManifest(outputDir)).rejects.toThrow(`Manifest not found in ${outputDir}`);
    });
  });
});
