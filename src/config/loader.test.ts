/**
 * Tests for the run configuration loader
 *
 * @module config/loader.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { InvalidConfigError } from '../errors.js';
import { RunConfigSchema } from '../schemas/run-config.js';
import { fingerprintRunConfig, loadRunConfig, resolveConfigPaths } from './loader.js';

describe('config/loader', () => {
  let testDir: string;
  let configPath: string;

  async function writeConfig(data: unknown): Promise<void> {
    await fs.writeFile(configPath, JSON.stringify(data));
  }

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'loader-test-'));
    configPath = path.join(testDir, 'run.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // loadRunConfig
  // ==========================================================================

  describe('loadRunConfig', () => {
    it('should resolve file paths against the file directory', async () => {
      await writeConfig({ runId: 'run-1', inputDir: 'fast5', reference: 'ref/tx.fa', outputDir: 'out' });

      const loaded = await loadRunConfig({ configPath, condaRoot: '/opt/conda/envs' });

      expect(loaded.configPath).toBe(configPath);
      expect(loaded.config.inputDir).toBe(path.join(testDir, 'fast5'));
      expect(loaded.config.reference).toBe(path.join(testDir, 'ref', 'tx.fa'));
      expect(loaded.config.outputDir).toBe(path.join(testDir, 'out'));
      expect(loaded.checkpointRoot).toBe(path.join(testDir, 'out', '.modpipe'));
    });

    it('should fill in the defaults', async () => {
      await writeConfig({ runId: 'run-1', inputDir: 'in', reference: 'ref.fa', outputDir: 'out' });

      const { config } = await loadRunConfig({ configPath, condaRoot: '/opt/conda/envs' });

      expect(config.threads).toBe(4);
      expect(config.maxAttempts).toBe(3);
      expect(config.retryBackoffMs).toBe(30_000);
      expect(config.basecallModel).toBe('sup');
      expect(config.contexts.map((context) => context.id)).toEqual(['ont', 'nanopolish', 'm6anet']);
      expect(config.contexts[1]).toMatchObject({
        kind: 'conda',
        prefix: '/opt/conda/envs/nanopolish',
        conflictsWith: ['m6anet'],
      });
    });

    it('should let command-line values win, relative to the working directory', async () => {
      await writeConfig({ runId: 'run-1', inputDir: 'in', reference: 'ref.fa', outputDir: 'out', threads: 2 });

      const { config, checkpointRoot } = await loadRunConfig({
        configPath,
        condaRoot: '/opt/conda/envs',
        cwd: '/work',
        overrides: { threads: 16, outputDir: 'results', checkpointDir: 'ckpt', maxAttempts: undefined },
      });

      expect(config.threads).toBe(16);
      expect(config.maxAttempts).toBe(3);
      expect(config.outputDir).toBe('/work/results');
      expect(checkpointRoot).toBe('/work/ckpt');
      expect(config.inputDir).toBe(path.join(testDir, 'in'));
    });

    it('should build a config from overrides alone', async () => {
      const loaded = await loadRunConfig({
        condaRoot: '/opt/conda/envs',
        cwd: '/work',
        overrides: { runId: 'cli-run', inputDir: 'in', reference: 'ref.fa', outputDir: 'out' },
      });

      expect(loaded.configPath).toBeNull();
      expect(loaded.config.runId).toBe('cli-run');
      expect(loaded.config.reference).toBe('/work/ref.fa');
    });

    it('should keep declared contexts and resolve their paths', async () => {
      await writeConfig({
        runId: 'run-1',
        inputDir: 'in',
        reference: 'ref.fa',
        outputDir: 'out',
        contexts: [
          { kind: 'system', id: 'ont', searchPaths: ['tools/bin'] },
          { kind: 'conda', id: 'm6anet', prefix: 'envs/m6anet' },
        ],
        executables: { dorado: 'vendor/dorado/bin/dorado', samtools: 'samtools' },
      });

      const { config } = await loadRunConfig({ configPath, condaRoot: '/opt/conda/envs' });

      expect(config.contexts).toEqual([
        { kind: 'system', id: 'ont', searchPaths: [path.join(testDir, 'tools', 'bin')], env: {}, conflictsWith: [] },
        {
          kind: 'conda',
          id: 'm6anet',
          prefix: path.join(testDir, 'envs', 'm6anet'),
          searchPaths: [],
          env: {},
          conflictsWith: [],
        },
      ]);
      expect(config.executables).toEqual({
        dorado: path.join(testDir, 'vendor', 'dorado', 'bin', 'dorado'),
        samtools: 'samtools',
      });
    });

    it('should list every invalid field', async () => {
      await writeConfig({ runId: 'bad/id', inputDir: 'in', outputDir: 'out', threads: 0 });

      const load = loadRunConfig({ configPath, condaRoot: '/opt/conda/envs' });

      await expect(load).rejects.toThrow(InvalidConfigError);
      await expect(loadRunConfig({ configPath, condaRoot: '/opt/conda/envs' })).rejects.toThrow(
        /runId: .*\n {2}- reference: Required\n {2}- threads: /
      );
    });

    it('should reject a command-line timeout longer than a timer can wait', async () => {
      const load = loadRunConfig({
        condaRoot: '/opt/conda/envs',
        cwd: '/work',
        overrides: {
          runId: 'cli-run',
          inputDir: 'in',
          reference: 'ref.fa',
          outputDir: 'out',
          stageTimeoutMs: 2_200_000 * 1000,
        },
      });

      await expect(load).rejects.toThrow(/\n {2}- stageTimeoutMs: /);
    });

    it('should reject a missing or malformed file', async () => {
      await expect(loadRunConfig({ configPath, condaRoot: '/c' })).rejects.toThrow(
        'Cannot read run configuration'
      );

      await fs.writeFile(configPath, '[1, 2]');
      await expect(loadRunConfig({ configPath, condaRoot: '/c' })).rejects.toThrow(
        `Run configuration must be a JSON object: ${configPath}`
      );
    });
  });

  // ==========================================================================
  // Fingerprint
  // ==========================================================================

  describe('fingerprintRunConfig', () => {
    const base = RunConfigSchema.parse({
      runId: 'run-1',
      inputDir: '/in',
      reference: '/ref.fa',
      outputDir: '/out',
    });

    it('should be a stable SHA-256', () => {
      expect(fingerprintRunConfig(base)).toMatch(/^[a-f0-9]{64}$/);
      expect(fingerprintRunConfig({ ...base })).toBe(fingerprintRunConfig(base));
    });

    it('should change with settings that shape the outputs', () => {
      expect(fingerprintRunConfig({ ...base, threads: 8 })).not.toBe(fingerprintRunConfig(base));
      expect(fingerprintRunConfig({ ...base, basecallModel: 'hac' })).not.toBe(fingerprintRunConfig(base));
    });

    it('should ignore retry and timeout settings', () => {
      expect(fingerprintRunConfig({ ...base, maxAttempts: 7, stageTimeoutMs: 1000, retryBackoffMs: 1 })).toBe(
        fingerprintRunConfig(base)
      );
    });

    it('should not depend on executable key order', () => {
      const a = { ...base, executables: { dorado: '/a', samtools: '/b' } };
      const b = { ...base, executables: { samtools: '/b', dorado: '/a' } };
      expect(fingerprintRunConfig(a)).toBe(fingerprintRunConfig(b));
    });
  });

  describe('resolveConfigPaths', () => {
    it('should leave absolute paths alone', () => {
      const config = RunConfigSchema.parse({ runId: 'r', inputDir: '/in', reference: '/ref.fa', outputDir: '/out' });
      expect(resolveConfigPaths(config, '/base')).toMatchObject({
        inputDir: '/in',
        reference: '/ref.fa',
        outputDir: '/out',
        checkpointDir: undefined,
      });
    });
  });
});
