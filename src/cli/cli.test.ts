/**
 * CLI Tests
 *
 * Tests cover:
 * - Program creation and command registration
 * - Exit code mapping for run reports and errors
 * - Base command output
 * - Progress and run summary formatters
 * - The stages, status and run command handlers
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, createBaseCommand, exitCodeFor, getBaseCommand } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import { ProgressSpinner, StageProgressDisplay, formatDuration } from './formatters/progress.js';
import {
  formatDryRunPlan,
  formatRunState,
  formatRunStatusLine,
  formatRunSummary,
  formatTimingBreakdown,
} from './formatters/run-summary.js';
import { getCommandHelp } from './commands/index.js';
import { handleStages } from './commands/stages.js';
import { handleStatus } from './commands/status.js';
import { handleRun } from './commands/run.js';
import { parseNonNegativeInt, parsePositiveInt } from './commands/shared.js';
import {
  InvalidConfigError,
  MissingInputError,
  PersistenceError,
  ProcessFailure,
  RunLockedError,
} from '../errors.js';
import { StageRegistry } from '../pipeline/registry.js';
import type { RunCause, RunReport } from '../pipeline/orchestrator.js';
import { createRunState, type RunState, type StageResult } from '../schemas/run-state.js';
import { FileCheckpointStore } from '../storage/checkpoint-store.js';

// ============================================================================
// Fixtures
// ============================================================================

const STAGE_ORDER = ['convert-format', 'basecall', 'align', 'realign-signal', 'infer-modification'];

function makeResult(overrides: Partial<StageResult> & Pick<StageResult, 'stage' | 'ordinal'>): StageResult {
  return {
    attempt: 1,
    startedAt: '2026-01-02T03:00:00.000Z',
    endedAt: '2026-01-02T03:00:01.000Z',
    durationMs: 1000,
    outcome: 'succeeded',
    exitCode: 0,
    signal: null,
    timedOut: false,
    command: null,
    stdoutTail: '',
    stderrTail: '',
    validation: { kind: 'ok' },
    error: null,
    ...overrides,
  };
}

function makeState(overrides: Partial<RunState> = {}): RunState {
  return {
    ...createRunState({ runId: 'sample-42', firstStage: 'convert-format', configFingerprint: 'fingerprint-a' }),
    updatedAt: '2026-01-02T03:04:05.000Z',
    ...overrides,
  };
}

function makeReport(cause: RunCause, overrides: Partial<RunReport> = {}): RunReport {
  return {
    runId: 'sample-42',
    status: cause === 'completed' ? 'succeeded' : cause === 'cancelled' ? 'partially-completed' : 'failed',
    cause,
    dryRun: false,
    stagesExecuted: [],
    stagesSkipped: [],
    failedStage: null,
    attempts: 0,
    lastResult: null,
    error: null,
    plannedCommands: [],
    manifestPath: null,
    configChanged: false,
    durationMs: 0,
    state: null,
    ...overrides,
  };
}

function row(name: string, text: string): string {
  return `  ${name.padEnd(18)}  ${text}`;
}

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('modpipe');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual(['--version', '--verbose', '--quiet', '--no-color']);
  });

  it('should register the run, status and stages commands', () => {
    const commandNames = createProgram().commands.map((c) => c.name());

    expect(commandNames).toEqual(['run', 'status', 'stages']);
  });

  it('should give the run command its resume and dry-run options', () => {
    const runCmd = createProgram().commands.find((c) => c.name() === 'run');
    const optionNames = runCmd?.options.map((o) => o.long) ?? [];

    expect(optionNames).toContain('--config');
    expect(optionNames).toContain('--run-id');
    expect(optionNames).toContain('--from-stage');
    expect(optionNames).toContain('--dry-run');
    expect(optionNames).toContain('--max-attempts');
  });

  it('should list command help', () => {
    expect(getCommandHelp().map((entry) => entry.name)).toEqual(['run', 'status [runId]', 'stages']);
  });
});

// ============================================================================
// Version Tests
// ============================================================================

describe('Version', () => {
  it('should return formatted version info', () => {
    expect(getVersionInfo()).toBe(`modpipe v${VERSION}`);
  });
});

// ============================================================================
// Argument Parsers
// ============================================================================

describe('Argument parsers', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('8')).toBe(8);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow('Must be a positive integer.');
  });

  it('should accept zero as a non-negative integer', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(() => parseNonNegativeInt('-1')).toThrow('Must be a non-negative integer.');
  });
});

// ============================================================================
// Exit Codes Tests
// ============================================================================

describe('Exit Codes', () => {
  it('should map run causes', () => {
    expect(exitCodeFor(makeReport('completed'))).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeFor(makeReport('retries-exhausted'))).toBe(EXIT_CODES.FAILED);
    expect(exitCodeFor(makeReport('persistence-error'))).toBe(EXIT_CODES.FAILED);
    expect(exitCodeFor(makeReport('configuration-error'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(makeReport('cancelled'))).toBe(EXIT_CODES.PARTIAL);
  });

  it('should map thrown errors', () => {
    expect(exitCodeFor(new InvalidConfigError('bad'))).toBe(2);
    expect(exitCodeFor(new MissingInputError('align', 'reference', '/data/ref.fa'))).toBe(2);
    expect(exitCodeFor(new RunLockedError('sample-42', 4242))).toBe(2);
    expect(exitCodeFor(new PersistenceError('disk full'))).toBe(1);
    expect(exitCodeFor(new ProcessFailure('align', 'minimap2 exited with code 1'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: {
    log: jest.SpiedFunction<typeof console.log>;
    warn: jest.SpiedFunction<typeof console.warn>;
    error: jest.SpiedFunction<typeof console.error>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(() => {}),
      warn: jest.spyOn(console, 'warn').mockImplementation(() => {}),
      error: jest.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
  });

  it('should create with default options', () => {
    const cmd = new BaseCommand({ color: false });

    expect(cmd.isVerbose()).toBe(false);
    expect(cmd.isQuiet()).toBe(false);
    expect(cmd.hasColor()).toBe(false);
  });

  it('should show debug messages only when verbose', () => {
    new BaseCommand({ color: false }).debug('hidden');
    expect(consoleSpy.log).not.toHaveBeenCalled();

    new BaseCommand({ verbose: true, color: false }).debug('shown');
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] shown');
  });

  it('should suppress info in quiet mode but keep warnings', () => {
    const cmd = new BaseCommand({ quiet: true, color: false });

    cmd.info('hidden');
    cmd.warn('disk almost full');

    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: disk almost full');
  });

  it('should print plain markers without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('done');
    cmd.fail('broken');

    expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '[OK] done');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '[FAIL] broken');
  });

  it('should print error stacks only when verbose', () => {
    const error = new Error('boom');

    new BaseCommand({ color: false }).error('boom', error);
    expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: boom');

    consoleSpy.error.mockClear();
    new BaseCommand({ verbose: true, color: false }).error('boom', error);
    expect(consoleSpy.error).toHaveBeenCalledTimes(2);
  });

  it('should route the pipeline logger through its output', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.logger.info('Resuming run "sample-42" at stage "align"');
    cmd.logger.warn('Stage "align" attempt 1 failed: exit 1');

    expect(consoleSpy.log).toHaveBeenCalledWith('Resuming run "sample-42" at stage "align"');
    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: Stage "align" attempt 1 failed: exit 1');
  });

  it('should print json and key/value pairs', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.json({ runId: 'sample-42' });
    cmd.keyValue('Manifest', 3);

    expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '{\n  "runId": "sample-42"\n}');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(2, 'Manifest: 3');
  });

  it('should create with factory function', () => {
    const cmd = createBaseCommand({ verbose: true });

    expect(cmd).toBeInstanceOf(BaseCommand);
    expect(cmd.isVerbose()).toBe(true);
  });

  it('should get base command from commander opts', () => {
    const stored = new BaseCommand({ verbose: true });

    expect(getBaseCommand({ opts: () => ({ _baseCommand: stored }) })).toBe(stored);
    expect(getBaseCommand({ opts: () => ({}) })).toBeInstanceOf(BaseCommand);
  });
});

// ============================================================================
// Progress Formatter Tests
// ============================================================================

describe('Progress Formatters', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;

  beforeEach(() => {
    chalk.level = 0;
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  describe('formatDuration', () => {
    it('should format milliseconds, seconds, minutes and hours', () => {
      expect(formatDuration(450)).toBe('450ms');
      expect(formatDuration(1000)).toBe('1.0s');
      expect(formatDuration(12_300)).toBe('12.3s');
      expect(formatDuration(125_000)).toBe('2m 5s');
      expect(formatDuration(7_380_000)).toBe('2h 3m');
    });
  });

  describe('ProgressSpinner', () => {
    it('should support method chaining', () => {
      const spinner = new ProgressSpinner('Loading checkpoint...');
      const result = spinner.clear().stop();

      expect(result).toBe(spinner);
    });
  });

  describe('StageProgressDisplay', () => {
    function createDisplay(): StageProgressDisplay {
      return new StageProgressDisplay(new StageRegistry().getOrderedStages(), false);
    }

    it('should print one line per transition without a TTY', () => {
      const display = createDisplay();

      display.skipStage('convert-format');
      display.startStage('basecall', 1);
      display.failStage('basecall', 'dorado exited with code 1', true);
      display.startStage('basecall', 2);
      display.completeStage('basecall', 1234);

      expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
        '[-] Stage 01 convert-format (already succeeded)',
        '[*] Stage 02 basecall...',
        '[X] Stage 02 basecall attempt failed, retrying: dorado exited with code 1',
        '[*] Stage 02 basecall (attempt 2)...',
        '[+] Stage 02 basecall (1.2s)',
      ]);
    });

    it('should label stages by their ordinal in the pipeline', () => {
      const display = createDisplay();

      for (const name of STAGE_ORDER) {
        display.completeStage(name, 500);
      }

      expect(logSpy.mock.calls.map((call) => call[0])).toEqual(
        STAGE_ORDER.map((name, index) => `[+] Stage 0${index + 1} ${name} (500ms)`)
      );
    });

    it('should report a final failure without retrying', () => {
      const display = createDisplay();

      display.failStage('align', 'minimap2 exited with code 1');

      expect(logSpy).toHaveBeenLastCalledWith('[X] Stage 03 align failed: minimap2 exited with code 1');
    });

    it('should ignore unknown stages', () => {
      const display = createDisplay();

      display.startStage('polish', 1);
      display.completeStage('polish', 10);
      display.failStage('polish', 'boom');
      display.skipStage('polish');

      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should stop quietly when interrupted without a running stage', () => {
      const display = createDisplay();

      display.interrupt();
      display.clearLine();

      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});

// ============================================================================
// Run Summary Formatter Tests
// ============================================================================

describe('Run Summary Formatters', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  describe('formatRunSummary', () => {
    it('should report a failed stage with its command and stderr tail', () => {
      const report = makeReport('retries-exhausted', {
        stagesExecuted: ['convert-format', 'basecall'],
        failedStage: 'align',
        attempts: 3,
        durationMs: 192_000,
        error: {
          code: 'PROCESS_FAILURE',
          message: 'Stage "align" failed after 3 attempt(s): minimap2 exited with code 1',
        },
        lastResult: makeResult({
          stage: 'align',
          ordinal: 3,
          attempt: 3,
          outcome: 'process-failure',
          exitCode: 1,
          command: 'minimap2 -ax splice ref.fa reads.fastq > aligned.sam',
          stderrTail: 'cannot load index\n',
          validation: null,
        }),
        state: makeState({ status: 'failed', resumePoint: 'align' }),
      });

      expect(formatRunSummary(report).split('\n')).toEqual([
        '=== Run Failed ===',
        'Run:      sample-42',
        'Status:   FAILED (retries-exhausted)',
        'Duration: 3m 12s',
        'Stages:   2 executed, 0 skipped',
        '',
        'Failed stage: align (3 attempts)',
        'Error:        Stage "align" failed after 3 attempt(s): minimap2 exited with code 1',
        'Command:      minimap2 -ax splice ref.fa reads.fastq > aligned.sam',
        'stderr (tail):',
        '    cannot load index',
        '',
        'Re-run with the same run id to resume from align.',
      ]);
    });

    it('should report success with the manifest and a config change note', () => {
      const report = makeReport('completed', {
        stagesExecuted: ['align', 'realign-signal', 'infer-modification'],
        stagesSkipped: ['convert-format', 'basecall'],
        durationMs: 2500,
        configChanged: true,
        manifestPath: '/data/out/manifest.json',
      });

      expect(formatRunSummary(report).split('\n')).toEqual([
        '=== Run Succeeded ===',
        'Run:      sample-42',
        'Status:   SUCCEEDED (completed)',
        'Duration: 2.5s',
        'Stages:   3 executed, 2 skipped',
        'Note:     configuration changed since this run started',
        '',
        'Manifest: /data/out/manifest.json',
      ]);
    });

    it('should not suggest resuming after a persistence error', () => {
      const report = makeReport('persistence-error', {
        error: { code: 'CHECKPOINT_WRITE_FAILED', message: 'EACCES: permission denied' },
        state: makeState({ resumePoint: 'basecall' }),
      });

      expect(formatRunSummary(report).split('\n').slice(-2)).toEqual([
        '',
        'Error:        EACCES: permission denied',
      ]);
    });
  });

  describe('formatDryRunPlan', () => {
    it('should group planned commands by stage', () => {
      const report = makeReport('completed', {
        dryRun: true,
        stagesSkipped: ['convert-format'],
        plannedCommands: [
          { stage: 'basecall', contextId: 'ont', command: 'dorado basecaller sup signal.pod5 > calls.bam' },
          { stage: 'realign-signal', contextId: 'nanopolish', command: 'nanopolish index reads.fastq' },
          { stage: 'realign-signal', contextId: 'nanopolish', command: 'nanopolish eventalign --reads reads.fastq' },
        ],
      });

      expect(formatDryRunPlan(report).split('\n')).toEqual([
        '=== Dry Run: sample-42 ===',
        'Skipping (already succeeded): convert-format',
        '',
        'basecall [ont]',
        '  $ dorado basecaller sup signal.pod5 > calls.bam',
        '',
        'realign-signal [nanopolish]',
        '  $ nanopolish index reads.fastq',
        '  $ nanopolish eventalign --reads reads.fastq',
      ]);
    });

    it('should say when there is nothing to do', () => {
      expect(formatDryRunPlan(makeReport('completed', { dryRun: true }))).toBe(
        '=== Dry Run: sample-42 ===\n\nNothing to do: every stage already succeeded.'
      );
    });

    it('should show a configuration error', () => {
      const report = makeReport('configuration-error', {
        dryRun: true,
        error: { code: 'CONTEXT_NOT_FOUND', message: 'Runtime context not found: gpu' },
      });

      expect(formatDryRunPlan(report)).toBe(
        '=== Dry Run: sample-42 ===\n\nError: Runtime context not found: gpu'
      );
    });
  });

  describe('formatRunStatusLine', () => {
    it('should summarize a report on one line', () => {
      const report = makeReport('completed', {
        stagesExecuted: ['align', 'realign-signal', 'infer-modification'],
        stagesSkipped: ['convert-format', 'basecall'],
        durationMs: 2500,
      });

      expect(formatRunStatusLine(report)).toBe('sample-42: SUCCEEDED (3 executed, 2 skipped, 2.5s)');
    });
  });

  describe('formatRunState', () => {
    it('should list the latest result of every stage', () => {
      const state = makeState({
        status: 'partially-completed',
        resumePoint: 'align',
        invocations: 2,
        stageResults: [
          makeResult({ stage: 'convert-format', ordinal: 1, durationMs: 1500 }),
          makeResult({ stage: 'basecall', ordinal: 2, durationMs: 65_000 }),
          makeResult({
            stage: 'align',
            ordinal: 3,
            outcome: 'process-failure',
            exitCode: 1,
            error: { code: 'PROCESS_FAILURE', message: 'minimap2 exited with code 1' },
          }),
          makeResult({ stage: 'align', ordinal: 3, attempt: 2, outcome: 'cancelled', exitCode: null }),
        ],
        lastError: { code: 'CANCELLED', message: 'Run cancelled', stage: 'align' },
      });

      expect(formatRunState(state, STAGE_ORDER).split('\n')).toEqual([
        '=== Run sample-42 ===',
        'Status:       PARTIALLY COMPLETED',
        'Resume point: align',
        'Invocations:  2',
        'Updated:      2026-01-02T03:04:05.000Z',
        '',
        row('convert-format', 'succeeded (attempt 1, 1.5s)'),
        row('basecall', 'succeeded (attempt 1, 1m 5s)'),
        row('align', 'cancelled (attempt 2)'),
        row('realign-signal', 'not started'),
        row('infer-modification', 'not started'),
        '',
        'Last error [align]: Run cancelled',
      ]);
    });

    it('should describe a failed attempt with its error', () => {
      const state = makeState({
        status: 'failed',
        stageResults: [
          makeResult({
            stage: 'convert-format',
            ordinal: 1,
            attempt: 3,
            outcome: 'validation-failure',
            error: { code: 'VALIDATION_FAILURE', message: 'output "pod5" is empty' },
          }),
        ],
      });

      expect(formatRunState(state, STAGE_ORDER).split('\n')[6]).toBe(
        row('convert-format', 'validation-failure (attempt 3): output "pod5" is empty')
      );
    });
  });

  describe('formatTimingBreakdown', () => {
    it('should scale bars to the slowest stage', () => {
      const state = makeState({
        stageResults: [
          makeResult({ stage: 'basecall', ordinal: 2, durationMs: 3000 }),
          makeResult({ stage: 'align', ordinal: 3, durationMs: 1000 }),
        ],
      });

      expect(formatTimingBreakdown(state, ['basecall', 'align']).split('\n')).toEqual([
        '=== Timing Breakdown ===',
        '',
        `${'basecall'.padEnd(20)} ${'█'.repeat(30)}     3.0s (75%)`,
        `${'align'.padEnd(20)} ${'█'.repeat(10)}     1.0s (25%)`,
        '',
        `${'Total'.padEnd(20)} ${' '.repeat(30)} 4.0s`,
      ]);
    });
  });
});

// ============================================================================
// Command Handler Tests
// ============================================================================

describe('Command handlers', () => {
  let testDir: string;
  let base: BaseCommand;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  const savedConfigEnv = process.env.MODPIPE_CONFIG;

  beforeEach(async () => {
    delete process.env.MODPIPE_CONFIG;
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
    base = new BaseCommand({ color: false });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    if (savedConfigEnv !== undefined) {
      process.env.MODPIPE_CONFIG = savedConfigEnv;
    }
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function loggedJson(): unknown {
    const [first] = logSpy.mock.calls;
    return JSON.parse(String(first?.[0]));
  }

  describe('handleStages', () => {
    it('should list the built-in stages as json', async () => {
      const code = await handleStages({ format: 'json' }, base);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const rows = loggedJson();
      expect(Array.isArray(rows) ? rows.length : 0).toBe(5);
      expect(Array.isArray(rows) ? rows[2] : null).toEqual({
        id: '03_align',
        name: 'align',
        context: 'ont',
        tools: ['minimap2', 'samtools'],
        inputs: ['reads_fastq', 'reference'],
        outputs: ['aligned_sam', 'sorted_bam', 'bam_index'],
        description: new StageRegistry().get('align')?.description,
      });
    });

    it('should apply stage context overrides from a configuration', async () => {
      const configPath = path.join(testDir, 'run.json');
      await fs.writeFile(
        configPath,
        JSON.stringify({
          runId: 'run-1',
          inputDir: 'in',
          reference: 'ref.fa',
          outputDir: 'out',
          stageContexts: { 'infer-modification': 'm6anet-gpu' },
        })
      );

      await handleStages({ format: 'json', config: configPath }, base);

      const rows = loggedJson();
      expect(Array.isArray(rows) ? rows[4] : null).toMatchObject({
        name: 'infer-modification',
        context: 'm6anet-gpu',
      });
    });

    it('should print a table', async () => {
      await handleStages({ format: 'table' }, base);

      expect(logSpy).toHaveBeenNthCalledWith(1, '01_convert-format [ont] pod5');
      expect(logSpy).toHaveBeenCalledWith('  in:  reads_fastq, reference');
    });
  });

  describe('handleStatus', () => {
    it('should require a configuration or a run location', async () => {
      const code = await handleStatus(undefined, {}, base);

      expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(errorSpy).toHaveBeenCalledWith(
        'Error: status needs --config, or a run id with --output-dir or --checkpoint-dir'
      );
    });

    it('should report a run without a checkpoint', async () => {
      const code = await handleStatus('run-1', { outputDir: testDir }, base);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(logSpy).toHaveBeenCalledWith(
        `Run "run-1" has no checkpoint in ${path.join(testDir, '.modpipe')}`
      );
    });

    it('should print a saved run state', async () => {
      const store = new FileCheckpointStore(path.join(testDir, '.modpipe'));
      const state = createRunState({ runId: 'run-1', firstStage: 'basecall', configFingerprint: 'fingerprint-a' });
      await store.acquire('run-1');
      await store.save(state);
      await store.release('run-1');

      const code = await handleStatus('run-1', { outputDir: testDir, format: 'json' }, base);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(loggedJson()).toEqual(state);

      logSpy.mockClear();
      await handleStatus('run-1', { outputDir: testDir, format: 'table' }, base);
      expect(String(logSpy.mock.calls[0]?.[0]).split('\n').slice(0, 3)).toEqual([
        '=== Run run-1 ===',
        'Status:       PENDING',
        'Resume point: basecall',
      ]);
    });
  });

  describe('handleRun', () => {
    it('should exit with a configuration error when the file cannot be read', async () => {
      const code = await handleRun({ config: path.join(testDir, 'missing.json') }, base);

      expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(String(errorSpy.mock.calls[0]?.[0])).toMatch(/^Error: Cannot read run configuration: /);
    });
  });
});
