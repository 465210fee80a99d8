/**
 * Built-in Stage Descriptors
 *
 * The m6A detection workflow: raw fast5 signal is converted to pod5,
 * basecalled with move tables, aligned to the transcriptome, realigned at
 * signal level and finally scored for modification per site.
 *
 * convert-format → basecall → align → realign-signal → infer-modification
 *
 * @module pipeline/stages
 */

import { DEFAULT_CONTEXT_IDS } from '../schemas/run-config.js';
import type { StageDescriptor } from './types.js';

/** Run inputs every descriptor may reference */
export const RUN_INPUT_NAMES = {
  inputDir: 'input_dir',
  reference: 'reference',
} as const;

export const convertFormatStage: StageDescriptor = {
  name: 'convert-format',
  ordinal: 1,
  description: 'Convert raw fast5 signal files into a single pod5 file',
  context: DEFAULT_CONTEXT_IDS.ont,
  commands: [
    {
      tool: 'pod5',
      args: [
        'convert',
        'fast5',
        '--recursive',
        '--threads',
        '{threads}',
        '--force-overwrite',
        '--output',
        '{pod5}',
        '{input_dir}',
      ],
    },
  ],
  inputs: [RUN_INPUT_NAMES.inputDir],
  outputs: [{ name: 'pod5', path: 'signal.pod5', kind: 'file' }],
  validation: [],
};

export const basecallStage: StageDescriptor = {
  name: 'basecall',
  ordinal: 2,
  description: 'Basecall with modified-base calling and move tables, then extract reads',
  context: DEFAULT_CONTEXT_IDS.ont,
  commands: [
    {
      tool: 'dorado',
      args: [
        'basecaller',
        '{basecall_model}',
        '{pod5}',
        '--modified-bases',
        '{modified_bases}',
        '--emit-moves',
      ],
      stdoutTo: 'calls_bam',
    },
    {
      tool: 'samtools',
      args: ['fastq', '{calls_bam}'],
      stdoutTo: 'reads_fastq',
    },
  ],
  inputs: ['pod5'],
  outputs: [
    { name: 'calls_bam', path: 'calls.bam', kind: 'file' },
    { name: 'reads_fastq', path: 'reads.fastq', kind: 'file' },
  ],
  validation: [
    { check: 'bam-records', artifact: 'calls_bam' },
    { check: 'fastq-records', artifact: 'reads_fastq', minRecords: 1 },
  ],
};

export const alignStage: StageDescriptor = {
  name: 'align',
  ordinal: 3,
  description: 'Splice-unaware alignment to the reference transcriptome, sort and index',
  context: DEFAULT_CONTEXT_IDS.ont,
  commands: [
    {
      tool: 'minimap2',
      args: ['-ax', 'map-ont', '-uf', '-k14', '-t', '{threads}', '{reference}', '{reads_fastq}'],
      stdoutTo: 'aligned_sam',
    },
    {
      tool: 'samtools',
      args: ['sort', '-@', '{threads}', '-o', '{sorted_bam}', '{aligned_sam}'],
    },
    {
      tool: 'samtools',
      args: ['index', '{sorted_bam}'],
    },
  ],
  inputs: ['reads_fastq', RUN_INPUT_NAMES.reference],
  outputs: [
    { name: 'aligned_sam', path: 'aligned.sam', kind: 'file' },
    { name: 'sorted_bam', path: 'aligned.sorted.bam', kind: 'file' },
    { name: 'bam_index', path: 'aligned.sorted.bam.bai', kind: 'file' },
  ],
  validation: [
    { check: 'bam-records', artifact: 'sorted_bam' },
    { check: 'index-newer-than', artifact: 'bam_index', target: 'sorted_bam' },
  ],
};

export const realignSignalStage: StageDescriptor = {
  name: 'realign-signal',
  ordinal: 4,
  description: 'Index reads against the raw signal and realign events to the reference',
  context: DEFAULT_CONTEXT_IDS.nanopolish,
  commands: [
    {
      tool: 'nanopolish',
      args: ['index', '-d', '{input_dir}', '{reads_fastq}'],
    },
    {
      tool: 'nanopolish',
      args: [
        'eventalign',
        '--reads',
        '{reads_fastq}',
        '--bam',
        '{sorted_bam}',
        '--genome',
        '{reference}',
        '--signal-index',
        '--scale-events',
        '--summary',
        '{eventalign_summary}',
        '--threads',
        '{threads}',
      ],
      stdoutTo: 'eventalign',
    },
  ],
  inputs: [RUN_INPUT_NAMES.inputDir, 'reads_fastq', 'sorted_bam', 'bam_index', RUN_INPUT_NAMES.reference],
  outputs: [
    { name: 'eventalign', path: 'eventalign.txt', kind: 'file' },
    { name: 'eventalign_summary', path: 'eventalign.summary.txt', kind: 'file' },
  ],
  validation: [
    {
      check: 'delimited-header',
      artifact: 'eventalign',
      delimiter: '\t',
      columns: ['contig', 'position', 'reference_kmer', 'read_index'],
      minRows: 1,
    },
  ],
};

export const inferModificationStage: StageDescriptor = {
  name: 'infer-modification',
  ordinal: 5,
  description: 'Prepare per-site features and infer modification probabilities',
  context: DEFAULT_CONTEXT_IDS.m6anet,
  commands: [
    {
      tool: 'm6anet',
      args: ['dataprep', '--eventalign', '{eventalign}', '--out_dir', '{dataprep}', '--n_processes', '{threads}'],
    },
    {
      tool: 'm6anet',
      args: [
        'inference',
        '--input_dir',
        '{dataprep}',
        '--out_dir',
        '{stage_dir}/inference',
        '--n_processes',
        '{threads}',
        '--num_iterations',
        '{inference_iterations}',
      ],
    },
  ],
  inputs: ['eventalign'],
  outputs: [
    { name: 'dataprep', path: 'dataprep', kind: 'directory' },
    { name: 'site_probabilities', path: 'inference/data.site_proba.csv', kind: 'file' },
  ],
  validation: [
    {
      check: 'delimited-header',
      artifact: 'site_probabilities',
      delimiter: ',',
      columns: ['transcript_id', 'transcript_position', 'probability_modified'],
      minRows: 1,
    },
  ],
};

/**
 * The five built-in stages in workflow order.
 */
export const BUILTIN_STAGES: readonly StageDescriptor[] = [
  convertFormatStage,
  basecallStage,
  alignStage,
  realignSignalStage,
  inferModificationStage,
];
