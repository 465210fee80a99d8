/**
 * Artifact Checks
 *
 * Output contracts as predicates. Each check reads an artifact (never
 * writes it) and returns a ValidationOutcome. Checks look at structure
 * only: a BAM with one record passes no matter how poor the alignment.
 *
 * @module pipeline/checks
 */

import { createReadStream, type Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { createGunzip } from 'node:zlib';
import type { ValidationOutcome } from '../schemas/run-state.js';
import { errorMessage } from '../errors.js';
import { isErrnoException } from '../storage/atomic.js';
import type { ArtifactRef } from './types.js';

export const OK: ValidationOutcome = { kind: 'ok' };

/** Leading bytes of a BGZF block: gzip magic, deflate, FEXTRA set */
const BGZF_MAGIC = Buffer.from([0x1f, 0x8b, 0x08, 0x04]);

/** BAM magic string "BAM\1" */
const BAM_MAGIC = Buffer.from([0x42, 0x41, 0x4d, 0x01]);

/** Fixed-length part of a BAM alignment record after block_size */
const MIN_BAM_RECORD_BYTES = 32;

/** Decompressed bytes read before giving up on finding a first record */
const MAX_BAM_SCAN_BYTES = 256 * 1024 * 1024;

function formatError(ref: ArtifactRef, detail: string): ValidationOutcome {
  return { kind: 'format-error', artifact: ref.name, path: ref.path, detail };
}

function toBuffer(chunk: unknown): Buffer {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
}

// ============================================================================
// Existence, Kind, Size
// ============================================================================

/**
 * Check that an artifact exists, has the declared kind and is non-empty.
 * Directories need at least one entry.
 */
export async function checkArtifact(ref: ArtifactRef): Promise<ValidationOutcome> {
  let stats: Stats;
  try {
    stats = await fs.stat(ref.path);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return { kind: 'missing-artifact', artifact: ref.name, path: ref.path };
    }
    return formatError(ref, `cannot stat: ${errorMessage(error)}`);
  }

  if (ref.kind === 'directory') {
    if (!stats.isDirectory()) {
      return formatError(ref, 'expected a directory');
    }
    const entries = await fs.readdir(ref.path);
    if (entries.length === 0) {
      return { kind: 'empty-artifact', artifact: ref.name, path: ref.path };
    }
    return OK;
  }

  if (!stats.isFile()) {
    return formatError(ref, 'expected a regular file');
  }
  if (stats.size === 0) {
    return { kind: 'empty-artifact', artifact: ref.name, path: ref.path };
  }
  if (ref.minSizeBytes !== undefined && stats.size < ref.minSizeBytes) {
    return formatError(ref, `size ${stats.size} bytes is below the minimum of ${ref.minSizeBytes}`);
  }
  return OK;
}

// ============================================================================
// BAM
// ============================================================================

type BamScan =
  | { state: 'record' }
  | { state: 'incomplete'; headerComplete: boolean }
  | { state: 'invalid'; detail: string };

/**
 * Walk the decompressed BAM prefix: magic, header text, reference list,
 * then the first record's block size.
 */
export function scanBamPrefix(data: Buffer): BamScan {
  const incomplete = (headerComplete = false): BamScan => ({ state: 'incomplete', headerComplete });

  if (data.length < 4) return incomplete();
  if (!data.subarray(0, 4).equals(BAM_MAGIC)) {
    return { state: 'invalid', detail: 'missing BAM magic' };
  }

  let offset = 4;
  if (data.length < offset + 4) return incomplete();
  const textLength = data.readInt32LE(offset);
  if (textLength < 0) return { state: 'invalid', detail: 'negative header text length' };
  offset += 4 + textLength;

  if (data.length < offset + 4) return incomplete();
  const referenceCount = data.readInt32LE(offset);
  if (referenceCount < 0) return { state: 'invalid', detail: 'negative reference count' };
  offset += 4;

  for (let i = 0; i < referenceCount; i++) {
    if (data.length < offset + 4) return incomplete();
    const nameLength = data.readInt32LE(offset);
    if (nameLength < 1) return { state: 'invalid', detail: 'invalid reference name length' };
    offset += 4 + nameLength + 4;
  }

  if (data.length < offset + 4) return incomplete(data.length >= offset);
  const blockSize = data.readInt32LE(offset);
  if (blockSize < MIN_BAM_RECORD_BYTES) {
    return { state: 'invalid', detail: `alignment record too short (${blockSize} bytes)` };
  }
  if (data.length < offset + 4 + blockSize) return incomplete(true);

  return { state: 'record' };
}

/**
 * BGZF container with a BAM header and at least one alignment record.
 */
export async function checkBamRecords(ref: ArtifactRef): Promise<ValidationOutcome> {
  const handle = await fs.open(ref.path, 'r');
  let head: Buffer;
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(14), 0, 14, 0);
    head = buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }

  if (head.length < 14 || !head.subarray(0, 4).equals(BGZF_MAGIC)) {
    return formatError(ref, 'not a BGZF file');
  }
  if (head[12] !== 0x42 || head[13] !== 0x43) {
    return formatError(ref, 'gzip file without a BGZF block header');
  }

  const source = createReadStream(ref.path);
  const gunzip = createGunzip();
  source.on('error', (error) => gunzip.destroy(error));
  source.pipe(gunzip);

  let data = Buffer.alloc(0);
  let scan: BamScan = { state: 'incomplete', headerComplete: false };
  try {
    for await (const chunk of gunzip) {
      data = Buffer.concat([data, toBuffer(chunk)]);
      scan = scanBamPrefix(data);
      if (scan.state !== 'incomplete' || data.length > MAX_BAM_SCAN_BYTES) {
        break;
      }
    }
  } catch (error) {
    return formatError(ref, `corrupt BGZF stream: ${errorMessage(error)}`);
  } finally {
    source.destroy();
    gunzip.destroy();
  }

  switch (scan.state) {
    case 'record':
      return OK;
    case 'invalid':
      return formatError(ref, scan.detail);
    case 'incomplete':
      return formatError(
        ref,
        scan.headerComplete ? 'no alignment records' : 'truncated BAM header'
      );
  }
}

// ============================================================================
// Line-Oriented Text
// ============================================================================

/**
 * Iterate over the lines of a text file, stopping as soon as `visit`
 * returns false.
 */
async function forEachLine(filePath: string, visit: (line: string) => boolean): Promise<void> {
  const input = createReadStream(filePath, { encoding: 'utf-8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (!visit(line)) {
        break;
      }
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

/**
 * At least `minRecords` complete four-line FASTQ records.
 */
export async function checkFastqRecords(
  ref: ArtifactRef,
  minRecords: number
): Promise<ValidationOutcome> {
  const progress: { records: number; lineNumber: number; group: string[]; problem: string | null } = {
    records: 0,
    lineNumber: 0,
    group: [],
    problem: null,
  };

  await forEachLine(ref.path, (line) => {
    progress.lineNumber++;
    progress.group.push(line);
    if (progress.group.length < 4) {
      return true;
    }

    const [header, sequence, separator, quality] = progress.group;
    const at = progress.lineNumber;
    progress.group = [];
    if (!header.startsWith('@')) {
      progress.problem = `line ${at - 3}: record header must start with "@"`;
      return false;
    }
    if (!separator.startsWith('+')) {
      progress.problem = `line ${at - 1}: separator line must start with "+"`;
      return false;
    }
    if (sequence.length !== quality.length) {
      progress.problem = `line ${at}: quality length ${quality.length} does not match sequence length ${sequence.length}`;
      return false;
    }

    progress.records++;
    return progress.records < minRecords;
  });

  if (progress.problem !== null) {
    return formatError(ref, progress.problem);
  }
  if (progress.records < minRecords) {
    return formatError(
      ref,
      `found ${progress.records} complete FASTQ records, expected at least ${minRecords}`
    );
  }
  return OK;
}

/**
 * Header line with all `columns`, followed by at least `minRows` non-empty rows.
 */
export async function checkDelimitedHeader(
  ref: ArtifactRef,
  options: { delimiter: string; columns: readonly string[]; minRows: number }
): Promise<ValidationOutcome> {
  const table: { header: string[] | null; rows: number } = { header: null, rows: 0 };

  await forEachLine(ref.path, (line) => {
    const trimmed = line.replace(/\r$/, '');
    if (table.header === null) {
      table.header = trimmed.split(options.delimiter).map((column) => column.trim());
      return options.minRows > 0;
    }
    if (trimmed.length > 0) {
      table.rows++;
    }
    return table.rows < options.minRows;
  });

  const columns = table.header ?? [];
  const missing = options.columns.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    return formatError(ref, `header is missing column(s): ${missing.join(', ')}`);
  }
  if (table.rows < options.minRows) {
    return formatError(ref, `found ${table.rows} data row(s), expected at least ${options.minRows}`);
  }
  return OK;
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * The index must not be older than the file it indexes.
 */
export async function checkIndexNewerThan(
  ref: ArtifactRef,
  target: ArtifactRef
): Promise<ValidationOutcome> {
  const [indexStats, targetStats] = await Promise.all([fs.stat(ref.path), fs.stat(target.path)]);
  if (indexStats.mtimeMs < targetStats.mtimeMs) {
    return formatError(ref, `index is older than ${target.name} (${target.path})`);
  }
  return OK;
}
