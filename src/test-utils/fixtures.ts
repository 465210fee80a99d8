/**
 * Artifact fixtures shared by the pipeline tests.
 *
 * @module test-utils/fixtures
 */

import { gzipSync } from 'node:zlib';

/**
 * Wrap bytes in a single BGZF block: a gzip member whose FEXTRA field
 * carries the "BC" subfield.
 */
export function bgzf(data: Buffer, subfield = 'BC'): Buffer {
  const member = gzipSync(data);
  const header = Buffer.from(member.subarray(0, 10));
  header[3] = 0x04;
  const extra = Buffer.alloc(8);
  extra.writeUInt16LE(6, 0);
  extra.write(subfield, 2, 'latin1');
  extra.writeUInt16LE(2, 4);
  extra.writeUInt16LE(member.length + 8 - 1, 6);
  return Buffer.concat([header, extra, member.subarray(10)]);
}

function int32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeInt32LE(value, 0);
  return buffer;
}

/**
 * Uncompressed BAM content: magic, SAM header text, references and
 * `records` placeholder alignment records of `recordSize` bytes.
 */
export function bamPayload(options: { records?: number; recordSize?: number; magic?: string } = {}): Buffer {
  const text = Buffer.from('@HD\tVN:1.6\tSO:coordinate\n@SQ\tSN:tx1\tLN:1000\n', 'latin1');
  const name = Buffer.from('tx1\0', 'latin1');
  const recordSize = options.recordSize ?? 40;
  const parts: Buffer[] = [
    Buffer.from(options.magic ?? 'BAM\x01', 'latin1'),
    int32(text.length),
    text,
    int32(1),
    int32(name.length),
    name,
    int32(1000),
  ];
  for (let i = 0; i < (options.records ?? 1); i++) {
    parts.push(int32(recordSize), Buffer.alloc(recordSize));
  }
  return Buffer.concat(parts);
}

/**
 * A compressed BAM file body.
 */
export function bamFile(options: { records?: number; recordSize?: number } = {}): Buffer {
  return bgzf(bamPayload(options));
}

/**
 * `count` well-formed FASTQ records.
 */
export function fastqText(count: number): string {
  return Array.from({ length: count }, (_, i) => `@read${i + 1}\nACGUACGU\n+\nIIIIIIII\n`).join('');
}
