/**
 * Bounded Output Buffers
 *
 * External tools can print gigabytes of progress output. The runner keeps
 * only the last N bytes of each stream, which is what a failure report
 * needs.
 *
 * @module runtime/tail-buffer
 */

/**
 * Ring buffer over byte chunks that retains the most recent `capacity` bytes.
 *
 * @example
 * ```typescript
 * const tail = new TailBuffer(4);
 * tail.push(Buffer.from('abcdef'));
 * tail.toString(); // 'cdef'
 * tail.truncatedBytes; // 2
 * ```
 */
export class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private dropped = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('TailBuffer capacity must be a positive integer');
    }
  }

  push(chunk: Buffer): void {
    if (chunk.length === 0) {
      return;
    }

    if (chunk.length >= this.capacity) {
      this.dropped += this.size + (chunk.length - this.capacity);
      this.chunks = [chunk.subarray(chunk.length - this.capacity)];
      this.size = this.capacity;
      return;
    }

    this.chunks.push(chunk);
    this.size += chunk.length;

    while (this.size > this.capacity) {
      const excess = this.size - this.capacity;
      const first = this.chunks[0];
      if (first.length <= excess) {
        this.chunks.shift();
        this.size -= first.length;
        this.dropped += first.length;
      } else {
        this.chunks[0] = first.subarray(excess);
        this.size -= excess;
        this.dropped += excess;
      }
    }
  }

  /** Bytes currently held */
  get length(): number {
    return this.size;
  }

  /** Bytes discarded from the head so far */
  get truncatedBytes(): number {
    return this.dropped;
  }

  /**
   * Decode the retained bytes as UTF-8. When the head was truncated in the
   * middle of a multi-byte character, the orphaned continuation bytes are
   * skipped.
   */
  toString(): string {
    let bytes = Buffer.concat(this.chunks, this.size);
    if (this.dropped > 0) {
      let start = 0;
      while (start < bytes.length && start < 3 && (bytes[start] & 0xc0) === 0x80) {
        start++;
      }
      bytes = bytes.subarray(start);
    }
    return bytes.toString('utf-8');
  }
}

const LF = 0x0a;
const CR = 0x0d;

/**
 * Splits a byte stream into lines and drops the ones matching any noise
 * pattern before forwarding the rest to a sink.
 *
 * Lines end at `\n` or `\r`, so carriage-return progress bars are
 * forwarded as they redraw. Splitting happens on bytes, so a multi-byte
 * character cut across two chunks reaches the sink intact. A partial line
 * longer than `maxPending` bytes is forwarded unfiltered rather than held.
 */
export class LineFilter {
  private pending: Buffer = Buffer.alloc(0);

  constructor(
    private readonly patterns: readonly RegExp[],
    private readonly sink: (chunk: Buffer) => void,
    private readonly maxPending = 64 * 1024
  ) {}

  /** Bytes of the current partial line held back */
  get pendingBytes(): number {
    return this.pending.length;
  }

  push(chunk: Buffer): void {
    if (this.patterns.length === 0) {
      this.sink(chunk);
      return;
    }

    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const kept: Buffer[] = [];
    let start = 0;

    for (let i = 0; i < data.length; i++) {
      if (data[i] === LF || data[i] === CR) {
        if (!this.isNoise(data.toString('utf-8', start, i))) {
          kept.push(data.subarray(start, i + 1));
        }
        start = i + 1;
      }
    }

    const rest = data.subarray(start);
    if (rest.length > this.maxPending) {
      kept.push(rest);
      this.pending = Buffer.alloc(0);
    } else {
      this.pending = Buffer.from(rest);
    }

    if (kept.length > 0) {
      this.sink(Buffer.concat(kept));
    }
  }

  /** Forward any trailing partial line. */
  flush(): void {
    if (this.pending.length > 0 && !this.isNoise(this.pending.toString('utf-8'))) {
      this.sink(this.pending);
    }
    this.pending = Buffer.alloc(0);
  }

  private isNoise(line: string): boolean {
    return this.patterns.some((pattern) => pattern.test(line));
  }
}
