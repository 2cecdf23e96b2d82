import { Err, Ok, type Result } from "@procwatch/core";

import type { LogStream, OutputChunk, OutputPage } from "../model.js";
import { TruncatedError } from "../errors.js";

export interface OutputBufferOptions {
  processId: string;
  stream: LogStream;
  generation: number;
  maxBytes: number;
}

// Compact the backing array once this many evicted slots pile up at its head
const COMPACT_THRESHOLD = 1024;

/**
 * Bounded, sequenced store for one stream of one process generation.
 *
 * Sequences are contiguous, so the chunk with sequence `s` lives at
 * `head + (s - floor - 1)`. Appends come from a single writer; reads never
 * mutate and always return copies.
 */
export class OutputBuffer {
  readonly processId: string;
  readonly stream: LogStream;
  readonly generation: number;
  private readonly maxBytes: number;

  private chunks: OutputChunk[] = [];
  private head = 0;
  private bytes = 0;
  private nextSequence = 1;
  private floor = 0;

  constructor(options: OutputBufferOptions) {
    this.processId = options.processId;
    this.stream = options.stream;
    this.generation = options.generation;
    this.maxBytes = options.maxBytes;
  }

  /** Sequence of the most recently evicted chunk; 0 until something is evicted. */
  get floorSequence(): number {
    return this.floor;
  }

  get latestSequence(): number {
    return this.nextSequence - 1;
  }

  get size(): number {
    return this.chunks.length - this.head;
  }

  get byteSize(): number {
    return this.bytes;
  }

  append(text: string): OutputChunk {
    const chunk: OutputChunk = {
      stream: this.stream,
      sequence: this.nextSequence++,
      generation: this.generation,
      text,
      timestamp: new Date().toISOString(),
    };

    this.chunks.push(chunk);
    this.bytes += byteLength(text);
    this.evict();

    return { ...chunk };
  }

  /**
   * Everything after `sinceSequence`, oldest first.
   * Fails when part of that range has already been evicted.
   */
  read(sinceSequence: number, limit?: number): Result<OutputPage, TruncatedError> {
    if (sinceSequence < this.floor) {
      return Err(new TruncatedError(this.processId, sinceSequence, this.floor));
    }

    const start = this.head + (sinceSequence - this.floor);
    const end = limit === undefined ? this.chunks.length : Math.min(this.chunks.length, start + limit);

    return Ok({
      chunks: this.chunks.slice(start, end).map((c) => ({ ...c })),
      floorSequence: this.floor,
      latestSequence: this.latestSequence,
      generation: this.generation,
    });
  }

  /** The last `n` retained chunks. */
  tail(n: number): OutputChunk[] {
    if (n <= 0) return [];
    const start = Math.max(this.head, this.chunks.length - n);
    return this.chunks.slice(start).map((c) => ({ ...c }));
  }

  /** The newest chunk is always kept, even when it alone exceeds the limit. */
  private evict(): void {
    while (this.bytes > this.maxBytes && this.size > 1) {
      const oldest = this.chunks[this.head];
      this.bytes -= byteLength(oldest.text);
      this.floor = oldest.sequence;
      this.head++;
    }

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.chunks.length) {
      this.chunks = this.chunks.slice(this.head);
      this.head = 0;
    }
  }
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}
