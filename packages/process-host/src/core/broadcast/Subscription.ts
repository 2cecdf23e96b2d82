import crypto from "node:crypto";

import type { LogStream, OutputChunk, OverflowPolicy } from "../model.js";

/**
 * Why a subscription ended.
 * - unsubscribed: the consumer closed it (or broke out of `for await`); queued chunks are discarded
 * - overflow: its queue filled up under the "disconnect" policy
 * - ended: the producer finished (e.g. the generation closed)
 * - removed / shutdown: the process record or the whole supervisor went away
 */
export type SubscriptionCloseReason = "unsubscribed" | "overflow" | "ended" | "removed" | "shutdown";

export interface SubscriptionOptions {
  processId: string;
  /** Only deliver chunks of this stream */
  stream?: LogStream;
  queueDepth: number;
  overflowPolicy: OverflowPolicy;
  signal?: AbortSignal;
  onClose?: (subscription: Subscription) => void;
}

type Waiter = (result: IteratorResult<OutputChunk>) => void;

/**
 * One live consumer of a process's output.
 *
 * The producer calls `offer`, which never blocks: chunks land in a bounded
 * queue that the consumer drains with `for await`. Closing resolves any
 * pending `next()` immediately.
 */
export class Subscription implements AsyncIterableIterator<OutputChunk> {
  readonly id = crypto.randomUUID();
  readonly processId: string;
  readonly stream: LogStream | undefined;

  private readonly queueDepth: number;
  private readonly overflowPolicy: OverflowPolicy;
  private readonly signal: AbortSignal | undefined;
  private readonly onClose: ((subscription: Subscription) => void) | undefined;

  private readonly queue: OutputChunk[] = [];
  private readonly waiters: Waiter[] = [];
  private reason: SubscriptionCloseReason | null = null;
  private droppedCount = 0;
  private deliveredCount = 0;

  constructor(options: SubscriptionOptions) {
    this.processId = options.processId;
    this.stream = options.stream;
    this.queueDepth = Math.max(1, options.queueDepth);
    this.overflowPolicy = options.overflowPolicy;
    this.signal = options.signal;
    this.onClose = options.onClose;

    if (this.signal?.aborted) {
      this.close();
    } else {
      this.signal?.addEventListener("abort", this.handleAbort, { once: true });
    }
  }

  get closed(): boolean {
    return this.reason !== null;
  }

  get closeReason(): SubscriptionCloseReason | null {
    return this.reason;
  }

  /** Chunks discarded by the drop-oldest policy */
  get dropped(): number {
    return this.droppedCount;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  /**
   * Hand a chunk to this subscriber without waiting on it.
   * Returns false when the chunk was not accepted (closed, filtered, or disconnected for overflow).
   */
  offer(chunk: OutputChunk): boolean {
    if (this.closed) return false;
    if (this.stream !== undefined && chunk.stream !== this.stream) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      this.deliveredCount++;
      waiter({ value: chunk, done: false });
      return true;
    }

    if (this.queue.length >= this.queueDepth) {
      if (this.overflowPolicy === "disconnect") {
        this.close("overflow");
        return false;
      }
      this.queue.shift();
      this.droppedCount++;
    }

    this.queue.push(chunk);
    return true;
  }

  next(): Promise<IteratorResult<OutputChunk>> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      this.deliveredCount++;
      return Promise.resolve({ value: queued, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<OutputChunk>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<OutputChunk> {
    return this;
  }

  /**
   * End the subscription. Idempotent.
   * Except for "unsubscribed", chunks already queued can still be drained.
   */
  close(reason: SubscriptionCloseReason = "unsubscribed"): void {
    if (this.closed) return;
    this.reason = reason;

    if (reason === "unsubscribed") {
      this.queue.length = 0;
    }

    this.signal?.removeEventListener("abort", this.handleAbort);

    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }

    this.onClose?.(this);
  }

  private readonly handleAbort = (): void => {
    this.close();
  };
}
