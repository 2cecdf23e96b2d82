import { noopLogger, type Logger } from "@procwatch/core";

import type { LogStream, OutputChunk, OverflowPolicy } from "../model.js";
import { Subscription, type SubscriptionCloseReason } from "./Subscription.js";

export interface SubscribeOptions {
  stream?: LogStream;
  queueDepth?: number;
  overflowPolicy?: OverflowPolicy;
  signal?: AbortSignal;
}

export interface OutputBroadcasterOptions {
  queueDepth: number;
  overflowPolicy: OverflowPolicy;
  logger?: Logger;
}

/**
 * Fan-out of live output to subscribers, keyed by process id.
 *
 * Holds registrations only; it never keeps a process alive and never
 * waits on a consumer.
 */
export class OutputBroadcaster {
  private readonly subscriptions = new Map<string, Set<Subscription>>();
  private readonly queueDepth: number;
  private readonly overflowPolicy: OverflowPolicy;
  private readonly logger: Logger;

  constructor(options: OutputBroadcasterOptions) {
    this.queueDepth = options.queueDepth;
    this.overflowPolicy = options.overflowPolicy;
    this.logger = options.logger ?? noopLogger;
  }

  subscribe(processId: string, options: SubscribeOptions = {}): Subscription {
    let set = this.subscriptions.get(processId);
    if (!set) {
      set = new Set();
      this.subscriptions.set(processId, set);
    }
    const registered = set;

    const subscription = new Subscription({
      processId,
      stream: options.stream,
      queueDepth: options.queueDepth ?? this.queueDepth,
      overflowPolicy: options.overflowPolicy ?? this.overflowPolicy,
      signal: options.signal,
      onClose: (sub) => this.detach(sub),
    });

    // An already-aborted signal closes the subscription inside its constructor
    if (!subscription.closed) {
      registered.add(subscription);
    } else if (registered.size === 0) {
      this.subscriptions.delete(processId);
    }

    return subscription;
  }

  /**
   * Offer a chunk to every subscriber of the process.
   * Returns how many accepted it.
   */
  publish(processId: string, chunk: OutputChunk): number {
    const set = this.subscriptions.get(processId);
    if (!set) return 0;

    let accepted = 0;
    // Copy: an overflow disconnect removes the subscriber from the set mid-loop
    for (const subscription of [...set]) {
      if (subscription.offer(chunk)) {
        accepted++;
      } else if (subscription.closeReason === "overflow") {
        this.logger.warn("Disconnected slow subscriber", {
          processId,
          subscriptionId: subscription.id,
        });
      }
    }
    return accepted;
  }

  subscriberCount(processId: string): number {
    return this.subscriptions.get(processId)?.size ?? 0;
  }

  closeAll(processId: string, reason: SubscriptionCloseReason): number {
    const set = this.subscriptions.get(processId);
    if (!set) return 0;
    const subscriptions = [...set];
    for (const subscription of subscriptions) {
      subscription.close(reason);
    }
    this.subscriptions.delete(processId);
    return subscriptions.length;
  }

  closeEverything(reason: SubscriptionCloseReason): void {
    for (const processId of [...this.subscriptions.keys()]) {
      this.closeAll(processId, reason);
    }
  }

  private detach(subscription: Subscription): void {
    const set = this.subscriptions.get(subscription.processId);
    if (!set) return;
    set.delete(subscription);
    if (set.size === 0) {
      this.subscriptions.delete(subscription.processId);
    }
  }
}
