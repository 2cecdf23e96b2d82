import { Err, Ok, andThen, noopLogger, type Logger, type Result } from "@procwatch/core";

import { DEFAULT_CONFIG, MAX_TIMER_MILLIS, type SupervisorConfig } from "../config.js";
import {
  isLive,
  type LaunchSpec,
  type LogStream,
  type OutputChunk,
  type OutputPage,
  type ProcessRecord,
  type ProcessStats,
  type ProcessSummary,
} from "../model.js";
import {
  AlreadyExistsError,
  AlreadyRunningError,
  InvalidSpecError,
  KillError,
  NotFoundError,
  NotRunningError,
  ShutdownError,
  StdinError,
  StillRunningError,
  TimeoutError,
  TruncatedError,
} from "../errors.js";
import type { ProcessSpawner } from "../ports/ProcessSpawner.js";
import { KeyedMutex } from "../concurrency/KeyedMutex.js";
import { OutputBroadcaster, type SubscribeOptions } from "../broadcast/OutputBroadcaster.js";
import type { Subscription } from "../broadcast/Subscription.js";
import { ProcessHandle } from "./ProcessHandle.js";

export interface ProcessRegistryOptions {
  spawner: ProcessSpawner;
  config?: Partial<SupervisorConfig>;
  logger?: Logger;
}

export interface SendInputOptions {
  /** Append "\n" to the text (default: true) */
  newline?: boolean;
}

export interface WaitForOutputOptions {
  timeoutMs?: number;
  stream?: LogStream;
}

export interface StopAllResult {
  stopped: string[];
  failed: Array<{ id: string; error: string }>;
}

const ID_PATTERN = /^[\w-]+$/;

export const DEFAULT_WAIT_TIMEOUT = 30_000;

/**
 * Identity management and per-id command serialization.
 *
 * Callers address processes by id only; handles never leave the registry.
 * Lifecycle commands (start/stop/restart/remove) for one id run strictly one
 * at a time, in call order. Reads and stdin writes do not queue behind them.
 */
export class ProcessRegistry {
  readonly config: SupervisorConfig;

  private readonly handles = new Map<string, ProcessHandle>();
  private readonly locks = new KeyedMutex<string>();
  private readonly broadcaster: OutputBroadcaster;
  private readonly spawner: ProcessSpawner;
  private readonly logger: Logger;
  private isShutdown = false;

  constructor(options: ProcessRegistryOptions) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.spawner = options.spawner;
    this.logger = options.logger ?? noopLogger;
    this.broadcaster = new OutputBroadcaster({
      queueDepth: this.config.subscriberQueueDepth,
      overflowPolicy: this.config.overflowPolicy,
      logger: this.logger,
    });
  }

  /**
   * Start `id`, creating it if unknown. Restarting a finished id with a new
   * spec replaces its record.
   */
  start(
    id: string,
    spec: LaunchSpec
  ): Promise<Result<ProcessSummary, AlreadyRunningError | InvalidSpecError | ShutdownError>> {
    const record = validateSpec(id, spec);
    if (!record.ok) return Promise.resolve(record);

    return this.locks.run(id, async () => {
      if (this.isShutdown) return Err(new ShutdownError());

      const existing = this.handles.get(id);
      if (existing) {
        return existing.start(record.value);
      }
      return this.register(record.value).start();
    });
  }

  /**
   * Register `id` without launching it. The record stays `created` until
   * `launch`, `start` or `restart`.
   */
  create(id: string, spec: LaunchSpec): Promise<Result<ProcessSummary, AlreadyExistsError | InvalidSpecError | ShutdownError>> {
    const record = validateSpec(id, spec);
    if (!record.ok) return Promise.resolve(record);

    return this.locks.run(id, async () => {
      if (this.isShutdown) return Err(new ShutdownError());
      if (this.handles.has(id)) return Err(new AlreadyExistsError(id));
      return Ok(this.register(record.value).summary());
    });
  }

  /** Launch the stored launch spec of `id` as a new generation. */
  launch(id: string): Promise<Result<ProcessSummary, NotFoundError | AlreadyRunningError | ShutdownError>> {
    return this.locks.run(id, async () => {
      if (this.isShutdown) return Err(new ShutdownError());
      const handle = this.handles.get(id);
      if (!handle) return Err(new NotFoundError(id));
      return handle.start();
    });
  }

  stop(id: string, graceMillis?: number): Promise<Result<ProcessSummary, NotFoundError | KillError | InvalidSpecError>> {
    const grace = this.resolveGrace(id, graceMillis);
    if (!grace.ok) return Promise.resolve(grace);

    return this.locks.run(id, async () => {
      const handle = this.handles.get(id);
      if (!handle) return Err(new NotFoundError(id));
      return handle.stop(grace.value);
    });
  }

  restart(
    id: string,
    graceMillis?: number
  ): Promise<Result<ProcessSummary, NotFoundError | KillError | AlreadyRunningError | InvalidSpecError | ShutdownError>> {
    const grace = this.resolveGrace(id, graceMillis);
    if (!grace.ok) return Promise.resolve(grace);

    return this.locks.run(id, async () => {
      if (this.isShutdown) return Err(new ShutdownError());
      const handle = this.handles.get(id);
      if (!handle) return Err(new NotFoundError(id));
      return handle.restart(grace.value);
    });
  }

  /**
   * Point-in-time listing: the set of ids is fixed when this is called,
   * summaries are produced as the iterator advances.
   */
  list(): IterableIterator<ProcessSummary> {
    const snapshot = [...this.handles.values()];
    return (function* () {
      for (const handle of snapshot) {
        yield handle.summary();
      }
    })();
  }

  get(id: string): Result<ProcessSummary, NotFoundError> {
    const handle = this.handles.get(id);
    return handle ? Ok(handle.summary()) : Err(new NotFoundError(id));
  }

  has(id: string): boolean {
    return this.handles.has(id);
  }

  remove(id: string): Promise<Result<void, NotFoundError | StillRunningError>> {
    return this.locks.run(id, async () => {
      const handle = this.handles.get(id);
      if (!handle) return Err(new NotFoundError(id));
      if (isLive(handle.state)) return Err(new StillRunningError(id));

      this.handles.delete(id);
      this.broadcaster.closeAll(id, "removed");
      this.logger.info("Removed process", { id });
      return Ok(undefined);
    });
  }

  readOutput(
    id: string,
    stream: LogStream,
    sinceSequence: number,
    limit?: number
  ): Result<OutputPage, NotFoundError | TruncatedError | InvalidSpecError> {
    if (!Number.isInteger(sinceSequence) || sinceSequence < 0) {
      return Err(new InvalidSpecError(`sinceSequence must be a non-negative integer, got ${sinceSequence}`, id));
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return Err(new InvalidSpecError(`limit must be a positive integer, got ${limit}`, id));
    }
    return andThen(this.require(id), (handle) => handle.readOutput(stream, sinceSequence, limit));
  }

  tail(id: string, lines: number, includeStderr = true): Result<OutputChunk[], NotFoundError> {
    return andThen(this.require(id), (handle) => Ok(handle.tail(lines, includeStderr)));
  }

  async sendInput(
    id: string,
    text: string,
    options: SendInputOptions = {}
  ): Promise<Result<void, NotFoundError | NotRunningError | StdinError>> {
    const handle = this.require(id);
    if (!handle.ok) return handle;
    const data = options.newline === false ? text : `${text}\n`;
    return handle.value.sendInput(data);
  }

  /**
   * Live output from now on. History is only available through readOutput.
   */
  subscribe(id: string, options: SubscribeOptions = {}): Result<Subscription, NotFoundError | ShutdownError> {
    if (this.isShutdown) return Err(new ShutdownError());
    if (!this.handles.has(id)) return Err(new NotFoundError(id));
    return Ok(this.broadcaster.subscribe(id, options));
  }

  subscriberCount(id: string): number {
    return this.broadcaster.subscriberCount(id);
  }

  /**
   * First line of the current generation matching `pattern`: retained output
   * is searched first, then live output until the timeout or the generation ends.
   *
   * Live chunks only wake the search; every pass rescans the buffers past the
   * last sequence seen, so lines a lagging subscription dropped are still found.
   */
  async waitForOutput(
    id: string,
    pattern: string | RegExp,
    options: WaitForOutputOptions = {}
  ): Promise<Result<OutputChunk, NotFoundError | NotRunningError | TimeoutError | InvalidSpecError>> {
    const regex = toRegex(pattern);
    if (!regex.ok) return Err(new InvalidSpecError(regex.error, id));

    const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMER_MILLIS) {
      return Err(new InvalidSpecError(`timeoutMs must be an integer between 1 and ${MAX_TIMER_MILLIS}, got ${timeoutMs}`, id));
    }

    const found = this.require(id);
    if (!found.ok) return found;
    const handle = found.value;

    const generation = handle.generation;
    const streams: LogStream[] = options.stream ? [options.stream] : ["stdout", "stderr"];
    const seen: Record<LogStream, number> = { stdout: 0, stderr: 0 };

    const scan = (): OutputChunk | undefined => {
      const matches: OutputChunk[] = [];
      for (const stream of streams) {
        let page = handle.readOutput(stream, seen[stream]);
        if (!page.ok) page = handle.readOutput(stream, page.error.floorSequence);
        if (!page.ok || page.value.generation !== generation) continue;

        seen[stream] = page.value.latestSequence;
        const match = page.value.chunks.find((chunk) => regex.value.test(chunk.text));
        if (match) matches.push(match);
      }
      matches.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
      return matches[0];
    };

    const retained = scan();
    if (retained) return Ok(retained);

    if (handle.state.status !== "running") {
      return Err(new NotRunningError(id, handle.state.status));
    }

    const subscription = this.broadcaster.subscribe(id, { stream: options.stream, overflowPolicy: "drop-oldest" });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      subscription.close();
    }, timeoutMs);
    const detach = handle.onClose(() => subscription.close("ended"));

    try {
      for await (const chunk of subscription) {
        if (chunk.generation !== generation) continue;
        const match = scan();
        if (match) return Ok(match);
      }
    } finally {
      clearTimeout(timer);
      detach();
      subscription.close();
    }

    // The timeout close discards whatever was still queued
    const last = scan();
    if (last) return Ok(last);

    if (timedOut) {
      return Err(new TimeoutError(`Timed out after ${timeoutMs}ms waiting for ${regex.value.source}`, id));
    }
    return Err(new NotRunningError(id, handle.state.status));
  }

  /** Stop every live process in parallel, spawns still in flight included. */
  async stopAll(graceMillis?: number): Promise<StopAllResult> {
    const running = [...this.handles.values()]
      .filter((handle) => isLive(handle.state))
      .map((handle) => handle.id);

    const results = await Promise.all(running.map(async (id) => ({ id, result: await this.stop(id, graceMillis) })));

    const outcome: StopAllResult = { stopped: [], failed: [] };
    for (const { id, result } of results) {
      if (result.ok) {
        outcome.stopped.push(id);
      } else {
        outcome.failed.push({ id, error: result.error.message });
      }
    }
    return outcome;
  }

  /**
   * Remove every record whose last run has ended. Records that were never
   * launched stay. Returns the removed ids.
   */
  async purge(): Promise<string[]> {
    const candidates = [...this.handles.values()]
      .filter((handle) => !isLive(handle.state) && handle.state.status !== "created")
      .map((handle) => handle.id);

    const removed: string[] = [];
    for (const id of candidates) {
      const result = await this.remove(id);
      if (result.ok) removed.push(id);
    }
    return removed;
  }

  getStats(): ProcessStats {
    const stats: ProcessStats = { total: 0, created: 0, pending: 0, running: 0, exited: 0, failed: 0, stopped: 0 };
    for (const handle of this.handles.values()) {
      stats.total++;
      stats[handle.state.status]++;
    }
    return stats;
  }

  /**
   * Stop everything, close all subscriptions and forget every record.
   * Later lifecycle commands fail with ShutdownError.
   */
  async shutdown(graceMillis?: number): Promise<StopAllResult> {
    this.isShutdown = true;
    const result = await this.stopAll(graceMillis);
    if (result.failed.length > 0) {
      this.logger.warn("Some processes could not be stopped", { failed: result.failed });
    }
    this.broadcaster.closeEverything("shutdown");
    this.handles.clear();
    return result;
  }

  private register(record: ProcessRecord): ProcessHandle {
    const handle = new ProcessHandle(record, {
      spawner: this.spawner,
      broadcaster: this.broadcaster,
      config: this.config,
      logger: this.logger,
    });
    this.handles.set(record.id, handle);
    this.logger.info("Registered process", { id: record.id, command: record.command, args: record.args });
    return handle;
  }

  private require(id: string): Result<ProcessHandle, NotFoundError> {
    const handle = this.handles.get(id);
    return handle ? Ok(handle) : Err(new NotFoundError(id));
  }

  private resolveGrace(id: string, graceMillis: number | undefined): Result<number, InvalidSpecError> {
    const grace = graceMillis ?? this.config.defaultGraceMillis;
    if (!Number.isFinite(grace) || grace < 0 || grace > MAX_TIMER_MILLIS) {
      return Err(new InvalidSpecError(`graceMillis must be between 0 and ${MAX_TIMER_MILLIS}, got ${grace}`, id));
    }
    return Ok(grace);
  }
}

function validateSpec(id: string, spec: LaunchSpec): Result<ProcessRecord, InvalidSpecError> {
  if (!ID_PATTERN.test(id)) {
    return Err(new InvalidSpecError(`Invalid process id "${id}": use letters, digits, "_" or "-"`, id));
  }
  const command = spec.command.trim();
  if (!command) {
    return Err(new InvalidSpecError("Empty command", id));
  }
  return Ok({
    id,
    command,
    args: [...spec.args],
    cwd: spec.cwd,
    env: spec.env ? { ...spec.env } : undefined,
    shell: spec.shell,
    label: spec.label,
  });
}

function toRegex(pattern: string | RegExp): Result<RegExp, string> {
  try {
    // Drop stateful flags so repeated test() calls are independent
    return typeof pattern === "string"
      ? Ok(new RegExp(pattern))
      : Ok(new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")));
  } catch (e) {
    return Err(`Invalid pattern: ${e instanceof Error ? e.message : String(e)}`);
  }
}

