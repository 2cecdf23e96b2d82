import { Err, Ok, toError, type Logger, type Result } from "@procwatch/core";

import type { SupervisorConfig } from "../config.js";
import {
  LOG_STREAMS,
  exitCodeOf,
  isLive,
  signalOf,
  type LogStream,
  type OutputChunk,
  type OutputPage,
  type ProcessRecord,
  type ProcessState,
  type ProcessSummary,
} from "../model.js";
import { AlreadyRunningError, KillError, NotRunningError, StdinError, type TruncatedError } from "../errors.js";
import type { ProcessSpawner, RunningProcessHandle, SpawnCallbacks } from "../ports/ProcessSpawner.js";
import { OutputBuffer } from "../output/OutputBuffer.js";
import { LineSplitter } from "../output/LineSplitter.js";
import type { OutputBroadcaster } from "../broadcast/OutputBroadcaster.js";

export interface ProcessHandleDeps {
  spawner: ProcessSpawner;
  broadcaster: OutputBroadcaster;
  config: SupervisorConfig;
  logger: Logger;
}

type PerStream<T> = Record<LogStream, T>;

/**
 * Owns the current generation of one supervised id.
 *
 * Every start begins a new generation with fresh buffers, splitters and
 * state. Callbacks from the spawner carry the generation they were created
 * for, so anything a previous generation still emits is ignored.
 */
export class ProcessHandle {
  readonly id: string;

  private record: ProcessRecord;
  private current: ProcessState = { status: "created" };
  private generationNumber = 0;
  private running: RunningProcessHandle | null = null;
  private pidValue: number | null = null;
  private startedAt: string | null = null;
  private endedAt: string | null = null;

  private buffers: PerStream<OutputBuffer>;
  private splitters: PerStream<LineSplitter>;
  private readonly flushTimers = new Map<LogStream, NodeJS.Timeout>();

  private stopRequested = false;
  private stdinFailure: string | null = null;
  private closed: Promise<void> = Promise.resolve();
  private markClosed: () => void = () => {};
  private readonly closeListeners = new Set<() => void>();

  constructor(
    record: ProcessRecord,
    private readonly deps: ProcessHandleDeps
  ) {
    this.id = record.id;
    this.record = record;
    this.buffers = this.createBuffers();
    this.splitters = this.createSplitters();
  }

  get state(): ProcessState {
    return this.current;
  }

  get generation(): number {
    return this.generationNumber;
  }

  get pid(): number | null {
    return this.pidValue;
  }

  get exitCode(): number | null {
    return exitCodeOf(this.current);
  }

  /**
   * Begin a new generation. Passing a record replaces the launch spec.
   * A spawn failure is not an error here: it ends the generation as `failed`.
   */
  start(record: ProcessRecord = this.record): Result<ProcessSummary, AlreadyRunningError> {
    if (isLive(this.current)) {
      return Err(new AlreadyRunningError(this.id));
    }

    this.record = record;
    const generation = this.beginGeneration();

    let handle: RunningProcessHandle;
    try {
      handle = this.deps.spawner.spawn(
        {
          command: record.command,
          args: record.args,
          cwd: record.cwd,
          env: record.env,
          shell: record.shell,
        },
        this.callbacksFor(generation)
      );
    } catch (e) {
      this.finish(generation, { status: "failed", reason: `spawn failed: ${toError(e).message}` });
      return Ok(this.summary());
    }

    // A synchronous spawn error callback may already have ended this generation
    if (generation !== this.generationNumber || !isLive(this.current)) {
      return Ok(this.summary());
    }

    this.running = handle;
    this.pidValue = handle.pid ?? null;
    if (this.pidValue !== null) {
      this.current = { status: "running" };
      this.deps.logger.info("Process started", { id: this.id, pid: this.pidValue, generation });
    }

    return Ok(this.summary());
  }

  /**
   * SIGTERM, wait up to `graceMillis`, then SIGKILL and wait up to the force-kill window.
   * A no-op when nothing is running. A spawn still in flight has no pid to
   * signal, so it is given `graceMillis` to report its outcome.
   */
  async stop(graceMillis: number): Promise<Result<ProcessSummary, KillError>> {
    if (this.current.status === "pending") {
      if (await settlesWithin(this.closed, graceMillis)) return Ok(this.summary());
      return Err(new KillError(this.id, `spawn still pending after ${graceMillis}ms`));
    }

    const handle = this.running;
    if (this.current.status !== "running" || !handle) {
      return Ok(this.summary());
    }

    const closed = this.closed;
    this.stopRequested = true;

    const term = handle.kill("SIGTERM");
    if (!term.ok) {
      this.stopRequested = false;
      return Err(new KillError(this.id, term.error.message, term.error));
    }

    if (await settlesWithin(closed, graceMillis)) {
      return Ok(this.summary());
    }

    this.deps.logger.info("Grace period elapsed, force-killing", { id: this.id, pid: this.pidValue, graceMillis });
    const kill = handle.kill("SIGKILL");
    if (!kill.ok) {
      return Err(new KillError(this.id, kill.error.message, kill.error));
    }

    if (await settlesWithin(closed, this.deps.config.forceKillWaitMillis)) {
      return Ok(this.summary());
    }

    return Err(
      new KillError(this.id, `still alive ${this.deps.config.forceKillWaitMillis}ms after SIGKILL`)
    );
  }

  /** Stop, then start the same record as a new generation. */
  async restart(graceMillis: number): Promise<Result<ProcessSummary, KillError | AlreadyRunningError>> {
    const stopped = await this.stop(graceMillis);
    if (!stopped.ok) return stopped;
    return this.start();
  }

  async sendInput(text: string): Promise<Result<void, NotRunningError | StdinError>> {
    const handle = this.running;
    if (this.current.status !== "running" || !handle) {
      return Err(new NotRunningError(this.id, this.current.status));
    }

    const generation = this.generationNumber;
    const written = await handle.write(text);
    if (!written.ok) {
      this.recordStdinFailure(generation, written.error);
      return Err(new StdinError(this.id, written.error));
    }
    return Ok(undefined);
  }

  readOutput(stream: LogStream, sinceSequence: number, limit?: number): Result<OutputPage, TruncatedError> {
    return this.buffers[stream].read(sinceSequence, limit);
  }

  /**
   * Last `n` chunks across the selected streams, ordered by timestamp.
   * Ordering between streams is best-effort; within a stream it is exact.
   */
  tail(n: number, includeStderr = true): OutputChunk[] {
    const streams: LogStream[] = includeStderr ? ["stdout", "stderr"] : ["stdout"];
    const merged = streams.flatMap((stream) => this.buffers[stream].tail(n));
    merged.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    return merged.slice(-n);
  }

  /** Resolves when the current generation has closed. */
  whenClosed(): Promise<void> {
    return this.closed;
  }

  /**
   * Call `listener` once when the current generation closes.
   * Returns a function that detaches it again.
   */
  onClose(listener: () => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  summary(): ProcessSummary {
    const state = this.current;
    return {
      id: this.id,
      label: this.record.label,
      command: this.record.command,
      args: [...this.record.args],
      status: state.status,
      pid: this.pidValue,
      exitCode: exitCodeOf(state),
      signal: signalOf(state),
      reason: state.status === "failed" ? state.reason : undefined,
      generation: this.generationNumber,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
    };
  }

  private beginGeneration(): number {
    this.clearFlushTimers();
    this.generationNumber++;
    this.buffers = this.createBuffers();
    this.splitters = this.createSplitters();
    this.current = { status: "pending" };
    this.running = null;
    this.pidValue = null;
    this.stopRequested = false;
    this.stdinFailure = null;
    this.startedAt = new Date().toISOString();
    this.endedAt = null;
    this.closed = new Promise<void>((resolve) => {
      this.markClosed = resolve;
    });
    return this.generationNumber;
  }

  private callbacksFor(generation: number): SpawnCallbacks {
    const isCurrent = (): boolean => generation === this.generationNumber;
    return {
      onOutput: (stream, text) => {
        if (isCurrent()) this.pump(stream, text);
      },
      onClose: (code, signal) => {
        if (!isCurrent()) return;
        for (const stream of LOG_STREAMS) this.flushPartial(stream);
        this.finish(generation, this.finalState(code, signal));
      },
      onSpawnError: (error) => {
        this.finish(generation, { status: "failed", reason: `spawn failed: ${error.message}` });
      },
      onStdinError: (error) => {
        this.recordStdinFailure(generation, error);
      },
    };
  }

  private finalState(code: number | null, signal: string | null): ProcessState {
    if (this.stopRequested) return { status: "stopped", exitCode: code, signal };
    if (this.stdinFailure !== null) return { status: "failed", reason: this.stdinFailure };
    return { status: "exited", exitCode: code, signal };
  }

  private finish(generation: number, state: ProcessState): void {
    if (generation !== this.generationNumber || !isLive(this.current)) return;

    this.clearFlushTimers();
    this.current = state;
    this.running = null;
    this.endedAt = new Date().toISOString();
    this.deps.logger.info("Process ended", { id: this.id, generation, ...state });
    this.markClosed();

    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) listener();
  }

  private recordStdinFailure(generation: number, error: Error): void {
    if (generation !== this.generationNumber || this.stdinFailure !== null) return;
    this.stdinFailure = `stdin write failed: ${error.message}`;
    this.deps.logger.warn("Stdin write failed", { id: this.id, generation, error });
  }

  private pump(stream: LogStream, text: string): void {
    const splitter = this.splitters[stream];
    for (const line of splitter.push(text)) {
      this.emit(stream, line);
    }

    const pendingTimer = this.flushTimers.get(stream);
    if (pendingTimer) {
      clearTimeout(pendingTimer);
      this.flushTimers.delete(stream);
    }
    if (!splitter.hasPending) return;

    const delay = this.deps.config.partialLineFlushMs;
    if (delay <= 0) {
      this.flushPartial(stream);
      return;
    }
    const timer = setTimeout(() => {
      this.flushTimers.delete(stream);
      this.flushPartial(stream);
    }, delay);
    timer.unref();
    this.flushTimers.set(stream, timer);
  }

  private flushPartial(stream: LogStream): void {
    const rest = this.splitters[stream].flush();
    if (rest !== null) this.emit(stream, rest);
  }

  /** Buffer first, then fan out: pollers never depend on subscribers. */
  private emit(stream: LogStream, text: string): void {
    const chunk = this.buffers[stream].append(text);
    this.deps.broadcaster.publish(this.id, chunk);
  }

  private clearFlushTimers(): void {
    for (const timer of this.flushTimers.values()) clearTimeout(timer);
    this.flushTimers.clear();
  }

  private createBuffers(): PerStream<OutputBuffer> {
    const make = (stream: LogStream): OutputBuffer =>
      new OutputBuffer({
        processId: this.id,
        stream,
        generation: this.generationNumber,
        maxBytes: this.deps.config.maxBufferBytesPerStream,
      });
    return { stdout: make("stdout"), stderr: make("stderr") };
  }

  private createSplitters(): PerStream<LineSplitter> {
    return {
      stdout: new LineSplitter(this.deps.config.maxLineBytes),
      stderr: new LineSplitter(this.deps.config.maxLineBytes),
    };
  }
}

/**
 * Whether `promise` settles within `ms`. The timer is always cleared.
 */
async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const settled = await Promise.race([
    promise.then(() => true),
    new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    }),
  ]);
  if (timer !== undefined) clearTimeout(timer);
  return settled;
}
