import { Err, Ok, type Result } from "@procwatch/core";

import type {
  ProcessSpawner,
  RunningProcessHandle,
  SpawnCallbacks,
  SpawnParams,
} from "../../core/ports/ProcessSpawner.js";
import type { LogStream, Signal } from "../../core/model.js";

export interface FakeProcessOptions {
  /** Signals the process survives */
  ignoreSignals?: Signal[];
  /** Every kill() fails with this error */
  killError?: Error;
  /** Every write() fails with this error */
  writeError?: Error;
  /** Report an asynchronous spawn failure (pid stays undefined) */
  spawnError?: Error;
  /** Deliver spawnError after this many ms instead of on the next microtask */
  spawnErrorDelayMs?: number;
  /** spawn() itself throws */
  throwOnSpawn?: Error;
}

/**
 * A scripted child process. Tests drive its output and exit by hand;
 * fatal signals close it on the next turn of the event loop.
 */
export class FakeProcess implements RunningProcessHandle {
  readonly written: string[] = [];
  readonly signals: Signal[] = [];
  private closed = false;

  constructor(
    readonly pid: number | undefined,
    readonly params: SpawnParams,
    private readonly callbacks: SpawnCallbacks,
    private readonly options: FakeProcessOptions
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  emit(stream: LogStream, text: string): void {
    if (this.closed) return;
    this.callbacks.onOutput(stream, text);
  }

  exit(code: number | null = 0, signal: string | null = null): void {
    if (this.closed) return;
    this.closed = true;
    this.callbacks.onClose(code, signal);
  }

  failStdin(error: Error): void {
    this.callbacks.onStdinError(error);
  }

  kill(signal: Signal): Result<boolean, Error> {
    if (this.options.killError) return Err(this.options.killError);
    if (this.closed) return Ok(false);

    this.signals.push(signal);
    if (!this.options.ignoreSignals?.includes(signal)) {
      setImmediate(() => this.exit(null, signal));
    }
    return Ok(true);
  }

  write(data: string): Promise<Result<void, Error>> {
    if (this.options.writeError) return Promise.resolve(Err(this.options.writeError));
    if (this.closed) return Promise.resolve(Err(new Error("stdin is closed")));
    this.written.push(data);
    return Promise.resolve(Ok(undefined));
  }
}

/**
 * In-process ProcessSpawner for tests. Options apply to the next spawns in
 * queue order, then fall back to the defaults.
 */
export class FakeProcessSpawner implements ProcessSpawner {
  readonly spawned: FakeProcess[] = [];
  private readonly queued: FakeProcessOptions[] = [];
  private nextPid = 4000;

  constructor(private readonly defaults: FakeProcessOptions = {}) {}

  /** Options for the next spawn only */
  queue(options: FakeProcessOptions): this {
    this.queued.push(options);
    return this;
  }

  get last(): FakeProcess | undefined {
    return this.spawned.at(-1);
  }

  spawn(params: SpawnParams, callbacks: SpawnCallbacks): RunningProcessHandle {
    const options = this.queued.shift() ?? this.defaults;
    if (options.throwOnSpawn) throw options.throwOnSpawn;

    const spawnError = options.spawnError;
    const proc = new FakeProcess(spawnError ? undefined : this.nextPid++, params, callbacks, options);
    this.spawned.push(proc);

    if (spawnError) {
      const report = (): void => callbacks.onSpawnError(spawnError);
      if (options.spawnErrorDelayMs !== undefined) {
        setTimeout(report, options.spawnErrorDelayMs);
      } else {
        queueMicrotask(report);
      }
    }
    return proc;
  }
}
