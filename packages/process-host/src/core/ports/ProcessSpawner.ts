import type { Result } from "@procwatch/core";

import type { LogStream, Signal } from "../model.js";

export interface RunningProcessHandle {
  readonly pid: number | undefined;
  /**
   * Deliver a signal to the process (and its process group where supported).
   * Ok(false) means the process was already gone; Err means delivery itself failed.
   */
  kill(signal: Signal): Result<boolean, Error>;
  /** Resolves once the data has been handed to the OS, or with the write error. */
  write(data: string): Promise<Result<void, Error>>;
}

export interface SpawnParams {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  shell?: boolean;
}

export interface SpawnCallbacks {
  /** Decoded output, in production order per stream */
  onOutput: (stream: LogStream, text: string) => void;
  /** Fired once, after the process exited and both output pipes closed */
  onClose: (code: number | null, signal: string | null) => void;
  /** The process could not be started; no onClose is guaranteed afterwards */
  onSpawnError: (error: Error) => void;
  onStdinError: (error: Error) => void;
}

export interface ProcessSpawner {
  spawn(params: SpawnParams, callbacks: SpawnCallbacks): RunningProcessHandle;
}
