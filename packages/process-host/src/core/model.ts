export type ProcessStatus = "created" | "pending" | "running" | "exited" | "failed" | "stopped";

export type Signal = "SIGTERM" | "SIGKILL" | "SIGINT" | "SIGHUP";

export type LogStream = "stdout" | "stderr";

export const LOG_STREAMS: readonly LogStream[] = ["stdout", "stderr"];

export type OverflowPolicy = "drop-oldest" | "disconnect";

/**
 * State of one process generation.
 * `created` is a registered id that has never been launched.
 * `exited` covers every natural end, nonzero codes and external signals included.
 */
export type ProcessState =
  | { status: "created" }
  | { status: "pending" }
  | { status: "running" }
  | { status: "exited"; exitCode: number | null; signal: string | null }
  | { status: "failed"; reason: string }
  | { status: "stopped"; exitCode: number | null; signal: string | null };

/**
 * What to launch. Immutable for the lifetime of a generation.
 */
export interface LaunchSpec {
  command: string;
  args: string[];
  cwd?: string;
  /** Merged over the supervisor's own environment */
  env?: Record<string, string>;
  /** Run `command` (joined with args) through the system shell */
  shell?: boolean;
  label?: string;
}

export interface ProcessRecord extends LaunchSpec {
  readonly id: string;
}

export interface OutputChunk {
  stream: LogStream;
  /** Starts at 1 per stream per generation */
  sequence: number;
  generation: number;
  /** One line including its "\n", or a flushed partial line */
  text: string;
  timestamp: string;
}

export interface OutputPage {
  chunks: OutputChunk[];
  /** Sequence of the most recently evicted chunk, 0 when nothing was evicted */
  floorSequence: number;
  /** Sequence of the newest chunk, 0 when the stream is empty */
  latestSequence: number;
  generation: number;
}

export interface ProcessSummary {
  id: string;
  label?: string;
  command: string;
  args: string[];
  status: ProcessStatus;
  pid: number | null;
  exitCode: number | null;
  signal: string | null;
  reason?: string;
  generation: number;
  startedAt: string | null;
  endedAt: string | null;
}

export interface ProcessStats {
  total: number;
  created: number;
  pending: number;
  running: number;
  exited: number;
  failed: number;
  stopped: number;
}

export function isLive(state: ProcessState): boolean {
  return state.status === "pending" || state.status === "running";
}

export function exitCodeOf(state: ProcessState): number | null {
  return state.status === "exited" || state.status === "stopped" ? state.exitCode : null;
}

export function signalOf(state: ProcessState): string | null {
  return state.status === "exited" || state.status === "stopped" ? state.signal : null;
}
