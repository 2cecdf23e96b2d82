import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { Err, Ok, toError, type Result } from "@procwatch/core";

import type {
  ProcessSpawner,
  RunningProcessHandle,
  SpawnParams,
  SpawnCallbacks,
} from "../../core/ports/ProcessSpawner.js";
import type { Signal } from "../../core/model.js";
import { isErrno } from "./processUtils.js";

const USE_PROCESS_GROUPS = process.platform !== "win32";

class NodeProcessHandle implements RunningProcessHandle {
  constructor(private readonly proc: ChildProcessWithoutNullStreams) {}

  get pid(): number | undefined {
    return this.proc.pid;
  }

  kill(signal: Signal): Result<boolean, Error> {
    const pid = this.proc.pid;
    if (pid === undefined) return Ok(false);

    if (!USE_PROCESS_GROUPS) {
      return Ok(this.proc.kill(signal));
    }

    try {
      // Negative PID signals the whole group, so shell grandchildren go too
      process.kill(-pid, signal);
      return Ok(true);
    } catch (e) {
      if (isErrno(e, "ESRCH")) return Ok(false);
      return Err(toError(e));
    }
  }

  write(data: string): Promise<Result<void, Error>> {
    const stdin = this.proc.stdin;
    if (!stdin.writable) {
      return Promise.resolve(Err(new Error("stdin is closed")));
    }
    return new Promise((resolve) => {
      stdin.write(data, (error) => {
        resolve(error ? Err(error) : Ok(undefined));
      });
    });
  }
}

export class NodeProcessSpawner implements ProcessSpawner {
  spawn(params: SpawnParams, callbacks: SpawnCallbacks): RunningProcessHandle {
    const proc = spawn(params.command, params.args, {
      cwd: params.cwd,
      env: { ...process.env, ...params.env },
      shell: params.shell ?? false,
      detached: USE_PROCESS_GROUPS,
      stdio: "pipe",
    });

    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (chunk: string) => {
      callbacks.onOutput("stdout", chunk);
    });

    proc.stderr.on("data", (chunk: string) => {
      callbacks.onOutput("stderr", chunk);
    });

    proc.stdin.on("error", (error) => {
      callbacks.onStdinError(error);
    });

    proc.on("error", (error) => {
      // Errors after a successful spawn come from kill/send and are reported by those calls
      if (proc.pid === undefined) {
        callbacks.onSpawnError(error);
      }
    });

    // "close" waits for both pipes to drain, so it doubles as the end of the output pumps
    proc.on("close", (code, signal) => {
      callbacks.onClose(code, signal);
    });

    return new NodeProcessHandle(proc);
  }
}
