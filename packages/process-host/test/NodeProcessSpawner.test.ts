import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { ProcessRegistry } from "../src/core/services/ProcessRegistry.js";
import { NodeProcessSpawner } from "../src/infrastructure/runner/NodeProcessSpawner.js";
import { isPidAlive } from "../src/infrastructure/runner/processUtils.js";
import type { ProcessStatus, ProcessSummary } from "../src/core/model.js";

describe.skipIf(process.platform === "win32")("NodeProcessSpawner (real processes)", () => {
  let registry: ProcessRegistry;

  beforeEach(() => {
    registry = new ProcessRegistry({
      spawner: new NodeProcessSpawner(),
      config: { partialLineFlushMs: 20, forceKillWaitMillis: 2000 },
    });
  });

  afterEach(async () => {
    await registry.shutdown(0);
  });

  function summary(id: string): ProcessSummary {
    const found = registry.get(id);
    if (!found.ok) throw found.error;
    return found.value;
  }

  async function waitForStatus(id: string, status: ProcessStatus): Promise<ProcessSummary> {
    await vi.waitFor(() => expect(summary(id).status).toBe(status), { timeout: 5000, interval: 10 });
    return summary(id);
  }

  function stdout(id: string): string[] {
    const page = registry.readOutput(id, "stdout", 0);
    if (!page.ok) throw page.error;
    return page.value.chunks.map((c) => c.text);
  }

  it("records output and exit of a short command", async () => {
    await registry.start("echo1", { command: "sh", args: ["-c", "echo hello"] });

    const done = await waitForStatus("echo1", "exited");
    expect(done.exitCode).toBe(0);
    expect([...registry.list()].map((p) => [p.id, p.status, p.exitCode])).toEqual([["echo1", "exited", 0]]);

    const page = registry.readOutput("echo1", "stdout", 0);
    expect(page.ok && page.value.chunks.map((c) => [c.sequence, c.text])).toEqual([[1, "hello\n"]]);
  });

  it("splits output into lines", async () => {
    await registry.start("lines", { command: "sh", args: ["-c", "echo hello; echo world"] });

    await waitForStatus("lines", "exited");
    expect(stdout("lines")).toEqual(["hello\n", "world\n"]);

    const page = registry.readOutput("lines", "stdout", 0);
    expect(page.ok && [page.value.floorSequence, page.value.latestSequence]).toEqual([0, 2]);
  });

  it("records a nonzero exit as exited", async () => {
    await registry.start("fails", { command: "sh", args: ["-c", "echo oops >&2; exit 3"] });

    const done = await waitForStatus("fails", "exited");
    expect(done.exitCode).toBe(3);
    const page = registry.readOutput("fails", "stderr", 0);
    expect(page.ok && page.value.chunks.map((c) => c.text)).toEqual(["oops\n"]);
  });

  it("keeps a trailing partial line", async () => {
    await registry.start("partial", { command: "sh", args: ["-c", "printf 'no newline'"] });
    await waitForStatus("partial", "exited");
    expect(stdout("partial")).toEqual(["no newline"]);
  });

  it("passes environment overrides", async () => {
    await registry.start("env", {
      command: "sh",
      args: ["-c", 'echo "$GREETING"'],
      env: { GREETING: "hi there" },
    });
    await waitForStatus("env", "exited");
    expect(stdout("env")).toEqual(["hi there\n"]);
  });

  it("fails a command that cannot be spawned", async () => {
    await registry.start("missing", { command: "procwatch-no-such-binary", args: [] });

    const done = await waitForStatus("missing", "failed");
    expect(done.reason).toMatch(/^spawn failed: .*ENOENT/);
    expect(done.pid).toBeNull();
  });

  it("kills a process that ignores SIGTERM once the grace period ends", async () => {
    await registry.start("stubborn", {
      command: 'trap "" TERM; echo ready; while true; do sleep 0.05; done',
      args: [],
      shell: true,
    });
    const ready = await registry.waitForOutput("stubborn", "ready", { timeoutMs: 5000 });
    expect(ready.ok).toBe(true);
    const pid = summary("stubborn").pid;
    if (pid === null) throw new Error("no pid");

    const result = await registry.stop("stubborn", 50);

    expect(result.ok).toBe(true);
    expect(summary("stubborn")).toMatchObject({ status: "stopped", signal: "SIGKILL" });
    expect(isPidAlive(pid)).toBe(false);
  });

  it("round-trips stdin", async () => {
    await registry.start("cat", { command: "cat", args: [] });

    const sent = await registry.sendInput("cat", "ping");
    expect(sent.ok).toBe(true);
    const echoed = await registry.waitForOutput("cat", "^ping", { timeoutMs: 5000 });
    expect(echoed.ok && echoed.value.text).toBe("ping\n");
  });

  it("refuses input once the process has exited", async () => {
    await registry.start("quick", { command: "sh", args: ["-c", "exit 0"] });
    await waitForStatus("quick", "exited");

    const sent = await registry.sendInput("quick", "late");
    expect(!sent.ok && sent.error.code).toBe("NOT_RUNNING");
  });

  it("restarts with fresh sequences", async () => {
    await registry.start("loop", { command: "sh", args: ["-c", "echo started; sleep 30"] });
    await registry.waitForOutput("loop", "started", { timeoutMs: 5000 });

    const restarted = await registry.restart("loop", 1000);
    expect(restarted.ok && restarted.value.generation).toBe(2);
    const again = await registry.waitForOutput("loop", "started", { timeoutMs: 5000 });

    expect(again.ok && [again.value.sequence, again.value.generation]).toEqual([1, 2]);
  });
});
