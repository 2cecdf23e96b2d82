import fc from "fast-check";
import { describe, it, expect, beforeEach } from "vitest";

import { ProcessRegistry } from "../src/core/services/ProcessRegistry.js";
import { FakeProcessSpawner, type FakeProcess } from "../src/infrastructure/memory/FakeProcessSpawner.js";
import type { LaunchSpec } from "../src/core/model.js";

const spec: LaunchSpec = { command: "server", args: [] };

function lastProcess(spawner: FakeProcessSpawner): FakeProcess {
  const proc = spawner.last;
  if (!proc) throw new Error("nothing spawned");
  return proc;
}

describe("ProcessRegistry", () => {
  let spawner: FakeProcessSpawner;
  let registry: ProcessRegistry;

  beforeEach(() => {
    spawner = new FakeProcessSpawner();
    registry = new ProcessRegistry({
      spawner,
      config: { forceKillWaitMillis: 50, partialLineFlushMs: 20, defaultGraceMillis: 100 },
    });
  });

  describe("start", () => {
    it("registers and starts a process", async () => {
      const result = await registry.start("web", { command: "server", args: ["-v"], label: "Web" });

      expect(result.ok).toBe(true);
      const found = registry.get("web");
      expect(found.ok && found.value).toMatchObject({ id: "web", label: "Web", status: "running", generation: 1 });
    });

    it("rejects ids outside letters, digits, '_' and '-'", async () => {
      const result = await registry.start("web server", spec);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("INVALID_SPEC");
      expect(registry.has("web server")).toBe(false);
    });

    it("rejects an empty command", async () => {
      const result = await registry.start("web", { command: "  ", args: [] });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("INVALID_SPEC");
      expect(result.error.message).toBe("Empty command");
    });

    it("refuses a second start while running", async () => {
      await registry.start("web", spec);
      const again = await registry.start("web", spec);
      expect(again.ok).toBe(false);
      if (again.ok) return;
      expect(again.error.code).toBe("ALREADY_RUNNING");
      expect(spawner.spawned).toHaveLength(1);
    });

    it("replaces the record of a finished process", async () => {
      await registry.start("web", spec);
      lastProcess(spawner).exit(0);

      const result = await registry.start("web", { command: "server2", args: ["--fast"] });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({ command: "server2", args: ["--fast"], generation: 2 });
    });

    it("copies the spec", async () => {
      const args = ["a"];
      await registry.start("web", { command: "server", args });
      args.push("b");
      const found = registry.get("web");
      expect(found.ok && found.value.args).toEqual(["a"]);
    });
  });

  describe("stop / restart", () => {
    it("stops a running process", async () => {
      await registry.start("web", spec);
      const result = await registry.stop("web");
      expect(result.ok && result.value.status).toBe("stopped");
    });

    it("reports unknown ids", async () => {
      const stop = await registry.stop("ghost");
      const restart = await registry.restart("ghost");
      expect(!stop.ok && stop.error.code).toBe("NOT_FOUND");
      expect(!restart.ok && restart.error.code).toBe("NOT_FOUND");
    });

    it("rejects a negative grace period", async () => {
      await registry.start("web", spec);
      const result = await registry.stop("web", -1);
      expect(!result.ok && result.error.code).toBe("INVALID_SPEC");
    });

    it("rejects a grace period setTimeout cannot honour", async () => {
      spawner.queue({ ignoreSignals: ["SIGTERM"] });
      await registry.start("stubborn", spec);

      const stop = await registry.stop("stubborn", 2 ** 31);
      const restart = await registry.restart("stubborn", 2 ** 31);
      expect(!stop.ok && stop.error.code).toBe("INVALID_SPEC");
      expect(!restart.ok && restart.error.code).toBe("INVALID_SPEC");
      expect(lastProcess(spawner).signals).toEqual([]);
    });

    it("keeps subscriptions across a restart", async () => {
      await registry.start("web", spec);
      const sub = registry.subscribe("web");
      if (!sub.ok) throw sub.error;

      await registry.restart("web");
      lastProcess(spawner).emit("stdout", "again\n");

      const next = await sub.value.next();
      expect(next.done).toBe(false);
      if (next.done) return;
      expect(next.value).toMatchObject({ generation: 2, sequence: 1, text: "again\n" });
    });

    it("runs commands for one id in call order", async () => {
      const calls = [
        registry.start("web", spec),
        registry.stop("web"),
        registry.start("web", spec),
        registry.restart("web"),
      ];
      const results = await Promise.all(calls);

      expect(results.map((r) => r.ok)).toEqual([true, true, true, true]);
      const found = registry.get("web");
      expect(found.ok && found.value).toMatchObject({ status: "running", generation: 3 });
      expect(spawner.spawned.filter((p) => !p.isClosed)).toHaveLength(1);
    });

    it("behaves like a sequential model under concurrent commands", async () => {
      type Command = "start" | "stop" | "restart";

      await fc.assert(
        fc.asyncProperty(
          fc.array(fc.constantFrom<Command>("start", "stop", "restart"), { minLength: 1, maxLength: 12 }),
          async (commands) => {
            const localSpawner = new FakeProcessSpawner();
            const local = new ProcessRegistry({
              spawner: localSpawner,
              config: { forceKillWaitMillis: 50, defaultGraceMillis: 100 },
            });

            const model = { exists: false, running: false, spawns: 0 };
            const expected: string[] = [];
            for (const command of commands) {
              if (command === "start") {
                if (model.running) {
                  expected.push("ALREADY_RUNNING");
                } else {
                  model.exists = true;
                  model.running = true;
                  model.spawns++;
                  expected.push("ok");
                }
              } else if (!model.exists) {
                expected.push("NOT_FOUND");
              } else if (command === "stop") {
                model.running = false;
                expected.push("ok");
              } else {
                model.running = true;
                model.spawns++;
                expected.push("ok");
              }
            }

            const results = await Promise.all(
              commands.map((command) => {
                if (command === "start") return local.start("svc", spec);
                if (command === "stop") return local.stop("svc");
                return local.restart("svc");
              })
            );

            expect(results.map((r) => (r.ok ? "ok" : r.error.code))).toEqual(expected);
            expect(localSpawner.spawned).toHaveLength(model.spawns);
            expect(localSpawner.spawned.filter((p) => !p.isClosed)).toHaveLength(model.running ? 1 : 0);
            if (model.exists) {
              const found = local.get("svc");
              expect(found.ok && found.value.status === "running").toBe(model.running);
            }

            await local.shutdown(0);
          }
        ),
        { numRuns: 40 }
      );
    });
  });

  describe("list / get", () => {
    it("lists every id including finished ones", async () => {
      await registry.start("a", spec);
      await registry.start("b", spec);
      lastProcess(spawner).exit(1);

      const listed = [...registry.list()].map((p) => [p.id, p.status]);
      expect(listed).toEqual([
        ["a", "running"],
        ["b", "exited"],
      ]);
    });

    it("lists the ids present when called", async () => {
      await registry.start("a", spec);
      const iterator = registry.list();
      await registry.start("b", spec);

      expect([...iterator].map((p) => p.id)).toEqual(["a"]);
    });

    it("reports unknown ids", () => {
      const found = registry.get("ghost");
      expect(!found.ok && found.error.message).toBe("Process not found: ghost");
    });
  });

  describe("remove / purge", () => {
    it("refuses to remove a running process", async () => {
      await registry.start("web", spec);
      const result = await registry.remove("web");
      expect(!result.ok && result.error.code).toBe("STILL_RUNNING");
    });

    it("removes a finished process and closes its subscriptions", async () => {
      await registry.start("web", spec);
      const sub = registry.subscribe("web");
      if (!sub.ok) throw sub.error;
      lastProcess(spawner).exit(0);

      const result = await registry.remove("web");
      expect(result.ok).toBe(true);
      expect(registry.has("web")).toBe(false);
      expect(sub.value.closeReason).toBe("removed");
    });

    it("purges everything that is not live", async () => {
      await registry.start("a", spec);
      await registry.start("b", spec);
      lastProcess(spawner).exit(0);
      await registry.start("c", spec);
      await registry.stop("c");

      expect(await registry.purge()).toEqual(["b", "c"]);
      expect([...registry.list()].map((p) => p.id)).toEqual(["a"]);
    });
  });

  describe("output", () => {
    it("reads a stream after a sequence", async () => {
      await registry.start("web", spec);
      const proc = lastProcess(spawner);
      proc.emit("stdout", "1\n2\n3\n");

      const page = registry.readOutput("web", "stdout", 1, 1);
      expect(page.ok && page.value.chunks.map((c) => c.text)).toEqual(["2\n"]);
    });

    it("keeps every line readable while a subscriber lags", async () => {
      await registry.start("web", spec);
      const sub = registry.subscribe("web", { queueDepth: 1, overflowPolicy: "disconnect" });
      if (!sub.ok) throw sub.error;

      lastProcess(spawner).emit("stdout", "1\n2\n3\n4\n5\n");

      expect(sub.value.closeReason).toBe("overflow");
      const page = registry.readOutput("web", "stdout", 0);
      expect(page.ok && page.value.chunks.map((c) => c.sequence)).toEqual([1, 2, 3, 4, 5]);
    });

    it("rejects a negative sequence", async () => {
      await registry.start("web", spec);
      const page = registry.readOutput("web", "stdout", -1);
      expect(!page.ok && page.error.code).toBe("INVALID_SPEC");
    });

    it("tails", async () => {
      await registry.start("web", spec);
      lastProcess(spawner).emit("stdout", "1\n2\n3\n");
      const tail = registry.tail("web", 2, false);
      expect(tail.ok && tail.value.map((c) => c.text)).toEqual(["2\n", "3\n"]);
    });

    it("appends a newline to input unless told not to", async () => {
      await registry.start("web", spec);
      await registry.sendInput("web", "yes");
      await registry.sendInput("web", "raw", { newline: false });
      expect(lastProcess(spawner).written).toEqual(["yes\n", "raw"]);
    });

    it("refuses subscriptions for unknown ids", () => {
      const sub = registry.subscribe("ghost");
      expect(!sub.ok && sub.error.code).toBe("NOT_FOUND");
    });
  });

  describe("waitForOutput", () => {
    it("finds a line that was already printed", async () => {
      await registry.start("web", spec);
      lastProcess(spawner).emit("stdout", "booting\nlistening on 3000\n");

      const result = await registry.waitForOutput("web", "listening on \\d+");
      expect(result.ok && result.value.text).toBe("listening on 3000\n");
    });

    it("waits for a line printed later", async () => {
      await registry.start("web", spec);
      const pending = registry.waitForOutput("web", /READY/i);
      lastProcess(spawner).emit("stderr", "not yet\nready!\n");

      const result = await pending;
      expect(result.ok && [result.value.stream, result.value.text]).toEqual(["stderr", "ready!\n"]);
    });

    it("only matches the requested stream", async () => {
      await registry.start("web", spec);
      lastProcess(spawner).emit("stderr", "ready\n");
      const result = await registry.waitForOutput("web", "ready", { stream: "stdout", timeoutMs: 20 });
      expect(!result.ok && result.error.code).toBe("TIMEOUT");
    });

    it("times out", async () => {
      await registry.start("web", spec);
      const result = await registry.waitForOutput("web", "ready", { timeoutMs: 20 });
      expect(!result.ok && result.error.message).toBe("Timed out after 20ms waiting for ready");
      expect(registry.subscriberCount("web")).toBe(0);
    });

    it("gives up when the process ends", async () => {
      await registry.start("web", spec);
      const pending = registry.waitForOutput("web", "ready", { timeoutMs: 5000 });
      lastProcess(spawner).exit(1);

      const result = await pending;
      expect(!result.ok && result.error.message).toBe("Process not running: web (exited)");
    });

    it("finds a match even when a burst overflows the live queue", async () => {
      await registry.start("web", spec);
      const pending = registry.waitForOutput("web", "^ready", { timeoutMs: 1000 });
      const filler = Array.from({ length: 300 }, (_, i) => `line ${i}\n`).join("");
      lastProcess(spawner).emit("stdout", `a\nb\nc\nready\n${filler}`);

      const result = await pending;
      expect(result.ok && [result.value.sequence, result.value.text]).toEqual([4, "ready\n"]);
    });

    it("rejects a timeout setTimeout cannot honour", async () => {
      await registry.start("web", spec);
      const result = await registry.waitForOutput("web", "ready", { timeoutMs: 2 ** 31 });
      expect(!result.ok && result.error.code).toBe("INVALID_SPEC");
      expect(registry.subscriberCount("web")).toBe(0);
    });

    it("rejects an invalid pattern", async () => {
      await registry.start("web", spec);
      const result = await registry.waitForOutput("web", "(");
      expect(!result.ok && result.error.code).toBe("INVALID_SPEC");
    });
  });

  describe("create / launch", () => {
    it("registers a process without launching it", async () => {
      const created = await registry.create("web", spec);

      expect(created.ok && created.value).toMatchObject({
        id: "web",
        status: "created",
        pid: null,
        generation: 0,
        startedAt: null,
      });
      expect(spawner.spawned).toHaveLength(0);
      expect([...registry.list()].map((p) => [p.id, p.status])).toEqual([["web", "created"]]);
      expect(registry.getStats()).toMatchObject({ total: 1, created: 1, running: 0 });
    });

    it("launches the stored launch spec", async () => {
      await registry.create("web", { command: "server", args: ["-v"] });
      const launched = await registry.launch("web");

      expect(launched.ok && launched.value).toMatchObject({ status: "running", pid: 4000, generation: 1 });
      expect(lastProcess(spawner).params.args).toEqual(["-v"]);

      const again = await registry.launch("web");
      expect(!again.ok && again.error.code).toBe("ALREADY_RUNNING");
    });

    it("refuses to create an id that exists", async () => {
      await registry.create("web", spec);
      const again = await registry.create("web", spec);
      expect(!again.ok && again.error.code).toBe("ALREADY_EXISTS");
    });

    it("reports unknown ids on launch", async () => {
      const result = await registry.launch("ghost");
      expect(!result.ok && result.error.code).toBe("NOT_FOUND");
    });

    it("validates the spec before registering", async () => {
      const result = await registry.create("web", { command: "", args: [] });
      expect(!result.ok && result.error.code).toBe("INVALID_SPEC");
      expect(registry.has("web")).toBe(false);
    });

    it("keeps never-launched records on purge", async () => {
      await registry.create("idle", spec);
      await registry.start("job", spec);
      lastProcess(spawner).exit(0);

      expect(await registry.purge()).toEqual(["job"]);
      expect(registry.has("idle")).toBe(true);

      const removed = await registry.remove("idle");
      expect(removed.ok).toBe(true);
    });
  });

  describe("stopAll / stats / shutdown", () => {
    it("stops every running process", async () => {
      await registry.start("a", spec);
      await registry.start("b", spec);
      await registry.start("c", spec);
      lastProcess(spawner).exit(0);

      const result = await registry.stopAll();
      expect(result).toEqual({ stopped: ["a", "b"], failed: [] });
    });

    it("reports processes that could not be stopped", async () => {
      spawner.queue({ killError: new Error("EPERM") });
      await registry.start("stuck", spec);

      const result = await registry.stopAll();
      expect(result).toEqual({
        stopped: [],
        failed: [{ id: "stuck", error: "Failed to kill process stuck: EPERM" }],
      });
    });

    it("counts processes by state", async () => {
      await registry.start("a", spec);
      await registry.start("b", spec);
      lastProcess(spawner).exit(2);
      await registry.start("c", spec);
      await registry.stop("c");

      expect(registry.getStats()).toEqual({ total: 3, created: 0, pending: 0, running: 1, exited: 1, failed: 0, stopped: 1 });
    });

    it("waits for spawns still in flight on shutdown", async () => {
      spawner.queue({ spawnError: new Error("spawn server ENOENT"), spawnErrorDelayMs: 20 });
      await registry.start("web", spec);
      expect(registry.get("web")).toMatchObject({ ok: true, value: { status: "pending" } });

      const result = await registry.shutdown(1000);
      expect(result).toEqual({ stopped: ["web"], failed: [] });
    });

    it("refuses new work after shutdown", async () => {
      await registry.start("web", spec);
      const sub = registry.subscribe("web");
      if (!sub.ok) throw sub.error;

      const result = await registry.shutdown();
      expect(result.stopped).toEqual(["web"]);
      expect(sub.value.closeReason).toBe("shutdown");
      expect([...registry.list()]).toEqual([]);

      const start = await registry.start("web", spec);
      expect(!start.ok && start.error.code).toBe("SHUTDOWN");
    });
  });
});
