import * as z from "zod/v4";
import { resultToStructuredResponse, type Result, type ToolResponse } from "@procwatch/core";

import type { AlreadyExistsError, AlreadyRunningError, InvalidSpecError, ShutdownError } from "../core/errors.js";
import type { ProcessSummary } from "../core/model.js";

import type { ToolRegistrar } from "./types.js";
import { describeProcess, formatRunningProcessesHint } from "./types.js";
import { ProcessIdSchema, ProcessSummarySchema, ResultFields } from "./schemas.js";

interface StartProcessInput {
  id: string;
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  shell?: boolean;
  label?: string;
  start?: boolean;
}

export const registerStartProcess: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "start_process",
    {
      title: "Start process",
      description: `Start a long-running command under the given id. Returns immediately.

Use cases:
- Dev servers: command="npm", args=["run", "dev"]
- Build watchers: command="tsc", args=["--watch"]
- Shell pipelines: command="make build 2>&1 | tee build.log", shell=true

Starting an id whose previous run has ended starts a new generation and replaces its command.
With start=false the id is only registered (status "created"); launch it later with launch_process.
Use read_output or tail_output to check output, stop_process to terminate.`,
      inputSchema: {
        id: ProcessIdSchema,
        command: z.string().min(1).describe("Executable, or a full command line when shell=true"),
        args: z.array(z.string()).optional().describe("Arguments passed as-is (no shell parsing)"),
        cwd: z.string().optional().describe("Working directory"),
        env: z.record(z.string(), z.string()).optional().describe("Environment variables to set/override"),
        shell: z.boolean().optional().describe("Run through the system shell (default: false)"),
        label: z.string().optional().describe("Human-readable label for easy identification"),
        start: z.boolean().optional().describe("Launch right away (default: true)"),
      },
      outputSchema: {
        ...ResultFields,
        process: ProcessSummarySchema.optional(),
      },
    },
    async (input: StartProcessInput): Promise<ToolResponse> => {
      const spec = {
        command: input.command,
        args: input.args ?? [],
        cwd: input.cwd,
        env: input.env,
        shell: input.shell,
        label: input.label,
      };
      const launch = input.start ?? true;
      const result: Result<ProcessSummary, AlreadyRunningError | AlreadyExistsError | InvalidSpecError | ShutdownError> = launch
        ? await registry.start(input.id, spec)
        : await registry.create(input.id, spec);

      return resultToStructuredResponse(result, (process) => {
        const lines = [`${launch ? "Started" : "Registered"}: ${describeProcess(process)}`];
        const runningHint = formatRunningProcessesHint(registry, process.id);
        if (runningHint) lines.push(runningHint);
        return { text: lines.join("\n"), data: { process } };
      });
    }
  );
};
