import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { describeProcess, formatRunningProcessesHint } from "./types.js";
import { ProcessIdSchema, ProcessSummarySchema, ResultFields } from "./schemas.js";

interface LaunchProcessInput {
  id: string;
}

export const registerLaunchProcess: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "launch_process",
    {
      title: "Launch process",
      description: `Launch a registered process with its stored command.

Meant for ids created with start_process start=false, but any id that is not running can be launched.
Fails with ALREADY_RUNNING while a run is in progress.`,
      inputSchema: {
        id: ProcessIdSchema,
      },
      outputSchema: {
        ...ResultFields,
        process: ProcessSummarySchema.optional(),
      },
    },
    async (input: LaunchProcessInput): Promise<ToolResponse> => {
      const result = await registry.launch(input.id);

      return resultToStructuredResponse(result, (process) => {
        const lines = [`Started: ${describeProcess(process)}`];
        const runningHint = formatRunningProcessesHint(registry, process.id);
        if (runningHint) lines.push(runningHint);
        return { text: lines.join("\n"), data: { process } };
      });
    }
  );
};
