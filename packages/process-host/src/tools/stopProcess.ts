import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { describeProcess } from "./types.js";
import { GraceSchema, ProcessIdSchema, ProcessSummarySchema, ResultFields } from "./schemas.js";

interface StopProcessInput {
  id: string;
  grace_ms?: number;
}

export const registerStopProcess: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "stop_process",
    {
      title: "Stop process",
      description: `Stop a running process: SIGTERM, then SIGKILL once grace_ms has passed.
The whole process group is signalled, so children started by a shell go too.
Stopping a process that is not running is a no-op.`,
      inputSchema: {
        id: ProcessIdSchema,
        grace_ms: GraceSchema,
      },
      outputSchema: {
        ...ResultFields,
        process: ProcessSummarySchema.optional(),
      },
    },
    async (input: StopProcessInput): Promise<ToolResponse> => {
      const result = await registry.stop(input.id, input.grace_ms);
      return resultToStructuredResponse(result, (process) => ({
        text: `Stopped: ${describeProcess(process)}`,
        data: { process },
      }));
    }
  );
};
