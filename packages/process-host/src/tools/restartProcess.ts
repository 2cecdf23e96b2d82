import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { describeProcess } from "./types.js";
import { GraceSchema, ProcessIdSchema, ProcessSummarySchema, ResultFields } from "./schemas.js";

interface RestartProcessInput {
  id: string;
  grace_ms?: number;
}

export const registerRestartProcess: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "restart_process",
    {
      title: "Restart process",
      description: `Stop the process (if running) and start it again with the same command.

The new run is a new generation: its output starts again at sequence 1 and
earlier output is no longer readable. Subscribers of follow_output keep receiving.`,
      inputSchema: {
        id: ProcessIdSchema,
        grace_ms: GraceSchema,
      },
      outputSchema: {
        ...ResultFields,
        process: ProcessSummarySchema.optional(),
      },
    },
    async (input: RestartProcessInput): Promise<ToolResponse> => {
      const result = await registry.restart(input.id, input.grace_ms);
      return resultToStructuredResponse(result, (process) => ({
        text: `Restarted: ${describeProcess(process)}`,
        data: { process },
      }));
    }
  );
};
