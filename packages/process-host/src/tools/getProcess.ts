import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { describeProcess } from "./types.js";
import { ProcessIdSchema, ProcessSummarySchema, ResultFields } from "./schemas.js";

interface GetProcessInput {
  id: string;
}

export const registerGetProcess: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "get_process",
    {
      title: "Get process",
      description: "Status of one process: state, pid, exit code or signal, generation and timestamps.",
      inputSchema: {
        id: ProcessIdSchema,
      },
      outputSchema: {
        ...ResultFields,
        process: ProcessSummarySchema.optional(),
      },
    },
    async (input: GetProcessInput): Promise<ToolResponse> => {
      return resultToStructuredResponse(registry.get(input.id), (process) => ({
        text: describeProcess(process),
        data: { process },
      }));
    }
  );
};
