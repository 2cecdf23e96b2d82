import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { ProcessIdSchema, ResultFields } from "./schemas.js";

interface RemoveProcessInput {
  id: string;
}

export const registerRemoveProcess: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "remove_process",
    {
      title: "Remove process",
      description: `Forget a process that is no longer running, along with its output.
Fails with STILL_RUNNING for a live process; stop it first.`,
      inputSchema: {
        id: ProcessIdSchema,
      },
      outputSchema: {
        ...ResultFields,
      },
    },
    async (input: RemoveProcessInput): Promise<ToolResponse> => {
      const result = await registry.remove(input.id);
      return resultToStructuredResponse(result, () => ({
        text: `Removed: ${input.id}`,
        data: {},
      }));
    }
  );
};
