import * as z from "zod/v4";
import { successResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { GraceSchema, ResultFields } from "./schemas.js";

interface StopAllInput {
  grace_ms?: number;
}

export const registerStopAllProcesses: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "stop_all_processes",
    {
      title: "Stop all processes",
      description: `Stop all running processes at once, in parallel.

Use cases:
- Clean shutdown before leaving a workspace
- Reset a development environment

Returns the ids that stopped and the ones that could not be killed.`,
      inputSchema: {
        grace_ms: GraceSchema,
      },
      outputSchema: {
        ...ResultFields,
        stopped: z.array(z.string()).optional(),
        failed: z.array(z.object({ id: z.string(), error: z.string() })).optional(),
        count: z.number().optional(),
      },
    },
    async (input: StopAllInput): Promise<ToolResponse> => {
      const result = await registry.stopAll(input.grace_ms);

      const message =
        result.stopped.length === 0 && result.failed.length === 0
          ? "No running processes to stop"
          : `Stopped ${result.stopped.length} process${result.stopped.length === 1 ? "" : "es"}${result.failed.length > 0 ? `, ${result.failed.length} failed` : ""}`;

      return successResponse(message, { ...result, count: result.stopped.length });
    }
  );
};
