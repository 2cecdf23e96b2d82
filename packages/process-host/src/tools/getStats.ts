import * as z from "zod/v4";
import { successResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { ResultFields } from "./schemas.js";

export const registerGetStats: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "get_stats",
    {
      title: "Get process statistics",
      description: `Counts of tracked processes by state:
- created: registered with start=false, never launched
- pending: spawn in progress
- running: currently active
- exited: ended on their own, whatever the exit code
- failed: could not be spawned, or lost their stdin
- stopped: terminated through stop_process/restart_process`,
      inputSchema: {},
      outputSchema: {
        ...ResultFields,
        total: z.number().optional(),
        created: z.number().optional(),
        pending: z.number().optional(),
        running: z.number().optional(),
        exited: z.number().optional(),
        failed: z.number().optional(),
        stopped: z.number().optional(),
      },
    },
    async (): Promise<ToolResponse> => {
      const stats = registry.getStats();

      const message = [
        `Total: ${stats.total}`,
        `Created: ${stats.created}`,
        `Pending: ${stats.pending}`,
        `Running: ${stats.running}`,
        `Exited: ${stats.exited}`,
        `Failed: ${stats.failed}`,
        `Stopped: ${stats.stopped}`,
      ].join("\n");

      return successResponse(message, { ...stats });
    }
  );
};
