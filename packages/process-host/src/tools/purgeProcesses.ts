import * as z from "zod/v4";
import { successResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { ResultFields } from "./schemas.js";

export const registerPurgeProcesses: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "purge_processes",
    {
      title: "Purge processes",
      description: "Remove every process that has exited, failed or been stopped. Running processes and ones never launched are kept.",
      inputSchema: {},
      outputSchema: {
        ...ResultFields,
        removed: z.array(z.string()).optional(),
      },
    },
    async (): Promise<ToolResponse> => {
      const removed = await registry.purge();
      const text =
        removed.length === 0
          ? "Nothing to purge"
          : `Purged ${removed.length} process${removed.length === 1 ? "" : "es"}: ${removed.join(", ")}`;
      return successResponse(text, { removed });
    }
  );
};
