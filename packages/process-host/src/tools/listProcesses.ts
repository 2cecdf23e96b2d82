import * as z from "zod/v4";
import { successResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { describeProcess } from "./types.js";
import { ProcessStatusSchema, ProcessSummarySchema, ResultFields } from "./schemas.js";
import type { ProcessStatus } from "../core/model.js";

interface ListProcessesInput {
  status?: ProcessStatus;
}

export const registerListProcesses: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "list_processes",
    {
      title: "List processes",
      description: `List every known process id, finished ones included, until removed.

Use status="running" to see only active processes you can interact with.`,
      inputSchema: {
        status: ProcessStatusSchema.optional().describe("Only show processes in this state"),
      },
      outputSchema: {
        ...ResultFields,
        processes: z.array(ProcessSummarySchema).optional(),
      },
    },
    async (input: ListProcessesInput): Promise<ToolResponse> => {
      const processes = [...registry.list()].filter((p) => input.status === undefined || p.status === input.status);

      const text = processes.length === 0 ? "No processes" : processes.map(describeProcess).join("\n");

      return successResponse(text, { processes });
    }
  );
};
