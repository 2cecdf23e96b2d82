import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { formatChunks } from "./types.js";
import { OutputChunkSchema, ProcessIdSchema, ResultFields, StreamSchema } from "./schemas.js";
import type { LogStream } from "../core/model.js";

interface ReadOutputInput {
  id: string;
  stream?: LogStream;
  since?: number;
  limit?: number;
}

export const registerReadOutput: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "read_output",
    {
      title: "Read output",
      description: `Read one stream of the current run, starting after a sequence number.

Poll incrementally: pass the returned latestSequence as the next since.
If the requested range was already evicted the call fails with TRUNCATED and
names the oldest readable position; continue from there or use tail_output.`,
      inputSchema: {
        id: ProcessIdSchema,
        stream: StreamSchema.optional().describe("Which stream (default: stdout)"),
        since: z.number().int().nonnegative().optional().describe("Return chunks after this sequence (default: 0)"),
        limit: z.number().int().positive().optional().describe("Maximum number of chunks"),
      },
      outputSchema: {
        ...ResultFields,
        chunks: z.array(OutputChunkSchema).optional(),
        floorSequence: z.number().optional(),
        latestSequence: z.number().optional(),
        generation: z.number().optional(),
      },
    },
    async (input: ReadOutputInput): Promise<ToolResponse> => {
      const result = registry.readOutput(input.id, input.stream ?? "stdout", input.since ?? 0, input.limit);

      return resultToStructuredResponse(result, (page) => ({
        text: page.chunks.length === 0 ? "(no new output)" : formatChunks(page.chunks),
        data: { ...page },
      }));
    }
  );
};
