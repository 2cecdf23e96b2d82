import * as z from "zod/v4";
import { errorResponse, successResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { formatChunks } from "./types.js";
import { OutputChunkSchema, ProcessIdSchema, ResultFields, StreamSchema } from "./schemas.js";
import type { LogStream, OutputChunk } from "../core/model.js";

interface FollowOutputInput {
  id: string;
  stream?: LogStream;
  duration_ms?: number;
  max_chunks?: number;
}

const DEFAULT_DURATION = 2000;
const MAX_DURATION = 60_000;
const DEFAULT_MAX_CHUNKS = 200;

export const registerFollowOutput: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "follow_output",
    {
      title: "Follow output",
      description: `Collect live output for a while, like \`tail -f\` with a time limit.

Only output produced after the call is returned; use read_output for history.
Returns after duration_ms, after max_chunks lines, or when the process is removed.
Following spans restarts: each chunk carries its generation.`,
      inputSchema: {
        id: ProcessIdSchema,
        stream: StreamSchema.optional().describe("Only this stream (default: both)"),
        duration_ms: z
          .number()
          .int()
          .positive()
          .max(MAX_DURATION)
          .optional()
          .describe(`How long to listen (default: ${DEFAULT_DURATION})`),
        max_chunks: z.number().int().positive().optional().describe(`Stop after this many lines (default: ${DEFAULT_MAX_CHUNKS})`),
      },
      outputSchema: {
        ...ResultFields,
        chunks: z.array(OutputChunkSchema).optional(),
        dropped: z.number().optional(),
        closeReason: z.string().nullable().optional(),
      },
    },
    async (input: FollowOutputInput): Promise<ToolResponse> => {
      const maxChunks = input.max_chunks ?? DEFAULT_MAX_CHUNKS;
      const signal = AbortSignal.timeout(input.duration_ms ?? DEFAULT_DURATION);

      const subscribed = registry.subscribe(input.id, { stream: input.stream, signal });
      if (!subscribed.ok) return errorResponse(subscribed.error);
      const subscription = subscribed.value;

      const chunks: OutputChunk[] = [];
      for await (const chunk of subscription) {
        chunks.push(chunk);
        if (chunks.length >= maxChunks) break;
      }

      let closeReason: string | null = subscription.closeReason;
      if (chunks.length >= maxChunks) closeReason = "limit";
      else if (signal.aborted && closeReason === "unsubscribed") closeReason = "timeout";
      const header = `${chunks.length} line${chunks.length === 1 ? "" : "s"} (${closeReason ?? "open"})`;
      const text = chunks.length === 0 ? header : `${header}\n${formatChunks(chunks)}`;

      return successResponse(text, { chunks, dropped: subscription.dropped, closeReason });
    }
  );
};
