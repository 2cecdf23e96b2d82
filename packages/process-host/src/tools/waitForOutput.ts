import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { formatRunningProcessesHint } from "./types.js";
import { OutputChunkSchema, ProcessIdSchema, ResultFields, StreamSchema } from "./schemas.js";
import { MAX_TIMER_MILLIS } from "../core/config.js";
import { DEFAULT_WAIT_TIMEOUT } from "../core/services/ProcessRegistry.js";
import type { LogStream } from "../core/model.js";

interface WaitForOutputInput {
  id: string;
  pattern: string;
  timeout_ms?: number;
  stream?: LogStream;
}

export const registerWaitForOutput: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "wait_for_output",
    {
      title: "Wait for output pattern",
      description: `Block until a line of the current run matches a pattern. Essential for knowing when servers are ready.

Examples:
- Wait for server: pattern="listening on port \\d+"
- Wait for build: pattern="compiled successfully"
- Wait for ready: pattern="ready|started|listening"

Returns immediately if a retained line already matches. Fails with TIMEOUT after
timeout_ms (default: ${DEFAULT_WAIT_TIMEOUT / 1000}s), or NOT_RUNNING if the process ends first.`,
      inputSchema: {
        id: ProcessIdSchema,
        pattern: z.string().min(1).describe("Regex pattern to wait for"),
        timeout_ms: z.number().int().positive().max(MAX_TIMER_MILLIS).optional().describe("Timeout in milliseconds"),
        stream: StreamSchema.optional().describe("Only match this stream (default: both)"),
      },
      outputSchema: {
        ...ResultFields,
        match: OutputChunkSchema.optional(),
      },
    },
    async (input: WaitForOutputInput): Promise<ToolResponse> => {
      const result = await registry.waitForOutput(input.id, input.pattern, {
        timeoutMs: input.timeout_ms,
        stream: input.stream,
      });

      return resultToStructuredResponse(result, (match) => {
        const lines = [`Matched: ${match.text.trimEnd()}`];
        const runningHint = formatRunningProcessesHint(registry, input.id);
        if (runningHint) lines.push(runningHint);
        return { text: lines.join("\n"), data: { match } };
      });
    }
  );
};
