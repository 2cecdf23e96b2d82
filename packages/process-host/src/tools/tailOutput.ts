import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { formatChunks } from "./types.js";
import { OutputChunkSchema, ProcessIdSchema, ResultFields } from "./schemas.js";

interface TailOutputInput {
  id: string;
  n?: number;
  include_stderr?: boolean;
  prefix_timestamp?: boolean;
}

export const DEFAULT_TAIL_LINES = 50;

export const registerTailOutput: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "tail_output",
    {
      title: "Tail output",
      description: `Last n lines of the current run, stdout and stderr interleaved by time.

Use this for a quick look; use read_output to follow a stream without gaps.`,
      inputSchema: {
        id: ProcessIdSchema,
        n: z.number().int().positive().optional().describe(`Number of lines (default: ${DEFAULT_TAIL_LINES})`),
        include_stderr: z.boolean().optional().describe("Include stderr (default: true)"),
        prefix_timestamp: z.boolean().optional().describe("Prefix each line with its ISO timestamp"),
      },
      outputSchema: {
        ...ResultFields,
        chunks: z.array(OutputChunkSchema).optional(),
        text: z.string().optional(),
      },
    },
    async (input: TailOutputInput): Promise<ToolResponse> => {
      const result = registry.tail(input.id, input.n ?? DEFAULT_TAIL_LINES, input.include_stderr ?? true);

      return resultToStructuredResponse(result, (chunks) => {
        const text = formatChunks(chunks, input.prefix_timestamp ?? false);
        return { text: text === "" ? "(no output)" : text, data: { chunks, text } };
      });
    }
  );
};
