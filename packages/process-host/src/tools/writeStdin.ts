import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@procwatch/core";

import type { ToolRegistrar } from "./types.js";
import { formatRunningProcessesHint } from "./types.js";
import { ProcessIdSchema, ResultFields } from "./schemas.js";

interface WriteStdinInput {
  id: string;
  text: string;
  newline?: boolean;
}

export const registerWriteStdin: ToolRegistrar = (server, registry) => {
  server.registerTool(
    "write_stdin",
    {
      title: "Write to process stdin",
      description: `Send input to a running process's stdin.

Use cases:
- Interactive prompts: answer yes/no questions
- REPL inputs: send commands to node, python, etc.
- Any process expecting input

A newline is appended unless newline=false.`,
      inputSchema: {
        id: ProcessIdSchema,
        text: z.string().describe("Text to write"),
        newline: z.boolean().optional().describe("Append \\n (default: true)"),
      },
      outputSchema: {
        ...ResultFields,
        bytes: z.number().optional(),
      },
    },
    async (input: WriteStdinInput): Promise<ToolResponse> => {
      const newline = input.newline ?? true;
      const result = await registry.sendInput(input.id, input.text, { newline });

      return resultToStructuredResponse(result, () => {
        const bytes = Buffer.byteLength(newline ? `${input.text}\n` : input.text, "utf8");
        const lines = [`Written ${bytes} byte${bytes === 1 ? "" : "s"}`];
        const runningHint = formatRunningProcessesHint(registry, input.id);
        if (runningHint) lines.push(runningHint);
        return { text: lines.join("\n"), data: { bytes } };
      });
    }
  );
};
