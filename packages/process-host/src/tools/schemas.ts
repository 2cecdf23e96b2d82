import * as z from "zod/v4";

import { MAX_TIMER_MILLIS } from "../core/config.js";

export const ProcessStatusSchema = z.enum(["created", "pending", "running", "exited", "failed", "stopped"]);

export const StreamSchema = z.enum(["stdout", "stderr"]);

export const ProcessIdSchema = z
  .string()
  .regex(/^[\w-]+$/, "Use letters, digits, '_' or '-'")
  .describe("Process id chosen by the caller (letters, digits, '_' or '-')");

export const GraceSchema = z
  .number()
  .int()
  .nonnegative()
  .max(MAX_TIMER_MILLIS)
  .optional()
  .describe("Milliseconds between SIGTERM and SIGKILL (default: server setting)");

export const ProcessSummarySchema = z.object({
  id: z.string(),
  label: z.string().optional(),
  command: z.string(),
  args: z.array(z.string()),
  status: ProcessStatusSchema,
  pid: z.number().nullable(),
  exitCode: z.number().nullable(),
  signal: z.string().nullable(),
  reason: z.string().optional(),
  generation: z.number(),
  startedAt: z.string().nullable(),
  endedAt: z.string().nullable(),
});

export const OutputChunkSchema = z.object({
  stream: StreamSchema,
  sequence: z.number(),
  generation: z.number(),
  text: z.string(),
  timestamp: z.string(),
});

/**
 * Fields every tool reports, so error payloads validate against any output schema.
 */
export const ResultFields = {
  success: z.boolean(),
  error: z.string().optional(),
  code: z.string().optional(),
};
