import * as z from "zod/v4";
import { Err, LOG_LEVELS, Ok, type LogLevel, type Result } from "@procwatch/core";

import type { OverflowPolicy } from "./model.js";

export interface SupervisorConfig {
  /** Retained output per stream per generation before the oldest chunks are evicted */
  maxBufferBytesPerStream: number;
  /** SIGTERM -> SIGKILL grace period used when a stop/restart names none */
  defaultGraceMillis: number;
  /** How long to wait for the process to close after SIGKILL */
  forceKillWaitMillis: number;
  subscriberQueueDepth: number;
  overflowPolicy: OverflowPolicy;
  /** A partial line longer than this is flushed as its own chunk */
  maxLineBytes: number;
  /** A partial line is flushed after this much silence on its stream */
  partialLineFlushMs: number;
}

export const DEFAULT_CONFIG: SupervisorConfig = {
  maxBufferBytesPerStream: 1024 * 1024, // 1MB
  defaultGraceMillis: 5000,
  forceKillWaitMillis: 2000,
  subscriberQueueDepth: 256,
  overflowPolicy: "drop-oldest",
  maxLineBytes: 64 * 1024,
  partialLineFlushMs: 100,
};

/** Longest delay setTimeout honours; anything above fires after 1ms */
export const MAX_TIMER_MILLIS = 2_147_483_647;

export const OverflowPolicySchema = z.enum(["drop-oldest", "disconnect"]);

const positiveInt = z.coerce.number().int().positive();
const timerMillis = z.coerce.number().int().nonnegative().max(MAX_TIMER_MILLIS);

const EnvSchema = z.object({
  PROCWATCH_MAX_BUFFER_BYTES: positiveInt.optional(),
  PROCWATCH_GRACE_MS: timerMillis.optional(),
  PROCWATCH_FORCE_KILL_WAIT_MS: timerMillis.optional(),
  PROCWATCH_SUBSCRIBER_QUEUE_DEPTH: positiveInt.optional(),
  PROCWATCH_OVERFLOW_POLICY: OverflowPolicySchema.optional(),
  PROCWATCH_MAX_LINE_BYTES: positiveInt.optional(),
  PROCWATCH_PARTIAL_LINE_FLUSH_MS: timerMillis.optional(),
  PROCWATCH_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface LoadedConfig {
  supervisor: SupervisorConfig;
  logLevel: LogLevel;
}

/**
 * Read supervisor settings from the environment.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<LoadedConfig, string> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("PROCWATCH_") && value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return Ok({
    supervisor: {
      maxBufferBytesPerStream: vars.PROCWATCH_MAX_BUFFER_BYTES ?? DEFAULT_CONFIG.maxBufferBytesPerStream,
      defaultGraceMillis: vars.PROCWATCH_GRACE_MS ?? DEFAULT_CONFIG.defaultGraceMillis,
      forceKillWaitMillis: vars.PROCWATCH_FORCE_KILL_WAIT_MS ?? DEFAULT_CONFIG.forceKillWaitMillis,
      subscriberQueueDepth: vars.PROCWATCH_SUBSCRIBER_QUEUE_DEPTH ?? DEFAULT_CONFIG.subscriberQueueDepth,
      overflowPolicy: vars.PROCWATCH_OVERFLOW_POLICY ?? DEFAULT_CONFIG.overflowPolicy,
      maxLineBytes: vars.PROCWATCH_MAX_LINE_BYTES ?? DEFAULT_CONFIG.maxLineBytes,
      partialLineFlushMs: vars.PROCWATCH_PARTIAL_LINE_FLUSH_MS ?? DEFAULT_CONFIG.partialLineFlushMs,
    },
    logLevel: vars.PROCWATCH_LOG_LEVEL ?? "info",
  });
}
