/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for creating consistent tool responses.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 */
export interface ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
}

/**
 * Anything with a message; a `code` is forwarded to structured content when present.
 */
export interface ErrorLike {
  message: string;
  code?: string;
}

export interface ErrorPayload extends Record<string, unknown> {
  success: false;
  error: string;
  code?: string;
}

export type SuccessPayload<T extends Record<string, unknown>> = T & { success: true };

/**
 * Create an error response. Sets `isError` so clients can tell it apart from output.
 */
export function errorResponse(error: string | ErrorLike): ToolResponse<ErrorPayload> {
  const message = typeof error === "string" ? error : error.message;
  const structured: ErrorPayload = { success: false, error: message };
  if (typeof error !== "string" && error.code !== undefined) {
    structured.code = error.code;
  }
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: structured,
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<SuccessPayload<T>> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result to an MCP tool response with structured data.
 * On success, calls the formatter to generate text and structured content.
 * On error, returns an error response.
 */
export function resultToStructuredResponse<T, E extends ErrorLike, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<SuccessPayload<S> | ErrorPayload> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return successResponse(text, data);
  }
  return errorResponse(result.error);
}
