export { type Result, Ok, Err, andThen, toError } from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  type ErrorLike,
  type ErrorPayload,
  type SuccessPayload,
  errorResponse,
  successResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type Logger,
  type LogLevel,
  type LogContext,
  type ConsoleLoggerOptions,
  LOG_LEVELS,
  ConsoleLogger,
  noopLogger,
} from "./logger.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
