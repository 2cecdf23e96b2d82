/**
 * MCP Server bootstrap utilities.
 * Provides a standardized way to create and run MCP servers across all packages.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import type { Logger } from "./logger.js";

/**
 * Configuration for an MCP server.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping an MCP server.
 */
export interface ServerBootstrapOptions<S> {
  /** Server name and version configuration */
  config: ServerConfig;

  logger: Logger;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Optional callback when server is starting (before connect) */
  onStartup?: (services: S) => Promise<void> | void;

  /** Optional callback when server is shutting down */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Bootstrap an MCP server over stdio.
 *
 * Creates the services, registers tools, installs SIGTERM/SIGINT handlers
 * that run `onShutdown` before closing, then connects the transport.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "procwatch:process-host", version: "0.1.0" },
 *   logger,
 *   createServices: () => ({ registry: new ProcessRegistry(...) }),
 *   registerTools: (server, { registry }) => registerAllTools(server, registry),
 *   onShutdown: ({ registry }) => registry.shutdown(),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, logger, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    try {
      await onShutdown?.(services);
      await server.close();
    } catch (error: unknown) {
      logger.error("Shutdown failed", { error });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGTERM", (signal) => void shutdown(signal));
  process.on("SIGINT", (signal) => void shutdown(signal));

  await onStartup?.(services);

  await server.connect(transport);
  logger.info("Ready", { name: config.name, version: config.version });
}

/**
 * Run bootstrapServer with standard error handling.
 * This is the preferred entry point for MCP servers.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    options.logger.error("Fatal error", { error });
    process.exit(1);
  });
}

// Re-export McpServer type for tool registration
export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
