import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ProcessRegistry } from "../core/services/ProcessRegistry.js";
import type { ToolRegistrar } from "./types.js";

import { registerStartProcess } from "./startProcess.js";
import { registerLaunchProcess } from "./launchProcess.js";
import { registerStopProcess } from "./stopProcess.js";
import { registerRestartProcess } from "./restartProcess.js";
import { registerListProcesses } from "./listProcesses.js";
import { registerGetProcess } from "./getProcess.js";
import { registerRemoveProcess } from "./removeProcess.js";
import { registerReadOutput } from "./readOutput.js";
import { registerTailOutput } from "./tailOutput.js";
import { registerWriteStdin } from "./writeStdin.js";
import { registerFollowOutput } from "./followOutput.js";
import { registerWaitForOutput } from "./waitForOutput.js";
import { registerStopAllProcesses } from "./stopAllProcesses.js";
import { registerPurgeProcesses } from "./purgeProcesses.js";
import { registerGetStats } from "./getStats.js";

const allTools: ToolRegistrar[] = [
  registerStartProcess,
  registerLaunchProcess,
  registerStopProcess,
  registerRestartProcess,
  registerListProcesses,
  registerGetProcess,
  registerRemoveProcess,
  registerReadOutput,
  registerTailOutput,
  registerWriteStdin,
  registerFollowOutput,
  registerWaitForOutput,
  registerStopAllProcesses,
  registerPurgeProcesses,
  registerGetStats,
];

export function registerAllTools(server: McpServer, registry: ProcessRegistry): void {
  for (const register of allTools) {
    register(server, registry);
  }
}

export * from "./types.js";
export * from "./schemas.js";
