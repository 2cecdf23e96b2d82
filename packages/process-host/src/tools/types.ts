import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ProcessRegistry } from "../core/services/ProcessRegistry.js";
import type { OutputChunk, ProcessSummary } from "../core/model.js";

export interface ToolRegistrar {
  (server: McpServer, registry: ProcessRegistry): void;
}

export function describeProcess(p: ProcessSummary): string {
  const name = p.label ?? [p.command, ...p.args].join(" ");
  const pid = p.pid !== null ? ` pid ${p.pid}` : "";
  let outcome = "";
  if (p.exitCode !== null) outcome = `, exit ${p.exitCode}`;
  else if (p.signal !== null) outcome = `, signal ${p.signal}`;
  else if (p.reason !== undefined) outcome = `, ${p.reason}`;
  return `[${p.status}${outcome}] ${p.id}: ${name}${pid} (gen ${p.generation})`;
}

/**
 * Render chunks as log text. Chunks keep their own line endings.
 */
export function formatChunks(chunks: OutputChunk[], prefixTimestamp = false): string {
  return chunks
    .map((c) => {
      const text = c.text.endsWith("\n") ? c.text : `${c.text}\n`;
      return prefixTimestamp ? `${c.timestamp} ${text}` : text;
    })
    .join("");
}

/**
 * Format a hint about running processes to remind the caller to clean up.
 * @param excludeId - The process the current call is about
 */
export function formatRunningProcessesHint(registry: ProcessRegistry, excludeId?: string): string | null {
  const running = [...registry.list()].filter((p) => p.status === "running" && p.id !== excludeId);

  if (running.length === 0) return null;

  const lines: string[] = [];
  lines.push(`\n---`);
  lines.push(`${running.length} process(es) still running:`);
  for (const proc of running.slice(0, 3)) {
    lines.push(`  - ${proc.label ?? proc.command} (id: ${proc.id})`);
  }
  if (running.length > 3) {
    lines.push(`  - ... and ${running.length - 3} more`);
  }
  lines.push(`Use \`stop_process\` or \`stop_all_processes\` to clean up.`);
  return lines.join("\n");
}
