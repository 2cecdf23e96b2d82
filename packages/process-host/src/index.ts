// Core domain
export * from "./core/model.js";
export * from "./core/errors.js";
export * from "./core/ports/index.js";
export { DEFAULT_CONFIG, MAX_TIMER_MILLIS, loadConfig, type SupervisorConfig, type LoadedConfig } from "./core/config.js";
export { OutputBuffer, type OutputBufferOptions } from "./core/output/OutputBuffer.js";
export { LineSplitter } from "./core/output/LineSplitter.js";
export { Subscription, type SubscriptionCloseReason } from "./core/broadcast/Subscription.js";
export { OutputBroadcaster, type SubscribeOptions } from "./core/broadcast/OutputBroadcaster.js";
export { KeyedMutex } from "./core/concurrency/KeyedMutex.js";
export { ProcessHandle, type ProcessHandleDeps } from "./core/services/ProcessHandle.js";
export {
  ProcessRegistry,
  DEFAULT_WAIT_TIMEOUT,
  type ProcessRegistryOptions,
  type SendInputOptions,
  type WaitForOutputOptions,
  type StopAllResult,
} from "./core/services/ProcessRegistry.js";

// Infrastructure - Runner
export { NodeProcessSpawner } from "./infrastructure/runner/NodeProcessSpawner.js";
export { isPidAlive } from "./infrastructure/runner/processUtils.js";

// Infrastructure - Memory (for testing)
export { FakeProcess, FakeProcessSpawner, type FakeProcessOptions } from "./infrastructure/memory/FakeProcessSpawner.js";

// Tools (MCP tool registration)
export { registerAllTools } from "./tools/index.js";
export * from "./tools/types.js";
export * from "./tools/schemas.js";
