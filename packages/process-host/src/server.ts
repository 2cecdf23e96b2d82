import { ConsoleLogger, runServer } from "@procwatch/core";

import { loadConfig } from "./core/config.js";
import { ProcessRegistry } from "./core/services/ProcessRegistry.js";
import { NodeProcessSpawner } from "./infrastructure/runner/NodeProcessSpawner.js";
import { registerAllTools } from "./tools/index.js";

const loaded = loadConfig();
if (!loaded.ok) {
  new ConsoleLogger({ name: "procwatch" }).error(loaded.error);
  process.exit(1);
}

const { supervisor, logLevel } = loaded.value;
const logger = new ConsoleLogger({ name: "procwatch", level: logLevel });

runServer({
  config: {
    name: "procwatch:process-host",
    version: "0.1.0",
  },
  logger,
  createServices: () => ({
    registry: new ProcessRegistry({
      spawner: new NodeProcessSpawner(),
      config: supervisor,
      logger,
    }),
  }),
  registerTools: (server, { registry }) => registerAllTools(server, registry),
  onShutdown: async ({ registry }) => {
    const result = await registry.shutdown();
    logger.info("Stopped supervised processes", { stopped: result.stopped.length, failed: result.failed.length });
  },
});
