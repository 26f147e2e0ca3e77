// @docent/gateway — composition root
// Entry point: load config, create and start the gateway

import { errorMessage } from "@docent/core";
import { loadConfig, resolveConfigPath } from "@docent/config";
import { createGateway } from "./gateway";

const configPath = resolveConfigPath(process.argv.slice(2));
const configResult = await loadConfig(configPath);

if (!configResult.ok) {
  console.error("Configuration error:", configResult.error.message);
  process.exit(1);
}

const gateway = createGateway(configResult.value);

try {
  await gateway.start();
} catch (error) {
  gateway.deps.logger.error("Startup failed", { error: errorMessage(error) });
  process.exit(1);
}

// Graceful shutdown — guard against a second signal while draining
let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  await gateway.stop();
  process.exit(0);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
