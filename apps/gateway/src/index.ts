import "dotenv/config";
import { loadConfig } from "./config/loadConfig.js";
import { createGateway } from "./gateway/createGateway.js";
import { gatewayLogs } from "./logs/index.js";
import { errorMessage } from "./monitoring/ErrorRegistry.js";

async function main() {
  const config = await loadConfig();
  const gateway = await createGateway(config);
  await gateway.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    gatewayLogs.info("Gateway", `Received ${signal}, shutting down`);
    gateway
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        gatewayLogs.error("Gateway", `Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
