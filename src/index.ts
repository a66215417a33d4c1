import { buildServer } from "./api/server.js";
import { createGatewayContext } from "./core/services/gateway-context.js";

const context = createGatewayContext();
const app = buildServer(context);
const { port, host } = context.config;

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  app.log.info({ signal }, "Shutting down gracefully");
  try {
    await app.close();
    app.log.info("Server closed");
  } catch (error) {
    app.log.error({ err: error }, "Error during shutdown");
    process.exitCode = 1;
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

app
  .listen({ port, host })
  .then((address) => {
    app.log.info({ address, delegation: Boolean(context.config.delegation.clientId) }, "Gateway listening");
  })
  .catch((error: unknown) => {
    app.log.error({ err: error }, "Failed to start gateway");
    process.exitCode = 1;
  });
