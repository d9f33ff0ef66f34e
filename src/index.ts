import { buildServer } from "./api/server.js";
import { createConnectorContext } from "./core/services/connector-context.js";

const context = createConnectorContext();
const { logger, config } = context;
const app = buildServer(context);

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "shutting down");
  try {
    await app.close();
    logger.info("server closed");
  } catch (error) {
    logger.error({ err: error }, "error during shutdown");
    process.exitCode = 1;
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info(
      {
        host: config.host,
        port: config.port,
        crm: context.crm?.authScheme ?? "disabled",
        marketing: context.marketing?.authScheme ?? "disabled",
        tools: context.toolRegistry.list().map((tool) => tool.name)
      },
      "connector API listening"
    );
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "failed to start connector API");
    process.exitCode = 1;
  });
