import config from "./src/config/env";
import { createApp } from "./src/app";
import { bootstrap } from "./src/bootstrap";
import { logger } from "./src/utils/logger";

async function main() {
  const { service, gateway } = await bootstrap(config);
  const app = createApp(service, config.CORS_ORIGIN);

  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, storage: gateway.name }, `Backend running: http://localhost:${config.PORT}`);
  });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");

    server.close(() => {
      Promise.resolve(gateway.close?.())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "failed to close storage");
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});
