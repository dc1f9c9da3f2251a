import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config";
import { createContainer } from "./container";
import { createLogger } from "./lib/logger";
import { buildServer } from "./server";

const start = async () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, env: config.env });
  const { videos } = createContainer(config, logger);
  const server = await buildServer({ logger, videos });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.listen({ port: config.port, host: config.host });
};

start().catch((err: unknown) => {
  console.error("Failed to start server", err);
  process.exit(1);
});
