import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config";
import { PgVideoStore } from "./lib/db";
import { createLogger } from "./lib/logger";

const run = async () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, env: config.env, service: "video-migrate" });
  const store = new PgVideoStore(config.database, { logger });
  try {
    await store.ensureSchema();
  } finally {
    await store.close();
  }
};

run().catch((err: unknown) => {
  console.error("Migration failed", err);
  process.exit(1);
});
