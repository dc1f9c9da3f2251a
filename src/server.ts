import Fastify from "fastify";
import cors from "@fastify/cors";
import { errorMessage } from "./lib/errors";
import type { Logger } from "./lib/logger";
import type { VideoStore } from "./types";

export interface ServerDeps {
  logger: Logger;
  videos: VideoStore;
}

export async function buildServer({ logger, videos }: ServerDeps) {
  const server = Fastify({
    logger,
    bodyLimit: 1048576 * 10,
  });

  await server.register(cors, {
    origin: "*",
    methods: ["GET", "POST", "PUT", "DELETE"],
  });

  // liveness: process is up, no dependency check
  server.get("/health", async () => {
    return { status: "ok" };
  });

  server.get("/health/ready", async (req, reply) => {
    try {
      await videos.ping();
      return { status: "ok" };
    } catch (error) {
      req.log.warn({ err: error }, "readiness check failed");
      return reply.code(503).send({ status: "unavailable", database: errorMessage(error) });
    }
  });

  server.addHook("onClose", async () => {
    await videos.close();
  });

  return server;
}
