/**
 * HTTP server
 */

import Fastify, { type FastifyInstance } from "fastify";
import { createLogger } from "../utils/logger";
import type { Container } from "./container";
import { backupRoutes } from "./routes/backups";
import { coverRoutes } from "./routes/covers";

const logger = createLogger("http");

export async function buildServer(container: Container): Promise<FastifyInstance> {
  // Requests go through the application logger instead of fastify's
  const server = Fastify({ logger: false });

  server.addHook("onResponse", async (request, reply) => {
    logger.debug(
      `${request.method} ${request.url} ${reply.statusCode} (${reply.elapsedTime.toFixed(1)}ms)`,
    );
  });

  await server.register(backupRoutes, { container });
  await server.register(coverRoutes, { container });

  server.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  server.setErrorHandler(async (error, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      logger.error(`${request.method} ${request.url} failed:`, error);
    }
    return reply.status(status).send({
      success: false,
      error: status >= 500 ? "Internal server error" : error.message,
    });
  });

  server.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      success: false,
      error: `${request.method} ${request.url} does not exist`,
    });
  });

  return server;
}

export async function startServer(container: Container): Promise<FastifyInstance> {
  const { host, port } = container.config.server;
  const server = await buildServer(container);

  await server.listen({ host, port });
  logger.info(`Listening on http://${host}:${port}`);

  return server;
}
