import { type FastifyInstance, fastify as createFastify } from "fastify";
import sensible from "@fastify/sensible";
import type { ServiceConfig } from "./config.js";
import { statusRoutes } from "./routes/status.js";
import type { RunTracker } from "./runTracker.js";

export async function buildServer(config: Pick<ServiceConfig, "LOG_LEVEL">, tracker: RunTracker): Promise<FastifyInstance> {
  const fastify = createFastify({
    logger: {
      level: config.LOG_LEVEL
    }
  });

  await fastify.register(sensible);
  await fastify.register(statusRoutes, { tracker });

  return fastify;
}
