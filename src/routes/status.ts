import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import type {} from "@fastify/sensible";
import type { RunTracker } from "../runTracker.js";

export interface StatusRouteOptions extends FastifyPluginOptions {
  tracker: RunTracker;
}

export async function statusRoutes(fastify: FastifyInstance, options: StatusRouteOptions) {
  const { tracker } = options;

  fastify.get("/healthz", async () => {
    return { ok: true, running: tracker.running, timestamp: new Date().toISOString() };
  });

  fastify.get("/runs/latest", async (_request, reply) => {
    const latest = tracker.latestResult;
    if (!latest) {
      return reply.notFound("No run has finished yet");
    }
    reply.header("Cache-Control", "no-store");
    return latest;
  });
}
