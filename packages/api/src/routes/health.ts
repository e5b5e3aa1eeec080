import type { FastifyInstance } from "fastify";

import type { RouteOptions } from "../lib/context";
import { getMetrics, getMetricsContentType } from "../metrics";

export async function healthRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  fastify.get("/health", async () => {
    return { ok: true, provider: opts.ctx.provider.name, model: opts.ctx.provider.model };
  });

  fastify.get("/metrics", async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.type(getMetricsContentType()).send(metrics);
  });
}
