import cors from "@fastify/cors";
import Fastify, { type FastifyServerOptions } from "fastify";

import { createApiKeyHook } from "./auth/api_key";
import type { ApiContext } from "./lib/context";
import { registerMetricsHooks } from "./metrics";
import { adminRoutes } from "./routes/admin";
import { extractRoutes } from "./routes/extract";
import { healthRoutes } from "./routes/health";
import { jobsRoutes } from "./routes/jobs";

/** Documents arrive inline, so the default 1 MiB body limit is too small. */
const BODY_LIMIT_BYTES = 10 * 1024 * 1024;

interface ErrorEnvelope {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
}

export async function buildServer(ctx: ApiContext, options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: options.logger ?? true,
    bodyLimit: BODY_LIMIT_BYTES,
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-API-Key"],
  });

  // Register Prometheus metrics hooks
  registerMetricsHooks(fastify);

  fastify.setErrorHandler((error: Error & { statusCode?: number; code?: string }, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    const envelope: ErrorEnvelope = {
      ok: false,
      error: {
        code: error.code ?? "INTERNAL_ERROR",
        message: error.message,
      },
    };
    return reply.code(statusCode).send(envelope);
  });

  // Public routes (no auth required)
  await fastify.register(healthRoutes, { prefix: "/api", ctx });

  // Protected routes - X-API-Key when a key is configured
  await fastify.register(
    async (api) => {
      if (ctx.apiKey) {
        api.addHook("onRequest", createApiKeyHook(ctx.apiKey));
      }
      await api.register(extractRoutes, { ctx });
      await api.register(jobsRoutes, { ctx });
      if (ctx.emergencyStop) {
        await api.register(adminRoutes, { emergencyStop: ctx.emergencyStop });
      }
    },
    { prefix: "/api" },
  );

  return fastify;
}
