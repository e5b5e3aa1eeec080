import { createHash, timingSafeEqual } from "crypto";

import type { FastifyReply, FastifyRequest } from "fastify";

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * onRequest hook requiring `X-API-Key` to match the configured key.
 */
export function createApiKeyHook(expectedKey: string) {
  const expected = digest(expectedKey);

  return async function apiKeyAuth(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const providedKey = request.headers["x-api-key"];

    if (typeof providedKey !== "string" || providedKey.length === 0) {
      return reply.code(401).send({
        ok: false,
        error: {
          code: "MISSING_API_KEY",
          message: "Missing X-API-Key header",
        },
      });
    }

    if (!timingSafeEqual(digest(providedKey), expected)) {
      return reply.code(401).send({
        ok: false,
        error: {
          code: "INVALID_API_KEY",
          message: "Invalid API key",
        },
      });
    }
    return undefined;
  };
}
