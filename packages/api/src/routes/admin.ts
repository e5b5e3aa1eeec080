import type { FastifyInstance } from "fastify";

import type { EmergencyStopControl } from "../lib/context";

export interface AdminRouteOptions {
  emergencyStop: EmergencyStopControl;
}

export async function adminRoutes(fastify: FastifyInstance, opts: AdminRouteOptions): Promise<void> {
  // POST /admin/emergency-stop - Signal every worker to exit after its current jobs
  fastify.post("/admin/emergency-stop", async (_request, reply) => {
    try {
      await opts.emergencyStop.activate();
      return {
        ok: true,
        message: "Emergency stop activated. Workers will exit when they check the flag.",
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return reply.code(500).send({
        ok: false,
        error: { code: "EMERGENCY_STOP_FAILED", message },
      });
    }
  });

  // POST /admin/clear-emergency-stop - Clear the flag so workers can start again
  fastify.post("/admin/clear-emergency-stop", async (_request, reply) => {
    try {
      await opts.emergencyStop.clear();
      return { ok: true, message: "Emergency stop cleared. Workers can start again." };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return reply.code(500).send({
        ok: false,
        error: { code: "CLEAR_EMERGENCY_STOP_FAILED", message },
      });
    }
  });
}
