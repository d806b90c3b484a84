/**
 * Health check and version routes
 */

import type { FastifyInstance } from "fastify";
import type { RouteContext } from "./types";

export function registerHealthRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.get("/health", async () => {
    return {
      ok: true,
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    };
  });

  app.get("/version", async () => {
    return { ok: true, service: "api", version: ctx.config.APP_VERSION };
  });
}
