/**
 * Static map URL with start and end markers
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { parseCoordinate } from "@drivewindow/eta";
import type { RouteContext } from "./types";
import { invalidRequest } from "./validation";

const coordinateParam = z.string().transform((value, ctx) => {
  const coordinate = parseCoordinate(value);
  if (!coordinate) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected lat,lng" });
    return z.NEVER;
  }
  return coordinate;
});

const staticMapQuerySchema = z.object({
  origin: coordinateParam,
  destination: coordinateParam
});

export function registerStaticMapRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.get("/api/static-map", async (request, reply) => {
    const parsed = staticMapQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.status(400);
      return invalidRequest(parsed.error);
    }

    return { ok: true, url: ctx.maps.buildStaticMapUrl(parsed.data.origin, parsed.data.destination) };
  });
}
