/**
 * Place lookup for clients that only have free text
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { RouteContext } from "./types";
import { invalidRequest } from "./validation";

const geocodeQuerySchema = z.object({
  q: z.string().trim().min(1).max(200)
});

export function registerGeocodeRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.get("/api/geocode", async (request, reply) => {
    const parsed = geocodeQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.status(400);
      return invalidRequest(parsed.error);
    }

    const places = await ctx.maps.geocode(parsed.data.q);

    return {
      ok: true,
      candidates: places.map((place) => ({
        formatted_address: place.formattedAddress,
        lat: place.location.lat,
        lng: place.location.lng,
        place_id: place.placeId
      }))
    };
  });
}
