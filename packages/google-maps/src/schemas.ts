import { z } from "zod";

const latLngSchema = z.object({
  lat: z.number(),
  lng: z.number()
});

export const geocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        place_id: z.string().optional(),
        geometry: z.object({ location: latLngSchema })
      })
    )
    .default([])
});

const durationSchema = z.object({
  value: z.number(),
  text: z.string().optional()
});

export const directionsResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  routes: z
    .array(
      z.object({
        legs: z.array(
          z.object({
            duration: durationSchema.optional(),
            duration_in_traffic: durationSchema.optional()
          })
        )
      })
    )
    .default([])
});
