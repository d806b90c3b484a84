/**
 * Drive-time series across a departure window
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { DEFAULT_INTERVAL_MINUTES } from "@drivewindow/config";
import { runEtaSeries, type EtaSeriesReport } from "@drivewindow/eta";
import type { RouteContext } from "./types";
import { invalidRequest } from "./validation";

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

// Date and time formats are checked when the grid is built (400 invalid_range)
const etaSeriesBodySchema = z.object({
  origin_lat: latitude,
  origin_lng: longitude,
  dest_lat: latitude,
  dest_lng: longitude,
  date: z.string(),
  start: z.string(),
  end: z.string(),
  interval_minutes: z.number().int().positive().default(DEFAULT_INTERVAL_MINUTES),
  tz: z.string().min(1).optional(),
  include_chart: z.boolean().default(false)
});

function toResponse(report: EtaSeriesReport, includeChart: boolean) {
  const { best, worst, differenceMinutes } = report.insight;

  return {
    ok: true,
    series: report.series.map((point) => ({
      departure: point.instant.iso,
      local_time: point.instant.localTime,
      optimistic_min: point.optimistic,
      pessimistic_min: point.pessimistic,
      average_min: point.average
    })),
    insights: {
      best_time: best.instant.localTime,
      best_avg_min: best.average,
      worst_time: worst.instant.localTime,
      worst_avg_min: worst.average,
      time_difference_min: differenceMinutes
    },
    failed_tasks: report.failedTasks,
    skipped_time_points: report.skippedTimePoints,
    ...(includeChart ? { chart: report.chart } : {})
  };
}

export function registerEtaSeriesRoutes(app: FastifyInstance, ctx: RouteContext) {
  const { config } = ctx;

  app.post("/api/eta-series", async (request, reply) => {
    const parsed = etaSeriesBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return invalidRequest(parsed.error);
    }
    const body = parsed.data;

    const report = await runEtaSeries(
      ctx.maps,
      {
        origin: { lat: body.origin_lat, lng: body.origin_lng },
        destination: { lat: body.dest_lat, lng: body.dest_lng },
        date: body.date,
        start: body.start,
        end: body.end,
        intervalMinutes: body.interval_minutes,
        timeZone: body.tz ?? config.DEFAULT_TIME_ZONE
      },
      { fetch: ctx.fetch, logger: request.log, maxSamples: config.ETA_MAX_SAMPLES }
    );

    return toResponse(report, body.include_chart);
  });
}
