/**
 * Fastify API server for drive-time series
 */

import type { FastifyInstance, FastifyServerOptions } from "fastify";
import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { DriveWindowError, type BatchFetchOptions } from "@drivewindow/eta";
import { GoogleMapsClient } from "@drivewindow/google-maps";
import { fetchTuningFromConfig, getConfig, parseAllowedOrigins } from "./config";

// Route registrars
import {
  registerHealthRoutes,
  registerGeocodeRoutes,
  registerStaticMapRoutes,
  registerEtaSeriesRoutes,
  type ApiMaps,
  type RouteContext,
  type RouteRegistrar
} from "./routes";

type ServerOptions = {
  maps?: ApiMaps;
  fetch?: Partial<BatchFetchOptions>;
  logger?: FastifyServerOptions["logger"];
};

const DOMAIN_ERROR_STATUS: Record<string, number> = {
  invalid_range: 400,
  not_found: 404,
  no_data: 422,
  upstream_error: 502
};

const ROUTES: RouteRegistrar[] = [
  registerHealthRoutes,
  registerGeocodeRoutes,
  registerStaticMapRoutes,
  registerEtaSeriesRoutes
];

function resolveLogger(optionsLogger?: FastifyServerOptions["logger"]) {
  if (optionsLogger !== undefined) {
    return optionsLogger;
  }

  if (process.env.NODE_ENV === "test") {
    return { level: "silent" };
  }

  return true;
}

// Fastify sets statusCode on its own errors (bad JSON, rate limit)
function statusCodeOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

function genericErrorCode(status: number) {
  if (status === 429) return "rate_limited";
  return status < 500 ? "invalid_request" : "internal_error";
}

export function buildServer(options: ServerOptions = {}): FastifyInstance {
  const app = Fastify({ logger: resolveLogger(options.logger) });
  const config = getConfig();

  if (!options.maps && !config.GOOGLE_MAPS_API_KEY) {
    app.log.warn("GOOGLE_MAPS_API_KEY not configured - geocode, static map and eta series requests will fail");
  }

  // CORS: Use allowlist when configured, allow all otherwise
  app.register(cors, {
    origin: parseAllowedOrigins(config.ALLOWED_ORIGINS)
  });
  app.register(helmet, {
    crossOriginResourcePolicy: { policy: "cross-origin" },
    contentSecurityPolicy: false, // Disable CSP for API
  });
  app.register(rateLimit, {
    global: true,
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
  });

  const maps =
    options.maps ??
    new GoogleMapsClient({
      apiKey: config.GOOGLE_MAPS_API_KEY,
      baseUrl: config.GOOGLE_MAPS_BASE_URL,
      timeoutMs: config.GOOGLE_MAPS_TIMEOUT_MS
    });

  // Route context shared across route modules
  const routeContext: RouteContext = {
    config,
    maps,
    fetch: options.fetch ?? fetchTuningFromConfig(config)
  };

  // Series depend on live traffic; never cache them
  app.addHook("onSend", (request, reply, payload, done) => {
    const url = request.raw.url ?? "";
    if (url.startsWith("/api/")) {
      reply.header("Cache-Control", "no-store");
      reply.header("Pragma", "no-cache");
    }
    done(null, payload);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof DriveWindowError) {
      const status = DOMAIN_ERROR_STATUS[error.code] ?? 500;
      request.log.warn({ code: error.code, err: error }, "request failed");
      reply.status(status).send({ ok: false, error: error.code, message: error.message });
      return;
    }

    const status = statusCodeOf(error);
    if (status >= 500) {
      app.log.error(error);
    }
    const message = error instanceof Error ? error.message : String(error);
    reply.status(status).send({ ok: false, error: genericErrorCode(status), message });
  });

  for (const register of ROUTES) {
    register(app, routeContext);
  }

  return app;
}
