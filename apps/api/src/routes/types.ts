/**
 * Shared types for route modules
 */

import type { FastifyInstance } from "fastify";
import type { BatchFetchOptions, Geocoder, RoutingClient, StaticMapBuilder } from "@drivewindow/eta";
import type { Config } from "../config";

export type ApiMaps = RoutingClient & Geocoder & StaticMapBuilder;

export interface RouteContext {
  config: Config;
  maps: ApiMaps;
  fetch: Partial<BatchFetchOptions>;
}

export type RouteRegistrar = (app: FastifyInstance, ctx: RouteContext) => void;
