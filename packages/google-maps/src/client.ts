import type { z } from "zod";
import { GEOCODE_CANDIDATE_LIMIT, STATIC_MAP_DEFAULTS, type TrafficModel } from "@drivewindow/config";
import {
  formatCoordinate,
  type Coordinate,
  type Geocoder,
  type Place,
  type RoutingClient,
  type StaticMapBuilder
} from "@drivewindow/eta";
import { GoogleMapsError } from "./errors.js";
import { directionsResponseSchema, geocodeResponseSchema } from "./schemas.js";

export const GOOGLE_MAPS_BASE_URL = "https://maps.googleapis.com/maps/api";

/** The Directions API also has best_guess, which the series never asks for. */
export type RoutingTrafficModel = TrafficModel | "best_guess";

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type GoogleMapsClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

export class GoogleMapsClient implements RoutingClient, Geocoder, StaticMapBuilder {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GoogleMapsClientOptions = {}) {
    this.apiKey = options.apiKey || undefined;
    this.baseUrl = (options.baseUrl ?? GOOGLE_MAPS_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /** Up to five candidates for a free-text place. */
  async geocode(query: string): Promise<Place[]> {
    const url = this.endpoint("geocode/json", { address: query });
    const data = await this.getJson(url, geocodeResponseSchema, "Geocoding");

    if (data.status !== "OK" && data.status !== "ZERO_RESULTS") {
      throw new GoogleMapsError(`Geocoding failed: ${data.status}`, data.status);
    }

    return data.results.slice(0, GEOCODE_CANDIDATE_LIMIT).map((result) => ({
      query,
      formattedAddress: result.formatted_address ?? query,
      location: { lat: result.geometry.location.lat, lng: result.geometry.location.lng },
      placeId: result.place_id ?? null
    }));
  }

  /**
   * Driving duration in seconds for a departure, under the given traffic model.
   * Uses duration_in_traffic and falls back to the plain duration.
   */
  async fetchDuration(
    origin: Coordinate,
    destination: Coordinate,
    departureEpochSeconds: number,
    trafficModel: RoutingTrafficModel = "best_guess"
  ): Promise<number> {
    const url = this.endpoint("directions/json", {
      origin: formatCoordinate(origin),
      destination: formatCoordinate(destination),
      mode: "driving",
      departure_time: String(departureEpochSeconds),
      traffic_model: trafficModel
    });
    const data = await this.getJson(url, directionsResponseSchema, "Directions");

    if (data.status !== "OK") {
      const detail = data.error_message ? ` - ${data.error_message}` : "";
      throw new GoogleMapsError(`Directions failed: ${data.status}${detail}`, data.status);
    }

    const leg = data.routes[0]?.legs[0];
    const duration = leg?.duration_in_traffic ?? leg?.duration;
    if (!duration) {
      throw new GoogleMapsError("Directions returned no duration", data.status);
    }

    return duration.value;
  }

  /** Static Maps URL with a green S at the origin and a red E at the destination. */
  buildStaticMapUrl(origin: Coordinate, destination: Coordinate): string {
    const url = this.endpoint("staticmap", {
      size: STATIC_MAP_DEFAULTS.size,
      scale: String(STATIC_MAP_DEFAULTS.scale),
      maptype: STATIC_MAP_DEFAULTS.maptype
    });
    url.searchParams.append("markers", `color:green|label:S|${formatCoordinate(origin)}`);
    url.searchParams.append("markers", `color:red|label:E|${formatCoordinate(destination)}`);
    return url.toString();
  }

  async downloadStaticMap(origin: Coordinate, destination: Coordinate): Promise<Uint8Array> {
    const response = await this.request(this.buildStaticMapUrl(origin, destination), "Static map");
    return new Uint8Array(await response.arrayBuffer());
  }

  private endpoint(path: string, params: Record<string, string>): URL {
    if (!this.apiKey) {
      throw new GoogleMapsError("Missing GOOGLE_MAPS_API_KEY");
    }

    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set("key", this.apiKey);
    return url;
  }

  private async request(url: string, label: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new GoogleMapsError(`${label} request failed: ${reason}`);
    }

    if (!response.ok) {
      throw new GoogleMapsError(`${label} failed: HTTP ${response.status}`, `HTTP_${response.status}`);
    }
    return response;
  }

  private async getJson<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): Promise<T> {
    const response = await this.request(url.toString(), label);
    const payload: unknown = await response.json().catch(() => null);
    const parsed = schema.safeParse(payload);

    if (!parsed.success) {
      throw new GoogleMapsError(`${label} returned an unexpected payload`);
    }
    return parsed.data;
  }
}
