import type { TrafficModel } from "@drivewindow/config";

export type Coordinate = {
  readonly lat: number;
  readonly lng: number;
};

export type Place = {
  query: string;
  formattedAddress: string;
  location: Coordinate;
  placeId: string | null;
};

export type SampleInstant = {
  readonly epochMs: number;
  readonly timeZone: string;
  /** YYYY-MM-DD in timeZone */
  readonly localDate: string;
  /** HH:MM (24h) in timeZone */
  readonly localTime: string;
  /** ISO-8601 with the zone's UTC offset, e.g. 2025-11-20T08:00:00-08:00 */
  readonly iso: string;
};

export type FetchTask = {
  readonly origin: Coordinate;
  readonly destination: Coordinate;
  readonly instant: SampleInstant;
  readonly model: TrafficModel;
};

export type SeriesPoint = {
  instant: SampleInstant;
  optimistic: number;
  pessimistic: number;
  average: number;
};

export type Insight = {
  best: SeriesPoint;
  worst: SeriesPoint;
  differenceMinutes: number;
};

export type Logger = {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
};

/**
 * Traffic-aware routing service.
 * Rejects on any upstream failure; callers do not distinguish failure kinds.
 */
export interface RoutingClient {
  fetchDuration(
    origin: Coordinate,
    destination: Coordinate,
    departureEpochSeconds: number,
    trafficModel: TrafficModel
  ): Promise<number>;
}

export interface Geocoder {
  geocode(query: string): Promise<Place[]>;
}

export interface StaticMapBuilder {
  buildStaticMapUrl(origin: Coordinate, destination: Coordinate): string;
}
