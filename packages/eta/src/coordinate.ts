import type { Coordinate } from "./types.js";

const COORDINATE_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;

/**
 * Parse "lat,lng". Returns null for anything that is not a pair of numbers
 * inside the valid latitude/longitude ranges.
 */
export function parseCoordinate(text: string): Coordinate | null {
  const match = text.match(COORDINATE_PATTERN);
  if (!match) return null;

  const lat = Number(match[1]);
  const lng = Number(match[2]);
  if (!isValidCoordinate({ lat, lng })) return null;

  return { lat, lng };
}

export function isValidCoordinate({ lat, lng }: Coordinate): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    Math.abs(lat) <= 90 &&
    Math.abs(lng) <= 180
  );
}

export function formatCoordinate({ lat, lng }: Coordinate): string {
  return `${lat},${lng}`;
}
