export { GoogleMapsClient, GOOGLE_MAPS_BASE_URL } from "./client.js";
export type { FetchLike, GoogleMapsClientOptions, RoutingTrafficModel } from "./client.js";
export { GoogleMapsError } from "./errors.js";
