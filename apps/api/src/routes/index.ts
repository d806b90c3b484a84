/**
 * Route registration index
 */

export { registerHealthRoutes } from "./health";
export { registerGeocodeRoutes } from "./geocode";
export { registerStaticMapRoutes } from "./static-map";
export { registerEtaSeriesRoutes } from "./eta-series";
export type { ApiMaps, RouteContext, RouteRegistrar } from "./types";
