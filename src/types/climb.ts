/**
 * Types for route (climb) records.
 *
 * Source rows carry arbitrary column names; they become `Route` through
 * `normalizeRoute` in utils/climbs.
 */

export type RawRouteRecord = Record<string, unknown>;

export interface Route {
  uuid: string;
  name: string;
  grade: number;
  angle: string;
  ascents: number | null;
  position: { x: number; y: number } | null;
}

export type RouteField = "uuid" | "name" | "grade" | "angle" | "ascents";

export type FieldMap = Record<RouteField, readonly string[]>;

export type SampleMode = "all" | "top" | "random";

export interface RouteSample {
  routes: Route[];
  mode: SampleMode;
}

export interface RouteFilters {
  gradeRange: [number, number];
  nameIncludes: string;
}
