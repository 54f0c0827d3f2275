/**
 * Types for the board: holds, their layout, and the holds each route uses.
 *
 * Feeds disagree on whether a hold id is a number or its textual form, so
 * the raw shapes stay loose here and are normalized in utils/holds and
 * utils/layout.
 */

export type HoldId = number | string;

export type HoldRole = "start" | "middle" | "finish" | "foot";

export type RoleCode = number;

export interface Coordinates {
  x: number;
  y: number;
}

export interface RoleDefinition {
  role: HoldRole;
  color: string;
}

export interface RoleTable {
  roles: Readonly<Record<RoleCode, RoleDefinition>>;
  defaultCode: RoleCode;
  fallbackColor: string;
}

export interface RouteHold {
  holdId: HoldId;
  /** `null` when the feed's role could not be read as a code. */
  code: RoleCode | null;
  role: HoldRole | "unknown";
}

/**
 * A route hold as it appears in a feed: bare id, `[id, role]` pair, or
 * normalized. A pair's role may be anything; unreadable roles render in the
 * fallback color.
 */
export type RawRouteHold =
  | HoldId
  | readonly [HoldId, unknown]
  | RouteHold;

export type LayoutMap = ReadonlyMap<HoldId, Coordinates>;

export type HoldsMap = ReadonlyMap<string, readonly RawRouteHold[]>;

export interface LayoutRow {
  hold_id: HoldId;
  x: number;
  y: number;
}

export type LayoutSource = Record<string, Coordinates> | LayoutRow[];
