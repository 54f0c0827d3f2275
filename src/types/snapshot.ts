/**
 * Types for the board snapshot served as JSON by the data pipeline.
 */
import type { HoldsMap, LayoutMap, LayoutSource, RawRouteHold } from "./board";
import type { RawRouteRecord } from "./climb";

export interface RawBoardSnapshot {
  metadata: RawRouteRecord[];
  holds_map: Record<string, RawRouteHold[]>;
  layout_map: LayoutSource;
}

export interface BoardSnapshot {
  records: RawRouteRecord[];
  columns: string[];
  holdsMap: HoldsMap;
  layoutMap: LayoutMap;
}
