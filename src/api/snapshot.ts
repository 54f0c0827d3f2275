import axios from "axios";
import { DATA_URL } from "@/config";
import type {
  BoardSnapshot,
  Coordinates,
  LayoutRow,
  LayoutSource,
  RawRouteHold,
  RawRouteRecord,
} from "@/types";
import { isRawRouteHold } from "@/utils/holds";
import { buildLayoutMap } from "@/utils/layout";
import { apiClient } from "./client";
import { SnapshotError } from "./errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCoordinates(value: unknown): value is Coordinates {
  return (
    isRecord(value) && typeof value.x === "number" && typeof value.y === "number"
  );
}

function isLayoutRow(value: unknown): value is LayoutRow {
  return (
    isRecord(value) &&
    isCoordinates(value) &&
    (typeof value.hold_id === "number" || typeof value.hold_id === "string")
  );
}

function readLayout(value: unknown): LayoutSource {
  if (Array.isArray(value)) {
    const rows: unknown[] = value;
    return rows.filter(isLayoutRow);
  }
  if (isRecord(value)) {
    const layout: Record<string, Coordinates> = {};
    Object.entries(value).forEach(([holdId, coords]) => {
      if (isCoordinates(coords)) layout[holdId] = coords;
    });
    return layout;
  }
  throw new SnapshotError("Snapshot has no layout_map", "malformed");
}

function readHoldsMap(value: unknown): Map<string, RawRouteHold[]> {
  if (!isRecord(value)) {
    throw new SnapshotError("Snapshot has no holds_map", "malformed");
  }
  const holdsMap = new Map<string, RawRouteHold[]>();
  Object.entries(value).forEach(([uuid, holds]) => {
    if (!Array.isArray(holds)) return;
    const entries: unknown[] = holds;
    holdsMap.set(uuid, entries.filter(isRawRouteHold));
  });
  return holdsMap;
}

function collectColumns(records: readonly RawRouteRecord[]): string[] {
  const columns = new Set<string>();
  records.forEach((record) => Object.keys(record).forEach((k) => columns.add(k)));
  return [...columns];
}

/**
 * Check a decoded snapshot and build the lookup maps the board needs.
 */
export function parseSnapshot(data: unknown): BoardSnapshot {
  if (!isRecord(data)) {
    throw new SnapshotError("Snapshot is not a JSON object", "malformed");
  }
  if (!Array.isArray(data.metadata)) {
    throw new SnapshotError("Snapshot has no metadata list", "malformed");
  }

  const rows: unknown[] = data.metadata;
  const records = rows.filter(isRecord);

  return {
    records,
    columns: collectColumns(records),
    holdsMap: readHoldsMap(data.holds_map),
    layoutMap: buildLayoutMap(readLayout(data.layout_map)),
  };
}

/**
 * Fetch and parse the board snapshot.
 */
export async function getBoardSnapshot(
  url: string = DATA_URL
): Promise<BoardSnapshot> {
  let data: unknown;
  try {
    const response = await apiClient.get<unknown>(url);
    data = response.data;
  } catch (err) {
    if (axios.isAxiosError(err) && err.response?.status === 404) {
      throw new SnapshotError(
        `Board data not found at ${url}. Please run the pipeline script.`,
        "not-found",
        { cause: err }
      );
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new SnapshotError(`Failed to load board data: ${reason}`, "network", {
      cause: err,
    });
  }
  return parseSnapshot(data);
}
