import { describe, it, expect, vi, beforeEach } from "vitest";
import { AxiosError, AxiosHeaders } from "axios";
import type { AxiosResponse } from "axios";
import { apiClient } from "./client";
import { renderBoard } from "@/utils/board";
import { SnapshotError } from "./errors";
import { getBoardSnapshot, parseSnapshot } from "./snapshot";

vi.mock("./client", () => ({
  apiClient: { get: vi.fn() },
}));

const mockGet = vi.mocked(apiClient.get);

function response<T>(data: T, status = 200): AxiosResponse<T> {
  const headers = new AxiosHeaders();
  return { data, status, statusText: "", headers, config: { headers } };
}

const rawSnapshot = {
  metadata: [
    { uuid: "r1", climb_name: "Warm Up", difficulty: 3 },
    { uuid: "r2", name: "Second", angle: 40 },
    "not a row",
  ],
  holds_map: {
    r1: [[101, 12], "102", { bad: true }],
    r2: "not a list",
  },
  layout_map: {
    "101": { x: 10, y: 20 },
    "102": { x: 30, y: 40 },
    "103": { x: "?", y: 1 },
  },
};

describe("parseSnapshot", () => {
  it("keeps route rows and collects their columns", () => {
    const snapshot = parseSnapshot(rawSnapshot);
    expect(snapshot.records).toHaveLength(2);
    expect(snapshot.columns).toEqual(["uuid", "climb_name", "difficulty", "name", "angle"]);
  });

  it("keeps only well-formed hold entries", () => {
    const snapshot = parseSnapshot(rawSnapshot);
    expect(snapshot.holdsMap.get("r1")).toEqual([[101, 12], "102"]);
    expect(snapshot.holdsMap.has("r2")).toBe(false);
  });

  it("builds the layout map with canonical keys", () => {
    const snapshot = parseSnapshot(rawSnapshot);
    expect([...snapshot.layoutMap.keys()]).toEqual([101, 102]);
  });

  it("accepts layout rows", () => {
    const snapshot = parseSnapshot({
      ...rawSnapshot,
      layout_map: [{ hold_id: "5", x: 1, y: 2 }, { x: 3, y: 4 }],
    });
    expect(snapshot.layoutMap.get(5)).toEqual({ x: 1, y: 2 });
    expect(snapshot.layoutMap.size).toBe(1);
  });

  it("keeps pairs with unreadable roles so they render in the fallback color", () => {
    const snapshot = parseSnapshot({
      metadata: [],
      holds_map: { r1: [[101, null], [102, 12]], r2: [[101, true]] },
      layout_map: { "101": { x: 10, y: 20 }, "102": { x: 30, y: 40 } },
    });

    expect(snapshot.holdsMap.get("r1")).toEqual([[101, null], [102, 12]]);

    const r1 = renderBoard("r1", snapshot.holdsMap, snapshot.layoutMap);
    expect(r1.markers.map((m) => m.color)).toEqual(["#00FFFF", "#00DD00"]);

    const r2 = renderBoard("r2", snapshot.holdsMap, snapshot.layoutMap);
    expect(r2.placeholder).toBeNull();
    expect(r2.markers).toHaveLength(1);
    expect(r2.markers[0]).toMatchObject({ holdId: 101, role: "unknown", color: "#00FFFF" });
  });

  it("rejects snapshots without the required parts", () => {
    expect(() => parseSnapshot(null)).toThrow(SnapshotError);
    expect(() => parseSnapshot({ ...rawSnapshot, metadata: {} })).toThrow(
      "Snapshot has no metadata list"
    );
    expect(() => parseSnapshot({ ...rawSnapshot, holds_map: [] })).toThrow(
      "Snapshot has no holds_map"
    );
    expect(() => parseSnapshot({ ...rawSnapshot, layout_map: 7 })).toThrow(
      "Snapshot has no layout_map"
    );
  });
});

describe("getBoardSnapshot", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("fetches and parses the snapshot", async () => {
    mockGet.mockResolvedValueOnce(response(rawSnapshot));

    const snapshot = await getBoardSnapshot("/data.json");

    expect(mockGet).toHaveBeenCalledWith("/data.json");
    expect(snapshot.records).toHaveLength(2);
  });

  it("reports a missing dataset", async () => {
    mockGet.mockRejectedValueOnce(
      new AxiosError(
        "Not Found",
        "ERR_BAD_REQUEST",
        undefined,
        undefined,
        response(null, 404)
      )
    );

    const error = await getBoardSnapshot("/data.json").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SnapshotError);
    expect(error).toMatchObject({
      code: "not-found",
      message: "Board data not found at /data.json. Please run the pipeline script.",
    });
  });

  it("reports other failures as network errors", async () => {
    mockGet.mockRejectedValueOnce(new Error("socket hang up"));

    await expect(getBoardSnapshot("/data.json")).rejects.toMatchObject({
      code: "network",
      message: "Failed to load board data: socket hang up",
    });
  });

  it("reports malformed payloads", async () => {
    mockGet.mockResolvedValueOnce(response("<html>"));

    await expect(getBoardSnapshot("/data.json")).rejects.toMatchObject({
      code: "malformed",
    });
  });
});
