import { describe, it, expect } from "vitest";
import { renderHook } from "@testing-library/react";
import type { BoardSnapshot, Coordinates, HoldId, RawRouteHold } from "@/types";
import { useBoardDiagram } from "./useBoardDiagram";

const snapshot: BoardSnapshot = {
  records: [],
  columns: [],
  holdsMap: new Map<string, readonly RawRouteHold[]>([["r1", [[101, 12]]]]),
  layoutMap: new Map<HoldId, Coordinates>([[101, { x: 10, y: 20 }]]),
};

describe("useBoardDiagram", () => {
  it("renders the selected route", () => {
    const { result } = renderHook(() => useBoardDiagram("r1", snapshot));
    expect(result.current.markers).toHaveLength(1);
    expect(result.current.markers[0]).toMatchObject({ x: 15, y: 25, role: "start" });
  });

  it("shows the empty board before the snapshot loads", () => {
    const { result } = renderHook(() => useBoardDiagram("r1", null));
    expect(result.current.markers).toHaveLength(0);
    expect(result.current.placeholder?.text).toBe("Select Route");
  });

  it("keeps the same diagram across renders with the same inputs", () => {
    const { result, rerender } = renderHook(() => useBoardDiagram("r1", snapshot));
    const first = result.current;
    rerender();
    expect(result.current).toBe(first);
  });
});
