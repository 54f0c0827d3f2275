import { describe, it, expect } from "vitest";
import { renderHook, act } from "@testing-library/react";
import { useViewport } from "./useViewport";

describe("useViewport", () => {
  it("applies map controls in sequence", () => {
    const { result } = renderHook(() => useViewport());

    act(() => result.current.apply("right"));
    act(() => result.current.apply("right"));

    expect(result.current.view.x[0]).toBeCloseTo(0.4);
    expect(result.current.view.x[1]).toBeCloseTo(1.4);

    act(() => result.current.apply("reset"));
    expect(result.current.view).toEqual({ x: [0, 1], y: [0, 1] });
  });
});
