import { describe, it, expect } from "vitest";
import type { ViewportState } from "@/types";
import { INITIAL_VIEWPORT, isInView, projectPoint, updateViewport } from "./viewport";

function expectRange(actual: [number, number], expected: [number, number]) {
  expect(actual[0]).toBeCloseTo(expected[0]);
  expect(actual[1]).toBeCloseTo(expected[1]);
}

describe("updateViewport", () => {
  it("zooms in by a tenth of the span on each side", () => {
    const view = updateViewport(INITIAL_VIEWPORT, "in");
    expectRange(view.x, [0.1, 0.9]);
    expectRange(view.y, [0.1, 0.9]);
  });

  it("zooms out by a tenth of the span on each side", () => {
    const view = updateViewport(INITIAL_VIEWPORT, "out");
    expectRange(view.x, [-0.1, 1.1]);
    expectRange(view.y, [-0.1, 1.1]);
  });

  it("pans by a fifth of the span", () => {
    expectRange(updateViewport(INITIAL_VIEWPORT, "left").x, [-0.2, 0.8]);
    expectRange(updateViewport(INITIAL_VIEWPORT, "right").x, [0.2, 1.2]);
    expectRange(updateViewport(INITIAL_VIEWPORT, "up").y, [0.2, 1.2]);
    expectRange(updateViewport(INITIAL_VIEWPORT, "down").y, [-0.2, 0.8]);
  });

  it("leaves the other axis alone when panning", () => {
    expect(updateViewport(INITIAL_VIEWPORT, "left").y).toEqual([0, 1]);
    expect(updateViewport(INITIAL_VIEWPORT, "up").x).toEqual([0, 1]);
  });

  it("resets to the initial view", () => {
    const moved = updateViewport(updateViewport(INITIAL_VIEWPORT, "in"), "left");
    expect(updateViewport(moved, "reset")).toEqual({ x: [0, 1], y: [0, 1] });
  });

  it("does not modify the previous state", () => {
    const view: ViewportState = { x: [0, 2], y: [0, 2] };
    updateViewport(view, "in");
    expect(view).toEqual({ x: [0, 2], y: [0, 2] });
  });
});

describe("projectPoint", () => {
  it("maps into pixel space with y pointing up", () => {
    const size = { width: 200, height: 100 };
    expect(projectPoint({ x: 0.5, y: 0.25 }, INITIAL_VIEWPORT, size)).toEqual({ x: 100, y: 75 });
    expect(projectPoint({ x: 0, y: 1 }, INITIAL_VIEWPORT, size)).toEqual({ x: 0, y: 0 });
  });
});

describe("isInView", () => {
  it("includes the edges", () => {
    expect(isInView({ x: 1, y: 0 }, INITIAL_VIEWPORT)).toBe(true);
    expect(isInView({ x: 1.01, y: 0.5 }, INITIAL_VIEWPORT)).toBe(false);
  });
});
