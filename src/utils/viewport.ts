import type { Range, ViewportAction, ViewportState } from "@/types";

export const INITIAL_VIEWPORT: ViewportState = { x: [0, 1], y: [0, 1] };

const ZOOM_STEP = 0.1;
const PAN_STEP = 0.2;

function zoom([min, max]: Range, factor: number): Range {
  const span = max - min;
  return [min + span * factor, max - span * factor];
}

function shift([min, max]: Range, factor: number): Range {
  const span = max - min;
  return [min + span * factor, max + span * factor];
}

/**
 * Apply one map control to the viewport. Zooming moves both edges by 10% of
 * the span; panning moves the window by 20% of it.
 */
export function updateViewport(
  view: ViewportState,
  action: ViewportAction
): ViewportState {
  switch (action) {
    case "in":
      return { x: zoom(view.x, ZOOM_STEP), y: zoom(view.y, ZOOM_STEP) };
    case "out":
      return { x: zoom(view.x, -ZOOM_STEP), y: zoom(view.y, -ZOOM_STEP) };
    case "left":
      return { ...view, x: shift(view.x, -PAN_STEP) };
    case "right":
      return { ...view, x: shift(view.x, PAN_STEP) };
    case "up":
      return { ...view, y: shift(view.y, PAN_STEP) };
    case "down":
      return { ...view, y: shift(view.y, -PAN_STEP) };
    case "reset":
      return INITIAL_VIEWPORT;
  }
}

/**
 * Map a data point into pixel space for a map of the given size. The y axis
 * points up, as on the chart.
 */
export function projectPoint(
  point: { x: number; y: number },
  view: ViewportState,
  size: { width: number; height: number }
): { x: number; y: number } {
  const [x0, x1] = view.x;
  const [y0, y1] = view.y;
  return {
    x: ((point.x - x0) / (x1 - x0)) * size.width,
    y: size.height - ((point.y - y0) / (y1 - y0)) * size.height,
  };
}

export function isInView(
  point: { x: number; y: number },
  view: ViewportState
): boolean {
  return (
    point.x >= view.x[0] &&
    point.x <= view.x[1] &&
    point.y >= view.y[0] &&
    point.y <= view.y[1]
  );
}
