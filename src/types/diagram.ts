/**
 * Types for a rendered board diagram. A diagram is a plain value: a viewBox,
 * a background panel, and marker primitives in draw order.
 */
import type { HoldId, HoldRole } from "./board";

export interface RectPrimitive {
  kind: "rect";
  x: number;
  y: number;
  width: number;
  height: number;
  rx: number;
  fill: string;
}

export interface CirclePrimitive {
  kind: "circle";
  cx: number;
  cy: number;
  r: number;
  fill: string;
  opacity?: number;
  stroke?: string;
  strokeWidth?: number;
}

export interface TextPrimitive {
  kind: "text";
  x: string;
  y: string;
  text: string;
  fill: string;
  anchor: "start" | "middle" | "end";
  fontFamily: string;
}

export type MarkerLayer = "glow" | "core" | "ring";

export interface HoldMarker {
  holdId: HoldId;
  role: HoldRole | "unknown";
  color: string;
  x: number;
  y: number;
  /** Always glow, core, ring in that order. */
  primitives: [CirclePrimitive, CirclePrimitive, CirclePrimitive];
}

export interface Diagram {
  width: number;
  height: number;
  background: RectPrimitive;
  placeholder: TextPrimitive | null;
  markers: HoldMarker[];
}

export interface BoardTheme {
  width: number;
  height: number;
  offset: { x: number; y: number };
  background: string;
  cornerRadius: number;
  glow: { radius: number; opacity: number };
  coreRadius: number;
  ring: { radius: number; strokeWidth: number };
  placeholder: { text: string; color: string; fontFamily: string };
}
