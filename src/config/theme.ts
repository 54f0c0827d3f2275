import type { BoardTheme } from "@/types";

// The panel is ~150x160 units; the viewBox adds padding around it.
export const DEFAULT_BOARD_THEME: BoardTheme = {
  width: 160,
  height: 170,
  offset: { x: 5, y: 5 },
  background: "#111",
  cornerRadius: 6,
  glow: { radius: 4, opacity: 0.3 },
  coreRadius: 2,
  ring: { radius: 3.5, strokeWidth: 0.7 },
  placeholder: {
    text: "Select Route",
    color: "#555",
    fontFamily: "sans-serif",
  },
};
