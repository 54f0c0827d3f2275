import { DEFAULT_ROLE_TABLE } from "@/config/roles";
import { DEFAULT_BOARD_THEME } from "@/config/theme";
import type {
  BoardTheme,
  Coordinates,
  Diagram,
  HoldMarker,
  HoldsMap,
  LayoutMap,
  RectPrimitive,
  RoleTable,
  RouteHold,
} from "@/types";
import { colorFor, holdsFor } from "./holds";
import { canonicalHoldId, resolveHold } from "./layout";

export interface RenderOptions {
  theme?: BoardTheme;
  roles?: RoleTable;
}

function backgroundPanel(theme: BoardTheme): RectPrimitive {
  return {
    kind: "rect",
    x: 0,
    y: 0,
    width: theme.width,
    height: theme.height,
    rx: theme.cornerRadius,
    fill: theme.background,
  };
}

/**
 * The idle board: background panel and a centered placeholder label.
 */
export function emptyDiagram(theme: BoardTheme = DEFAULT_BOARD_THEME): Diagram {
  return {
    width: theme.width,
    height: theme.height,
    background: backgroundPanel(theme),
    placeholder: {
      kind: "text",
      x: "50%",
      y: "50%",
      text: theme.placeholder.text,
      fill: theme.placeholder.color,
      anchor: "middle",
      fontFamily: theme.placeholder.fontFamily,
    },
    markers: [],
  };
}

function holdMarker(
  hold: RouteHold,
  position: Coordinates,
  theme: BoardTheme,
  roles: RoleTable
): HoldMarker {
  const color = colorFor(hold.code, roles);
  const cx = position.x + theme.offset.x;
  const cy = position.y + theme.offset.y;

  return {
    holdId: canonicalHoldId(hold.holdId),
    role: hold.role,
    color,
    x: cx,
    y: cy,
    primitives: [
      {
        kind: "circle",
        cx,
        cy,
        r: theme.glow.radius,
        fill: color,
        opacity: theme.glow.opacity,
      },
      { kind: "circle", cx, cy, r: theme.coreRadius, fill: color },
      {
        kind: "circle",
        cx,
        cy,
        r: theme.ring.radius,
        fill: "none",
        stroke: color,
        strokeWidth: theme.ring.strokeWidth,
      },
    ],
  };
}

/**
 * Render a route's holds onto the board.
 *
 * No route, or a route without holds, gives the empty diagram. Holds with
 * no layout position are left out, so a route whose holds all fail to
 * resolve gives a bare panel without the placeholder. Never throws.
 */
export function renderBoard(
  routeUuid: string | null | undefined,
  holdsMap: HoldsMap,
  layout: LayoutMap,
  options: RenderOptions = {}
): Diagram {
  const theme = options.theme ?? DEFAULT_BOARD_THEME;
  const roles = options.roles ?? DEFAULT_ROLE_TABLE;

  const holds = holdsFor(routeUuid, holdsMap, roles);
  if (holds.length === 0) return emptyDiagram(theme);

  const markers: HoldMarker[] = [];
  for (const hold of holds) {
    const position = resolveHold(hold.holdId, layout);
    if (!position) continue;
    markers.push(holdMarker(hold, position, theme, roles));
  }

  return {
    width: theme.width,
    height: theme.height,
    background: backgroundPanel(theme),
    placeholder: null,
    markers,
  };
}
