import {
  ZoomIn,
  ZoomOut,
  ArrowLeft,
  ArrowRight,
  ArrowUp,
  ArrowDown,
  RotateCcw,
} from "lucide-react";
import type { LucideIcon } from "lucide-react";
import type { Route, ViewportAction, ViewportState } from "@/types";
import { gradeToColor, gradeToString } from "@/utils/climbs";
import { isInView, projectPoint } from "@/utils/viewport";

const MAP_SIZE = { width: 600, height: 600 };

const CONTROLS: { action: ViewportAction; icon: LucideIcon; label: string }[] = [
  { action: "in", icon: ZoomIn, label: "Zoom In" },
  { action: "out", icon: ZoomOut, label: "Zoom Out" },
  { action: "left", icon: ArrowLeft, label: "Pan Left" },
  { action: "right", icon: ArrowRight, label: "Pan Right" },
  { action: "up", icon: ArrowUp, label: "Pan Up" },
  { action: "down", icon: ArrowDown, label: "Pan Down" },
  { action: "reset", icon: RotateCcw, label: "Reset View" },
];

interface RouteMapProps {
  routes: Route[];
  view: ViewportState;
  selectedUuid: string | null;
  onViewportAction: (action: ViewportAction) => void;
  onSelectRoute: (uuid: string) => void;
}

/**
 * Scatter map of routes by their embedding position, colored by grade.
 */
export function RouteMap({
  routes,
  view,
  selectedUuid,
  onViewportAction,
  onSelectRoute,
}: RouteMapProps) {
  const points = routes.flatMap((route) =>
    route.position && isInView(route.position, view)
      ? [{ route, ...projectPoint(route.position, view, MAP_SIZE) }]
      : []
  );

  return (
    <div className="flex flex-col gap-2">
      <div className="grid grid-cols-7 gap-1">
        {CONTROLS.map(({ action, icon: Icon, label }) => (
          <button
            key={action}
            onClick={() => onViewportAction(action)}
            title={label}
            aria-label={label}
            className="h-10 flex items-center justify-center rounded-md bg-zinc-900 border border-zinc-800 text-zinc-400 hover:text-zinc-100 hover:bg-zinc-800 transition-colors"
          >
            <Icon size={16} />
          </button>
        ))}
      </div>

      <svg
        viewBox={`0 0 ${MAP_SIZE.width} ${MAP_SIZE.height}`}
        role="img"
        aria-label="Route map"
        className="w-full h-auto bg-zinc-900 rounded-lg border border-zinc-800"
      >
        {points.map(({ route, x, y }) => {
          const isSelected = route.uuid === selectedUuid;
          return (
            <circle
              key={route.uuid}
              data-uuid={route.uuid}
              cx={x}
              cy={y}
              r={isSelected ? 8 : 5}
              fill={gradeToColor(route.grade)}
              opacity={selectedUuid ? (isSelected ? 1 : 0.1) : 0.8}
              className="cursor-pointer"
              onClick={() => onSelectRoute(route.uuid)}
            >
              <title>{`${route.name} (${gradeToString(route.grade)})`}</title>
            </circle>
          );
        })}
      </svg>
    </div>
  );
}
