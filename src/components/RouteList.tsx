import { Layers } from "lucide-react";
import type { Route } from "@/types";
import { gradeToColor, gradeToString } from "@/utils/climbs";

interface RouteListProps {
  routes: Route[];
  selectedUuid: string | null;
  onSelectRoute: (uuid: string) => void;
  caption: string;
}

export function RouteList({
  routes,
  selectedUuid,
  onSelectRoute,
  caption,
}: RouteListProps) {
  if (routes.length === 0) {
    return (
      <div className="flex flex-col items-center justify-center h-full text-zinc-500 p-4">
        <Layers className="w-12 h-12 mb-3 opacity-50" />
        <p className="text-center">No routes match these filters.</p>
      </div>
    );
  }

  return (
    <div className="flex flex-col h-full">
      <div className="px-3 py-2 border-b border-zinc-800 flex-shrink-0">
        <span className="text-xs text-zinc-500 uppercase tracking-wider">
          {caption}
        </span>
      </div>
      <div className="flex-1 overflow-y-auto">
        {routes.map((route) => {
          const isSelected = selectedUuid === route.uuid;
          const color = gradeToColor(route.grade).slice(0, 7);
          return (
            <button
              key={route.uuid}
              onClick={() => onSelectRoute(route.uuid)}
              aria-pressed={isSelected}
              className={`w-full text-left px-3 py-3 border-b border-zinc-800/50 transition-colors
                ${
                  isSelected
                    ? "bg-zinc-800 border-l-2 border-l-emerald-500"
                    : "hover:bg-zinc-800/50 border-l-2 border-l-transparent"
                }`}
            >
              <div className="flex items-center gap-3">
                <div
                  className="w-10 h-10 rounded-md flex items-center justify-center text-sm font-bold flex-shrink-0"
                  style={{ backgroundColor: `${color}20`, color }}
                >
                  {gradeToString(route.grade)}
                </div>
                <div className="flex-1 min-w-0">
                  <div className="font-medium text-zinc-100 truncate">
                    {route.name}
                  </div>
                  <div className="text-xs text-zinc-500 flex items-center gap-2 mt-0.5">
                    <span>
                      {route.angle === "Unknown" ? "Any angle" : `${route.angle}°`}
                    </span>
                    {route.ascents !== null && (
                      <>
                        <span>•</span>
                        <span>{route.ascents} ascents</span>
                      </>
                    )}
                  </div>
                </div>
              </div>
            </button>
          );
        })}
      </div>
    </div>
  );
}
