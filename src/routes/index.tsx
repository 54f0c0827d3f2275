import { createRoute, useNavigate } from "@tanstack/react-router";
import { useState, useEffect, useMemo } from "react";
import { AlertTriangle, Settings } from "lucide-react";
import { BoardPanel } from "@/components/BoardPanel";
import { RouteFilters } from "@/components/RouteFilters";
import { RouteList } from "@/components/RouteList";
import { RouteMap } from "@/components/RouteMap";
import { SettingsPanel } from "@/components/SettingsPanel";
import { useBoardDiagram } from "@/hooks/useBoardDiagram";
import { useBoardSnapshot } from "@/hooks/useBoardSnapshot";
import { useRouteCatalog } from "@/hooks/useRouteCatalog";
import { useViewport } from "@/hooks/useViewport";
import type { BoardSnapshot } from "@/types";
import { describeSample, resolveRouteByName } from "@/utils/climbs";
import { Route as RootRoute } from "./__root";

// --- Route Definition ---

export interface ExplorerSearch {
  route?: string;
}

export const Route = createRoute({
  getParentRoute: () => RootRoute,
  path: "/",
  validateSearch: (search: Record<string, unknown>): ExplorerSearch => ({
    route:
      typeof search.route === "string" && search.route !== ""
        ? search.route
        : undefined,
  }),
  component: ExplorerPage,
});

// --- Explorer Component ---

interface ExplorerProps {
  snapshot: BoardSnapshot;
}

function Explorer({ snapshot }: ExplorerProps) {
  const navigate = useNavigate();
  const search = Route.useSearch();
  const [isSettingsOpen, setIsSettingsOpen] = useState(false);

  const {
    routes,
    filtered,
    sample,
    bounds,
    fieldMap,
    setField,
    filters,
    setFilters,
    maxPoints,
    setMaxPoints,
  } = useRouteCatalog(snapshot.records, snapshot.columns);
  const { view, apply } = useViewport();

  const selectRoute = (uuid: string) => {
    void navigate({ to: "/", search: { route: uuid } });
  };

  // A name search that points at one route selects it
  const searched = filters.nameIncludes
    ? resolveRouteByName(filters.nameIncludes, filtered)
    : null;
  const searchedUuid = searched?.uuid;
  useEffect(() => {
    if (searchedUuid) {
      void navigate({ to: "/", search: { route: searchedUuid } });
    }
  }, [searchedUuid, navigate]);

  const selectedRoute = useMemo(
    () => routes.find((r) => r.uuid === search.route) ?? null,
    [routes, search.route]
  );
  const diagram = useBoardDiagram(selectedRoute?.uuid ?? null, snapshot);
  const ascentsColumn =
    fieldMap.ascents.find((c) => snapshot.columns.includes(c)) ?? "ascents";

  return (
    <div className="h-screen flex flex-col">
      {/* Header */}
      <header className="relative flex items-center justify-between px-4 py-3 bg-zinc-900 border-b border-zinc-800 flex-shrink-0">
        <h1 className="text-lg font-medium text-zinc-100">
          Board Route Explorer
        </h1>
        <button
          onClick={() => setIsSettingsOpen((open) => !open)}
          aria-label="Settings"
          className="p-2 rounded-md text-zinc-400 hover:text-zinc-100 hover:bg-zinc-800 transition-colors"
        >
          <Settings size={16} />
        </button>
        {isSettingsOpen && (
          <SettingsPanel
            columns={snapshot.columns}
            fieldMap={fieldMap}
            onFieldChange={setField}
            maxPoints={maxPoints}
            totalRoutes={routes.length}
            onMaxPointsChange={setMaxPoints}
            onClose={() => setIsSettingsOpen(false)}
          />
        )}
      </header>

      <div className="px-4 py-3 border-b border-zinc-800 flex-shrink-0">
        <RouteFilters filters={filters} bounds={bounds} onChange={setFilters} />
      </div>

      {/* Main content */}
      <div className="flex-1 flex min-h-0">
        <div className="w-80 border-r border-zinc-800 bg-zinc-900 flex-shrink-0">
          <RouteList
            routes={sample.routes}
            selectedUuid={selectedRoute?.uuid ?? null}
            onSelectRoute={selectRoute}
            caption={describeSample(sample, ascentsColumn)}
          />
        </div>

        <div className="flex-1 min-w-0 p-4 overflow-y-auto">
          <RouteMap
            routes={sample.routes}
            view={view}
            selectedUuid={selectedRoute?.uuid ?? null}
            onViewportAction={apply}
            onSelectRoute={selectRoute}
          />
        </div>

        <div className="w-[420px] flex-shrink-0 p-4 border-l border-zinc-800 overflow-y-auto">
          <BoardPanel route={selectedRoute} diagram={diagram} />
        </div>
      </div>
    </div>
  );
}

// --- Main Page Component ---

function ExplorerPage() {
  const { snapshot, loading, error } = useBoardSnapshot();

  if (loading) {
    return (
      <div className="flex items-center justify-center h-screen">
        <div className="animate-pulse text-zinc-500">Loading board data...</div>
      </div>
    );
  }

  if (error || !snapshot) {
    return (
      <div className="flex items-center justify-center h-screen p-6">
        <div className="flex items-start gap-3 max-w-lg bg-red-950/40 border border-red-900 text-red-300 rounded-lg p-4">
          <AlertTriangle className="w-5 h-5 flex-shrink-0 mt-0.5" />
          <p className="text-sm">{error ?? "Board data unavailable"}</p>
        </div>
      </div>
    );
  }

  return <Explorer snapshot={snapshot} />;
}
