import { Search } from "lucide-react";
import type { RouteFilters as Filters } from "@/types";

interface RouteFiltersProps {
  filters: Filters;
  bounds: [number, number];
  onChange: (filters: Filters) => void;
}

export function RouteFilters({ filters, bounds, onChange }: RouteFiltersProps) {
  const [low, high] = filters.gradeRange;

  const setLow = (value: number) =>
    onChange({ ...filters, gradeRange: [Math.min(value, high), high] });
  const setHigh = (value: number) =>
    onChange({ ...filters, gradeRange: [low, Math.max(value, low)] });

  return (
    <div className="grid grid-cols-3 gap-4 items-end">
      <div className="col-span-1">
        <label className="text-xs text-zinc-500 uppercase tracking-wider">
          Grade Range
        </label>
        <div className="mt-1 flex items-center gap-2 text-sm text-zinc-300">
          <input
            type="range"
            aria-label="Minimum grade"
            min={bounds[0]}
            max={bounds[1]}
            value={low}
            onChange={(e) => setLow(Number(e.target.value))}
            className="w-full accent-emerald-500"
          />
          <input
            type="range"
            aria-label="Maximum grade"
            min={bounds[0]}
            max={bounds[1]}
            value={high}
            onChange={(e) => setHigh(Number(e.target.value))}
            className="w-full accent-emerald-500"
          />
          <span className="font-mono whitespace-nowrap">
            {low}–{high}
          </span>
        </div>
      </div>

      <div className="col-span-2">
        <label
          htmlFor="route-search"
          className="text-xs text-zinc-500 uppercase tracking-wider"
        >
          Search Route Name
        </label>
        <div className="mt-1 flex items-center gap-2 bg-zinc-900 border border-zinc-800 rounded-lg px-3 py-2">
          <Search size={14} className="text-zinc-500" />
          <input
            id="route-search"
            type="text"
            value={filters.nameIncludes}
            placeholder="e.g. 'Jedi Mind Tricks'..."
            onChange={(e) => onChange({ ...filters, nameIncludes: e.target.value })}
            className="flex-1 bg-transparent text-sm text-zinc-100 outline-none"
          />
        </div>
      </div>
    </div>
  );
}
