import { Settings, X } from "lucide-react";
import { MAX_POINTS_STEP, MIN_MAX_POINTS } from "@/config";
import type { FieldMap, RouteField } from "@/types";

interface SettingsPanelProps {
  columns: string[];
  fieldMap: FieldMap;
  onFieldChange: (field: RouteField, column: string) => void;
  maxPoints: number;
  totalRoutes: number;
  onMaxPointsChange: (maxPoints: number) => void;
  onClose: () => void;
}

function FieldSelect({
  label,
  field,
  columns,
  fieldMap,
  onFieldChange,
}: {
  label: string;
  field: RouteField;
  columns: string[];
  fieldMap: FieldMap;
  onFieldChange: (field: RouteField, column: string) => void;
}) {
  const current = fieldMap[field].find((c) => columns.includes(c)) ?? "";
  return (
    <label className="block">
      <span className="text-xs text-zinc-500 uppercase tracking-wider">
        {label}
      </span>
      <select
        value={current}
        onChange={(e) => onFieldChange(field, e.target.value)}
        className="mt-1 w-full bg-zinc-950 border border-zinc-700 rounded-md px-2 py-1.5 text-sm text-zinc-200"
      >
        {current === "" && <option value="">—</option>}
        {columns.map((column) => (
          <option key={column} value={column}>
            {column}
          </option>
        ))}
      </select>
    </label>
  );
}

export function SettingsPanel({
  columns,
  fieldMap,
  onFieldChange,
  maxPoints,
  totalRoutes,
  onMaxPointsChange,
  onClose,
}: SettingsPanelProps) {
  const sliderMax = Math.max(MIN_MAX_POINTS, totalRoutes);

  return (
    <aside className="absolute top-16 right-4 bg-zinc-900 border border-zinc-700 rounded-lg shadow-2xl z-50 w-72">
      <div className="p-4 border-b border-zinc-800 flex justify-between items-center">
        <h3 className="text-sm font-bold text-zinc-300 uppercase tracking-wide flex items-center gap-2">
          <Settings size={14} />
          Settings
        </h3>
        <button
          onClick={onClose}
          aria-label="Close settings"
          className="text-zinc-500 hover:text-zinc-300"
        >
          <X size={14} />
        </button>
      </div>
      <div className="p-4 space-y-4">
        <FieldSelect
          label="Name Column"
          field="name"
          columns={columns}
          fieldMap={fieldMap}
          onFieldChange={onFieldChange}
        />
        <FieldSelect
          label="Grade Column"
          field="grade"
          columns={columns}
          fieldMap={fieldMap}
          onFieldChange={onFieldChange}
        />
        <label className="block">
          <span className="text-xs text-zinc-500 uppercase tracking-wider">
            Max Dots: {maxPoints}
          </span>
          <input
            type="range"
            min={MIN_MAX_POINTS}
            max={sliderMax}
            step={MAX_POINTS_STEP}
            value={Math.min(maxPoints, sliderMax)}
            onChange={(e) => onMaxPointsChange(Number(e.target.value))}
            className="mt-1 w-full accent-emerald-500"
          />
        </label>
      </div>
    </aside>
  );
}
