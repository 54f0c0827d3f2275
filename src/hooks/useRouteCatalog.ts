import { useState, useMemo, useEffect } from "react";
import { DEFAULT_MAX_POINTS } from "@/config";
import type {
  FieldMap,
  RawRouteRecord,
  Route,
  RouteField,
  RouteFilters,
  RouteSample,
} from "@/types";
import {
  detectFieldMap,
  filterRoutes,
  gradeBounds,
  normalizeRoutes,
  sampleRoutes,
  withField,
} from "@/utils/climbs";

const ROUTE_FIELDS: readonly RouteField[] = [
  "uuid",
  "name",
  "grade",
  "angle",
  "ascents",
];

function isRouteField(value: string): value is RouteField {
  return ROUTE_FIELDS.some((field) => field === value);
}

interface UseRouteCatalogReturn {
  routes: Route[];
  filtered: Route[];
  sample: RouteSample;
  bounds: [number, number];
  fieldMap: FieldMap;
  setField: (field: RouteField, column: string) => void;
  filters: RouteFilters;
  setFilters: (filters: RouteFilters) => void;
  maxPoints: number;
  setMaxPoints: (maxPoints: number) => void;
}

/**
 * Normalized routes plus the filter and display-budget state over them.
 *
 * @param records - Raw route rows from the snapshot
 * @param columns - Field names seen across the rows
 */
export function useRouteCatalog(
  records: readonly RawRouteRecord[],
  columns: readonly string[]
): UseRouteCatalogReturn {
  const [overrides, setOverrides] = useState<Partial<Record<RouteField, string>>>(
    {}
  );
  const [maxPoints, setMaxPoints] = useState(DEFAULT_MAX_POINTS);

  const fieldMap = useMemo(() => {
    let detected = detectFieldMap(columns);
    for (const [field, column] of Object.entries(overrides)) {
      if (isRouteField(field) && column) detected = withField(detected, field, column);
    }
    return detected;
  }, [columns, overrides]);

  const routes = useMemo(
    () => normalizeRoutes(records, fieldMap),
    [records, fieldMap]
  );
  const bounds = useMemo(() => gradeBounds(routes), [routes]);
  const [minGrade, maxGrade] = bounds;

  const [filters, setFilters] = useState<RouteFilters>({
    gradeRange: [minGrade, maxGrade],
    nameIncludes: "",
  });

  // Reset the grade range whenever the grade source changes
  useEffect(() => {
    setFilters((prev) => ({ ...prev, gradeRange: [minGrade, maxGrade] }));
  }, [minGrade, maxGrade]);

  const filtered = useMemo(
    () =>
      filterRoutes(
        routes,
        filters.gradeRange[0],
        filters.gradeRange[1],
        filters.nameIncludes
      ),
    [routes, filters]
  );
  const sample = useMemo(
    () => sampleRoutes(filtered, maxPoints),
    [filtered, maxPoints]
  );

  const setField = (field: RouteField, column: string) =>
    setOverrides((prev) => ({ ...prev, [field]: column }));

  return {
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
  };
}
