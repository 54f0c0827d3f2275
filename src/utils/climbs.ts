import { SAMPLE_SEED } from "@/config";
import type {
  FieldMap,
  RawRouteRecord,
  Route,
  RouteField,
  RouteSample,
} from "@/types";
import { seededRandom } from "./random";

export const DEFAULT_FIELD_MAP: FieldMap = {
  uuid: ["uuid", "id"],
  name: ["climb_name", "name", "route_name", "title"],
  grade: ["difficulty", "grade", "display_difficulty", "v_grade"],
  angle: ["angle"],
  ascents: ["ascensionist_count", "ascents", "ascent_count", "stars"],
};

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined || value === "") return false;
  return !(typeof value === "number" && Number.isNaN(value));
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!NUMERIC.test(text)) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * First present value among the field's candidates. Falls back to the
 * canonical key so a normalized route reads back as itself.
 */
function pick(record: RawRouteRecord, field: RouteField, fieldMap: FieldMap): unknown {
  for (const key of [...fieldMap[field], field]) {
    if (isPresent(record[key])) return record[key];
  }
  return undefined;
}

function toText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

export function coerceGrade(value: unknown): number {
  const grade = toNumber(value);
  if (grade === null) return 0;
  return Math.max(0, Math.trunc(grade));
}

function readPosition(record: RawRouteRecord): Route["position"] {
  const nested = record.position;
  if (typeof nested === "object" && nested !== null && "x" in nested && "y" in nested) {
    const x = toNumber(nested.x);
    const y = toNumber(nested.y);
    if (x !== null && y !== null) return { x, y };
  }
  const x = toNumber(record.x);
  const y = toNumber(record.y);
  return x !== null && y !== null ? { x, y } : null;
}

/**
 * Coerce a source row into a `Route`. Idempotent.
 */
export function normalizeRoute(
  raw: RawRouteRecord,
  fieldMap: FieldMap = DEFAULT_FIELD_MAP
): Route {
  const uuid = toText(pick(raw, "uuid", fieldMap)) ?? "";
  const name =
    toText(pick(raw, "name", fieldMap)) ??
    (uuid ? `Route ${uuid.slice(0, 8)}` : "Unnamed Route");

  return {
    uuid,
    name,
    grade: coerceGrade(pick(raw, "grade", fieldMap)),
    angle: toText(pick(raw, "angle", fieldMap)) ?? "Unknown",
    ascents: toNumber(pick(raw, "ascents", fieldMap)),
    position: readPosition(raw),
  };
}

/**
 * Normalize every row, dropping rows without an id and repeats of an id.
 */
export function normalizeRoutes(
  records: readonly RawRouteRecord[],
  fieldMap: FieldMap = DEFAULT_FIELD_MAP
): Route[] {
  const seen = new Set<string>();
  const routes: Route[] = [];
  for (const record of records) {
    const route = normalizeRoute(record, fieldMap);
    if (!route.uuid || seen.has(route.uuid)) continue;
    seen.add(route.uuid);
    routes.push(route);
  }
  return routes;
}

/**
 * Guess which columns hold the name, grade and popularity of a route.
 * Detected columns go first; the defaults stay behind them.
 */
export function detectFieldMap(columns: readonly string[]): FieldMap {
  const lower = columns.map((c) => c.toLowerCase());

  let nameColumn: string | undefined;
  for (const candidate of DEFAULT_FIELD_MAP.name) {
    const index = lower.findIndex((c) => c.includes(candidate));
    if (index !== -1) {
      nameColumn = columns[index];
      break;
    }
  }

  const gradeColumn = DEFAULT_FIELD_MAP.grade.find((c) => columns.includes(c));
  const ascentsColumn = columns.find((c) => {
    const l = c.toLowerCase();
    return l.includes("ascent") || l.includes("star");
  });

  let fieldMap = DEFAULT_FIELD_MAP;
  if (nameColumn) fieldMap = withField(fieldMap, "name", nameColumn);
  if (gradeColumn) fieldMap = withField(fieldMap, "grade", gradeColumn);
  if (ascentsColumn) fieldMap = withField(fieldMap, "ascents", ascentsColumn);
  return fieldMap;
}

/**
 * Put `column` first in the field's candidate list.
 */
export function withField(
  fieldMap: FieldMap,
  field: RouteField,
  column: string
): FieldMap {
  return {
    ...fieldMap,
    [field]: [column, ...fieldMap[field].filter((c) => c !== column)],
  };
}

export function filterRoutes(
  routes: readonly Route[],
  gradeMin: number,
  gradeMax: number,
  nameSubstring = ""
): Route[] {
  const query = nameSubstring.trim().toLowerCase();
  return routes.filter(
    (route) =>
      route.grade >= gradeMin &&
      route.grade <= gradeMax &&
      (!query || route.name.toLowerCase().includes(query))
  );
}

/**
 * Find the route a name search points at: an exact (case-insensitive) name
 * match, or else the only route whose name contains the query.
 */
export function resolveRouteByName(
  query: string,
  routes: readonly Route[]
): Route | null {
  const needle = query.trim().toLowerCase();
  if (!needle) return null;

  const exact = routes.find((r) => r.name.toLowerCase() === needle);
  if (exact) return exact;

  const matches = routes.filter((r) => r.name.toLowerCase().includes(needle));
  return matches.length === 1 ? matches[0] : null;
}

export function gradeBounds(routes: readonly Route[]): [number, number] {
  if (routes.length === 0) return [0, 0];
  let min = Infinity;
  let max = -Infinity;
  routes.forEach(({ grade }) => {
    min = Math.min(min, grade);
    max = Math.max(max, grade);
  });
  return [min, max];
}

/**
 * Cut the routes down to the display budget: the most climbed routes when
 * popularity is known, otherwise a seeded sample kept in source order.
 */
export function sampleRoutes(
  routes: readonly Route[],
  maxPoints: number,
  seed: number = SAMPLE_SEED
): RouteSample {
  const budget = Math.max(0, Math.floor(maxPoints));
  if (routes.length <= budget) return { routes: [...routes], mode: "all" };

  if (routes.some((r) => r.ascents !== null)) {
    const sorted = [...routes].sort(
      (a, b) => (b.ascents ?? -Infinity) - (a.ascents ?? -Infinity) || 0
    );
    return { routes: sorted.slice(0, budget), mode: "top" };
  }

  const random = seededRandom(seed);
  const indices = routes.map((_, i) => i);
  for (let i = 0; i < budget; i++) {
    const j = i + Math.floor(random() * (indices.length - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  const picked = indices.slice(0, budget).sort((a, b) => a - b);
  return { routes: picked.map((i) => routes[i]), mode: "random" };
}

/**
 * Caption for a sampled list. `sortedBy` names the popularity column a
 * "top" sample was ordered by.
 */
export function describeSample(
  sample: RouteSample,
  sortedBy = "ascents"
): string {
  const count = sample.routes.length;
  switch (sample.mode) {
    case "top":
      return `Showing top ${count} routes (sorted by ${sortedBy})`;
    case "random":
      return `Showing random ${count} routes`;
    default:
      return `Showing ${count} route${count !== 1 ? "s" : ""}`;
  }
}

/**
 * Display label for a grade, e.g. 5 -> "V5".
 */
export function gradeToString(grade: number): string {
  return `V${grade}`;
}

/**
 * Get a color for a given grade
 */
export function gradeToColor(grade: number): string {
  // Color gradient from green (easy) to purple (hard)
  const colors = [
    "#22c55e", // V0
    "#00c717ff", // V1
    "#4acc16ff", // V2
    "#68cc16ff", // V3
    "#b9ea08ff", // V4
    "#d9ff00ff", // V5
    "#e8dc00ff", // V6
    "#ffee00ff", // V7
    "#e6b000ff", // V8
    "#dc6f26ff", // V9
    "#dc3826ff", // V10
    "#b91c1c", // V11
    "#991b2cff", // V12
    "#8a042cff", // V13
    "#8b0071ff", // V14
    "#79007dff", // V15
    "#6c007cff", // V16
    "#3e0075ff", // V17
  ];

  const index = Math.min(Math.max(0, Math.floor(grade)), colors.length - 1);
  return colors[index];
}
