import { DEFAULT_ROLE_TABLE } from "@/config/roles";
import type {
  HoldId,
  HoldRole,
  HoldsMap,
  RawRouteHold,
  RoleCode,
  RoleTable,
  RouteHold,
} from "@/types";

const INTEGER = /^-?\d+$/;

function isHoldId(value: unknown): value is HoldId {
  if (typeof value === "number") return Number.isFinite(value);
  return typeof value === "string" && value.trim() !== "";
}

export function roleFor(
  code: RoleCode | null,
  table: RoleTable = DEFAULT_ROLE_TABLE
): HoldRole | "unknown" {
  if (code === null) return "unknown";
  return table.roles[code]?.role ?? "unknown";
}

export function colorFor(
  code: RoleCode | null,
  table: RoleTable = DEFAULT_ROLE_TABLE
): string {
  if (code === null) return table.fallbackColor;
  return table.roles[code]?.color ?? table.fallbackColor;
}

/**
 * Read a role as a code. Accepts a number, a numeric string, or a role name
 * from the table ("start", "foot", ...).
 */
export function parseRoleCode(
  role: unknown,
  table: RoleTable = DEFAULT_ROLE_TABLE
): RoleCode | null {
  if (typeof role === "number") return Number.isFinite(role) ? role : null;
  if (typeof role !== "string") return null;

  const text = role.trim();
  if (INTEGER.test(text)) return Number.parseInt(text, 10);

  const name = text.toLowerCase();
  const match = Object.entries(table.roles).find(
    ([, definition]) => definition.role === name
  );
  return match ? Number(match[0]) : null;
}

/**
 * Whether a feed entry has one of the accepted route hold shapes.
 */
export function isRawRouteHold(value: unknown): value is RawRouteHold {
  if (isHoldId(value)) return true;
  if (Array.isArray(value)) {
    const pair: readonly unknown[] = value;
    return pair.length === 2 && isHoldId(pair[0]);
  }
  return typeof value === "object" && value !== null && "holdId" in value;
}

function toRouteHold(
  holdId: HoldId,
  code: RoleCode | null,
  table: RoleTable
): RouteHold {
  return { holdId, code, role: roleFor(code, table) };
}

/**
 * Normalize one feed entry into a `RouteHold`. Entries that are neither a
 * bare id, an `[id, role]` pair, nor an already normalized hold give `null`.
 */
export function normalizeRouteHold(
  entry: unknown,
  table: RoleTable = DEFAULT_ROLE_TABLE
): RouteHold | null {
  if (isHoldId(entry)) return toRouteHold(entry, table.defaultCode, table);

  if (Array.isArray(entry)) {
    const pair: readonly unknown[] = entry;
    if (pair.length !== 2 || !isHoldId(pair[0])) return null;
    return toRouteHold(pair[0], parseRoleCode(pair[1], table), table);
  }

  if (typeof entry === "object" && entry !== null && "holdId" in entry) {
    if (!isHoldId(entry.holdId)) return null;
    let code: RoleCode | null = null;
    if ("code" in entry) code = parseRoleCode(entry.code, table);
    else if ("role" in entry) code = parseRoleCode(entry.role, table);
    return toRouteHold(entry.holdId, code, table);
  }

  return null;
}

/**
 * The holds a route uses, in feed order. Unknown or missing routes give an
 * empty list.
 */
export function holdsFor(
  routeUuid: string | null | undefined,
  holdsMap: HoldsMap,
  table: RoleTable = DEFAULT_ROLE_TABLE
): RouteHold[] {
  if (routeUuid === null || routeUuid === undefined) return [];

  const entries = holdsMap.get(routeUuid) ?? [];
  const holds: RouteHold[] = [];
  for (const entry of entries) {
    const hold = normalizeRouteHold(entry, table);
    if (hold) holds.push(hold);
  }
  return holds;
}
