import type { Coordinates, HoldId, LayoutMap, LayoutSource } from "@/types";

const DIGITS = /^\d+$/;

/**
 * Canonical form of a hold id: an integer when the textual form is all
 * digits, otherwise the trimmed text.
 */
export function canonicalHoldId(holdId: HoldId): HoldId {
  const text = String(holdId).trim();
  return DIGITS.test(text) ? Number.parseInt(text, 10) : text;
}

/**
 * Look up a hold's panel coordinates.
 *
 * Layout keys may be numbers or strings depending on where the data came
 * from, so the id is tried as given, then as text, then as an integer when
 * its text is all digits. Returns `null` if no form matches.
 */
export function resolveHold(
  holdId: HoldId | null | undefined,
  layout: LayoutMap
): Coordinates | null {
  if (holdId === null || holdId === undefined) return null;

  const direct = layout.get(holdId);
  if (direct) return direct;

  const text = String(holdId);
  const byText = layout.get(text);
  if (byText) return byText;

  if (DIGITS.test(text)) {
    const byInteger = layout.get(Number.parseInt(text, 10));
    if (byInteger) return byInteger;
  }

  return null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Build the layout map from either an object keyed by hold id or a list of
 * `{ hold_id, x, y }` rows. Keys are canonicalized; entries without finite
 * coordinates are skipped.
 */
export function buildLayoutMap(source: LayoutSource): LayoutMap {
  const layout = new Map<HoldId, Coordinates>();

  const add = (holdId: unknown, x: unknown, y: unknown) => {
    if (typeof holdId !== "number" && typeof holdId !== "string") return;
    if (!isFiniteNumber(x) || !isFiniteNumber(y)) return;
    layout.set(canonicalHoldId(holdId), Object.freeze({ x, y }));
  };

  if (Array.isArray(source)) {
    source.forEach((row) => add(row.hold_id, row.x, row.y));
  } else {
    Object.entries(source).forEach(([holdId, coords]) =>
      add(holdId, coords.x, coords.y)
    );
  }

  return layout;
}
