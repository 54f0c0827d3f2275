import { useMemo } from "react";
import type { BoardSnapshot, Diagram } from "@/types";
import { emptyDiagram, renderBoard, type RenderOptions } from "@/utils/board";

/**
 * Diagram for the selected route, re-rendered only when the selection or
 * the snapshot changes.
 */
export function useBoardDiagram(
  routeUuid: string | null,
  snapshot: BoardSnapshot | null,
  options?: RenderOptions
): Diagram {
  return useMemo(() => {
    if (!snapshot) return emptyDiagram(options?.theme);
    return renderBoard(routeUuid, snapshot.holdsMap, snapshot.layoutMap, options);
  }, [routeUuid, snapshot, options]);
}
