import { useReducer } from "react";
import type { ViewportAction, ViewportState } from "@/types";
import { INITIAL_VIEWPORT, updateViewport } from "@/utils/viewport";

export function useViewport(initial: ViewportState = INITIAL_VIEWPORT) {
  const [view, dispatch] = useReducer(updateViewport, initial);
  return { view, apply: (action: ViewportAction) => dispatch(action) };
}
