import { Copy, Info } from "lucide-react";
import type { Diagram, Route } from "@/types";
import { gradeToString } from "@/utils/climbs";
import { diagramToSvg } from "@/utils/svg";
import { BoardDiagram } from "./BoardDiagram";

interface BoardPanelProps {
  route: Route | null;
  diagram: Diagram;
}

export function BoardPanel({ route, diagram }: BoardPanelProps) {
  const copySvg = async () => {
    try {
      await navigator.clipboard.writeText(diagramToSvg(diagram));
    } catch (err) {
      console.error("Error copying board SVG:", err);
    }
  };

  return (
    <section className="flex flex-col gap-3">
      {route ? (
        <h2 className="text-lg font-semibold text-zinc-100 truncate">
          {route.name}{" "}
          <span className="text-cyan-400">{gradeToString(route.grade)}</span>
        </h2>
      ) : (
        <p className="flex items-center gap-2 text-sm text-zinc-400 bg-zinc-900 border border-zinc-800 rounded-lg px-3 py-2">
          <Info size={14} className="text-blue-400" />
          Tap a dot to view
        </p>
      )}
      <BoardDiagram diagram={diagram} />
      <button
        onClick={() => void copySvg()}
        className="self-end flex items-center gap-1.5 px-2 py-1 text-xs rounded-md text-zinc-400 hover:text-zinc-100 hover:bg-zinc-800 transition-colors"
      >
        <Copy size={12} />
        Copy SVG
      </button>
    </section>
  );
}
