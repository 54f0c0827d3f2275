import type { CirclePrimitive, Diagram } from "@/types";

interface BoardDiagramProps {
  diagram: Diagram;
  className?: string;
}

function Circle({ primitive }: { primitive: CirclePrimitive }) {
  return (
    <circle
      cx={primitive.cx}
      cy={primitive.cy}
      r={primitive.r}
      fill={primitive.fill}
      opacity={primitive.opacity}
      stroke={primitive.stroke}
      strokeWidth={primitive.strokeWidth}
    />
  );
}

export function BoardDiagram({ diagram, className }: BoardDiagramProps) {
  const { background, placeholder, markers } = diagram;

  return (
    <svg
      viewBox={`0 0 ${diagram.width} ${diagram.height}`}
      className={className}
      role="img"
      aria-label={placeholder ? placeholder.text : `${markers.length} holds`}
      style={{
        width: "100%",
        height: "auto",
        maxHeight: "70vh",
        background: "#222",
        borderRadius: 8,
      }}
    >
      <rect
        x={background.x}
        y={background.y}
        width={background.width}
        height={background.height}
        rx={background.rx}
        fill={background.fill}
      />
      {placeholder && (
        <text
          x={placeholder.x}
          y={placeholder.y}
          fill={placeholder.fill}
          textAnchor={placeholder.anchor}
          fontFamily={placeholder.fontFamily}
        >
          {placeholder.text}
        </text>
      )}
      {markers.map((marker, index) => (
        // Same hold can appear twice in a feed, so the index is part of the key
        <g
          key={`${marker.holdId}-${index}`}
          data-hold-id={marker.holdId}
          data-role={marker.role}
        >
          {marker.primitives.map((primitive, layer) => (
            <Circle key={layer} primitive={primitive} />
          ))}
        </g>
      ))}
    </svg>
  );
}
