import type { CirclePrimitive, Diagram } from "@/types";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

function attrs(values: Record<string, string | number | undefined>): string {
  return Object.entries(values)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => ` ${key}="${escapeXml(String(value))}"`)
    .join("");
}

function circle(primitive: CirclePrimitive): string {
  return `<circle${attrs({
    cx: primitive.cx,
    cy: primitive.cy,
    r: primitive.r,
    fill: primitive.fill,
    opacity: primitive.opacity,
    stroke: primitive.stroke,
    "stroke-width": primitive.strokeWidth,
  })} />`;
}

/**
 * Serialize a diagram to standalone SVG markup, for embedding where React
 * is not rendering the board.
 */
export function diagramToSvg(diagram: Diagram, style?: string): string {
  const { background, placeholder } = diagram;
  const parts = [
    `<rect${attrs({
      x: background.x,
      y: background.y,
      width: background.width,
      height: background.height,
      rx: background.rx,
      fill: background.fill,
    })} />`,
  ];

  if (placeholder) {
    parts.push(
      `<text${attrs({
        x: placeholder.x,
        y: placeholder.y,
        fill: placeholder.fill,
        "text-anchor": placeholder.anchor,
        "font-family": placeholder.fontFamily,
      })}>${escapeXml(placeholder.text)}</text>`
    );
  }

  diagram.markers.forEach((marker) => {
    marker.primitives.forEach((primitive) => parts.push(circle(primitive)));
  });

  return `<svg${attrs({
    xmlns: "http://www.w3.org/2000/svg",
    viewBox: `0 0 ${diagram.width} ${diagram.height}`,
    style,
  })}>${parts.join("")}</svg>`;
}
