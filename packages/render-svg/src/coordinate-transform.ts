import type { Point } from "@svgscribe/core";
import type { Layout } from "./layout.js";

/**
 * Convert an x coordinate from user space to SVG space.
 * Right-hand origins mirror the axis against the document width.
 */
export function translateX(x: number, layout: Layout): number {
  if (layout.origin === "top-right" || layout.origin === "bottom-right") {
    return layout.dimensions.width - (x + layout.originOffset.x) * layout.scale;
  }
  return (layout.originOffset.x + x) * layout.scale;
}

/**
 * Convert a y coordinate from user space (Y-up for bottom origins)
 * to SVG space (Y-down).
 */
export function translateY(y: number, layout: Layout): number {
  if (layout.origin === "bottom-left" || layout.origin === "bottom-right") {
    return layout.dimensions.height - (y + layout.originOffset.y) * layout.scale;
  }
  return (layout.originOffset.y + y) * layout.scale;
}

export function translatePointToSvg(point: Point, layout: Layout): Point {
  return { x: translateX(point.x, layout), y: translateY(point.y, layout) };
}

/**
 * Scale a length (radius, stroke width, font size). No offset or flip.
 */
export function translateScale(value: number, layout: Layout): number {
  return value * layout.scale;
}
