import type { DiagnosticSink, Dimensions, Origin, Point } from "@svgscribe/core";
import { checkFinite } from "@svgscribe/core";

/**
 * Dimensions, origin corner, scale and origin offset of a document.
 * Drives the map from logical coordinates to SVG native coordinates.
 */
export interface Layout {
  dimensions: Dimensions;
  origin: Origin;
  scale: number;
  originOffset: Point;
}

export function createLayout(options: Partial<Layout> = {}): Layout {
  return {
    dimensions: options.dimensions ?? { width: 400, height: 300 },
    origin: options.origin ?? "bottom-left",
    scale: options.scale ?? 1,
    originOffset: options.originOffset ?? { x: 0, y: 0 },
  };
}

/** No scale, offset or flip: coordinates pass through untouched. */
export const UNCHANGED_LAYOUT: Readonly<Layout> = {
  dimensions: { width: 0, height: 0 },
  origin: "top-left",
  scale: 1,
  originOffset: { x: 0, y: 0 },
};

export function validateLayout(layout: Layout, sink: DiagnosticSink): boolean {
  return checkFinite(
    [
      layout.dimensions.width,
      layout.dimensions.height,
      layout.scale,
      layout.originOffset.x,
      layout.originOffset.y,
    ],
    "Layout",
    sink,
  );
}
