import type { DiagnosticSink } from "@svgscribe/core";
import { checkFinite, checkOpacity, warning } from "@svgscribe/core";
import { translateScale } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr, n } from "../utils.js";
import { Color } from "./color.js";

export interface StrokeOptions {
  /** Negative means no stroke is drawn at all. */
  width?: number;
  color?: Color;
  nonScaling?: boolean;
  /** Negative leaves the miter limit unset. */
  miterLimit?: number;
  dashArray?: readonly number[];
  dashOffset?: number;
  opacity?: number;
}

/**
 * Outline style. The default instance draws nothing.
 */
export class Stroke {
  readonly width: number;
  readonly color: Color;
  readonly nonScaling: boolean;
  readonly miterLimit: number;
  readonly dashArray: readonly number[];
  readonly dashOffset: number;
  readonly opacity: number;

  constructor(options: StrokeOptions = {}) {
    this.width = options.width ?? -1;
    this.color = options.color ?? Color.transparent();
    this.nonScaling = options.nonScaling ?? false;
    this.miterLimit = options.miterLimit ?? -1;
    this.dashArray = [...(options.dashArray ?? [])];
    this.dashOffset = options.dashOffset ?? 0;
    this.opacity = options.opacity ?? 1;
  }

  toAttributes(layout: Layout): string {
    if (this.width < 0) return "";

    let out =
      attr("stroke-width", translateScale(this.width, layout)) +
      attr("stroke", this.color.toString());
    if (this.miterLimit >= 0) {
      out += attr("stroke-miterlimit", translateScale(this.miterLimit, layout));
    }
    out += attr("stroke-dashoffset", translateScale(this.dashOffset, layout));
    if (this.dashArray.length > 0) {
      out += attr("stroke-dasharray", this.dashArray.map(n).join(","));
    }
    if (this.opacity < 1) {
      out += attr("stroke-opacity", this.opacity);
    }
    if (this.nonScaling) {
      out += attr("vector-effect", "non-scaling-stroke");
    }
    return out;
  }

  validate(sink: DiagnosticSink, elementId: string | null = null): void {
    const dashes = [...this.dashArray, this.dashOffset];
    checkFinite(
      [this.width, this.miterLimit, this.opacity, ...dashes],
      "Stroke",
      sink,
      elementId,
    );
    if (Number.isFinite(this.opacity)) {
      checkOpacity(this.opacity, "Stroke", sink, elementId);
    }
    if (dashes.some((value) => value < 0)) {
      sink(
        warning(
          "negative-dash",
          `Stroke: dash-array=${this.dashArray.join(",")} dash-offset=${this.dashOffset} must not be negative`,
          elementId,
        ),
      );
    }
  }
}
