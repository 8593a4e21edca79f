import type { DiagnosticSink, DominantBaseline, Point, TextAnchor } from "@svgscribe/core";
import { warning } from "@svgscribe/core";
import { translateX, translateY } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { Font } from "../style/font.js";
import { attr, escapeXml } from "../utils.js";
import { SurfaceShape, type SurfaceShapeOptions } from "./shape.js";

export interface TextOptions extends SurfaceShapeOptions {
  font?: Font;
  /** "none" writes no attribute (renders like "start"). */
  anchor?: TextAnchor;
  /** "none" writes no attribute (renders like "auto"). */
  baseline?: DominantBaseline;
}

/**
 * Text label, centred on its origin in both directions by default.
 */
export class Text extends SurfaceShape {
  readonly kind = "text";
  origin: Point;
  font: Font;
  anchor: TextAnchor;
  baseline: DominantBaseline;

  constructor(
    origin: Point,
    public content: string,
    options: TextOptions = {},
  ) {
    super(options);
    this.origin = { ...origin };
    this.font = options.font ?? new Font();
    this.anchor = options.anchor ?? "middle";
    this.baseline = options.baseline ?? "middle";
  }

  serialize(layout: Layout): string {
    let out = `<text${this.idAttribute()}`;
    if (this.anchor !== "none") {
      out += attr("text-anchor", this.anchor);
    }
    if (this.baseline !== "none") {
      out += attr("dominant-baseline", this.baseline);
    }
    return (
      out +
      attr("x", translateX(this.origin.x, layout)) +
      attr("y", translateY(this.origin.y, layout)) +
      this.shapeAttributes(layout) +
      this.font.toAttributes(layout) +
      `>${escapeXml(this.content)}</text>`
    );
  }

  offset(delta: Point): void {
    this.origin.x += delta.x;
    this.origin.y += delta.y;
  }

  clone(): Text {
    return new Text(this.origin, this.content, {
      ...this.surfaceOptions(),
      font: this.font,
      anchor: this.anchor,
      baseline: this.baseline,
    });
  }

  override validate(sink: DiagnosticSink): void {
    super.validate(sink);
    if (this.content.length === 0) {
      sink(warning("empty-text", "Empty string provided to text", this.id || null));
    }
  }

  protected geometry(): number[] {
    return [this.origin.x, this.origin.y, this.font.size];
  }
}
