import type { Point } from "@svgscribe/core";
import { translateScale, translateX, translateY } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr } from "../utils.js";
import { SurfaceShape, type SurfaceShapeOptions } from "./shape.js";

export class Ellipse extends SurfaceShape {
  readonly kind = "ellipse";
  center: Point;

  constructor(
    center: Point,
    public rx: number,
    public ry: number,
    options: SurfaceShapeOptions = {},
  ) {
    super(options);
    this.center = { ...center };
  }

  serialize(layout: Layout): string {
    return (
      `<ellipse${this.idAttribute()}` +
      attr("cx", translateX(this.center.x, layout)) +
      attr("cy", translateY(this.center.y, layout)) +
      attr("rx", translateScale(this.rx, layout)) +
      attr("ry", translateScale(this.ry, layout)) +
      `${this.shapeAttributes(layout)}/>`
    );
  }

  offset(delta: Point): void {
    this.center.x += delta.x;
    this.center.y += delta.y;
  }

  clone(): Ellipse {
    return new Ellipse(this.center, this.rx, this.ry, this.surfaceOptions());
  }

  protected geometry(): number[] {
    return [this.center.x, this.center.y, this.rx, this.ry];
  }
}
