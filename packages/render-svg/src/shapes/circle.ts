import type { Point } from "@svgscribe/core";
import { translateScale, translateX, translateY } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr } from "../utils.js";
import { SurfaceShape, type SurfaceShapeOptions } from "./shape.js";

export class Circle extends SurfaceShape {
  readonly kind = "circle";
  center: Point;

  constructor(
    center: Point,
    public radius: number,
    options: SurfaceShapeOptions = {},
  ) {
    super(options);
    this.center = { ...center };
  }

  serialize(layout: Layout): string {
    return (
      `<circle${this.idAttribute()}` +
      attr("cx", translateX(this.center.x, layout)) +
      attr("cy", translateY(this.center.y, layout)) +
      attr("r", translateScale(this.radius, layout)) +
      `${this.shapeAttributes(layout)}/>`
    );
  }

  offset(delta: Point): void {
    this.center.x += delta.x;
    this.center.y += delta.y;
  }

  clone(): Circle {
    return new Circle(this.center, this.radius, this.surfaceOptions());
  }

  protected geometry(): number[] {
    return [this.center.x, this.center.y, this.radius];
  }
}
