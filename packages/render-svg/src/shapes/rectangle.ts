import type { Point } from "@svgscribe/core";
import { translateScale, translateX, translateY } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr } from "../utils.js";
import { SurfaceShape, type SurfaceShapeOptions } from "./shape.js";

export interface RectangleOptions extends SurfaceShapeOptions {
  /** Corner radii; written only when either is positive. */
  rx?: number;
  ry?: number;
}

export class Rectangle extends SurfaceShape {
  readonly kind = "rect";
  /** Upper-left corner in user space. */
  edge: Point;
  rx: number;
  ry: number;

  constructor(
    edge: Point,
    public width: number,
    public height: number,
    options: RectangleOptions = {},
  ) {
    super(options);
    this.edge = { ...edge };
    this.rx = options.rx ?? 0;
    this.ry = options.ry ?? 0;
  }

  serialize(layout: Layout): string {
    let out =
      `<rect${this.idAttribute()}` +
      attr("x", translateX(this.edge.x, layout)) +
      attr("y", translateY(this.edge.y, layout));
    if (this.rx > 0 || this.ry > 0) {
      out += attr("rx", translateScale(this.rx, layout)) + attr("ry", translateScale(this.ry, layout));
    }
    return (
      out +
      attr("width", translateScale(this.width, layout)) +
      attr("height", translateScale(this.height, layout)) +
      `${this.shapeAttributes(layout)}/>`
    );
  }

  offset(delta: Point): void {
    this.edge.x += delta.x;
    this.edge.y += delta.y;
  }

  /** Copy of this rectangle with its center moved to `center`. */
  centerAt(center: Point): Rectangle {
    const copy = this.clone();
    copy.edge = { x: center.x - this.width / 2, y: center.y - this.height / 2 };
    return copy;
  }

  clone(): Rectangle {
    return new Rectangle(this.edge, this.width, this.height, {
      ...this.surfaceOptions(),
      rx: this.rx,
      ry: this.ry,
    });
  }

  protected geometry(): number[] {
    return [this.edge.x, this.edge.y, this.width, this.height, this.rx, this.ry];
  }
}
