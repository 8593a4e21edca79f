import type { Point } from "@svgscribe/core";
import { copyPoints } from "@svgscribe/core";
import { translatePointToSvg } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr, pointList } from "../utils.js";
import { SurfaceShape, type SurfaceShapeOptions } from "./shape.js";

export class Polygon extends SurfaceShape {
  readonly kind = "polygon";
  private points: Point[];

  constructor(points: readonly Point[] = [], options: SurfaceShapeOptions = {}) {
    super(options);
    this.points = copyPoints(points);
  }

  add(point: Point): this {
    this.points.push({ ...point });
    return this;
  }

  getPoints(): readonly Point[] {
    return this.points;
  }

  serialize(layout: Layout): string {
    const native = this.points.map((p) => translatePointToSvg(p, layout));
    return (
      `<polygon${this.idAttribute()}` +
      attr("points", pointList(native)) +
      `${this.shapeAttributes(layout)}/>`
    );
  }

  offset(delta: Point): void {
    for (const p of this.points) {
      p.x += delta.x;
      p.y += delta.y;
    }
  }

  clone(): Polygon {
    return new Polygon(this.points, this.surfaceOptions());
  }

  protected geometry(): number[] {
    return this.points.flatMap((p) => [p.x, p.y]);
  }
}
