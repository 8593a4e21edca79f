import type { Point } from "@svgscribe/core";
import { copyPoints } from "@svgscribe/core";
import { translatePointToSvg } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr, pointList } from "../utils.js";
import type { MarkerableShapeOptions } from "./line.js";
import { type Markerable, MarkerRefs } from "./markerable.js";
import { Shape } from "./shape.js";

/**
 * Open chain of segments. Never filled.
 */
export class Polyline extends Shape implements Markerable {
  readonly kind = "polyline";
  readonly markers: MarkerRefs;
  private points: Point[];

  constructor(points: readonly Point[] = [], options: MarkerableShapeOptions = {}) {
    super(options);
    this.points = copyPoints(points);
    this.markers = new MarkerRefs(options.markers);
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
      `<polyline${this.idAttribute()}` +
      attr("fill", "none") +
      attr("points", pointList(native)) +
      `${this.shapeAttributes(layout)}${this.markers.toAttributes()}/>`
    );
  }

  offset(delta: Point): void {
    for (const p of this.points) {
      p.x += delta.x;
      p.y += delta.y;
    }
  }

  clone(): Polyline {
    return new Polyline(this.points, {
      ...this.shapeOptions(),
      markers: this.markers.clone(),
    });
  }

  protected geometry(): number[] {
    return this.points.flatMap((p) => [p.x, p.y]);
  }
}
