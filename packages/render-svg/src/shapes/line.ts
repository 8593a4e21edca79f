import type { Point } from "@svgscribe/core";
import { translateX, translateY } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr } from "../utils.js";
import { type Markerable, MarkerRefs, type MarkerRefsInit } from "./markerable.js";
import { Shape, type ShapeOptions } from "./shape.js";

export interface MarkerableShapeOptions extends ShapeOptions {
  markers?: MarkerRefsInit;
}

export class Line extends Shape implements Markerable {
  readonly kind = "line";
  readonly markers: MarkerRefs;
  start: Point;
  end: Point;

  constructor(start: Point, end: Point, options: MarkerableShapeOptions = {}) {
    super(options);
    this.start = { ...start };
    this.end = { ...end };
    this.markers = new MarkerRefs(options.markers);
  }

  serialize(layout: Layout): string {
    return (
      `<line${this.idAttribute()}` +
      attr("x1", translateX(this.start.x, layout)) +
      attr("y1", translateY(this.start.y, layout)) +
      attr("x2", translateX(this.end.x, layout)) +
      attr("y2", translateY(this.end.y, layout)) +
      `${this.shapeAttributes(layout)}${this.markers.toAttributes()}/>`
    );
  }

  offset(delta: Point): void {
    this.start.x += delta.x;
    this.start.y += delta.y;
    this.end.x += delta.x;
    this.end.y += delta.y;
  }

  clone(): Line {
    return new Line(this.start, this.end, {
      ...this.shapeOptions(),
      markers: this.markers.clone(),
    });
  }

  protected geometry(): number[] {
    return [this.start.x, this.start.y, this.end.x, this.end.y];
  }
}
