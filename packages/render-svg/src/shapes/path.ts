import type { Point } from "@svgscribe/core";
import { copyPoints } from "@svgscribe/core";
import { translatePointToSvg } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr, pointList } from "../utils.js";
import { SurfaceShape, type SurfaceShapeOptions } from "./shape.js";

/**
 * One or more closed contours filled with the even-odd rule, so an inner
 * subpath cuts a hole into an outer one.
 */
export class Path extends SurfaceShape {
  readonly kind = "path";
  private subpaths: Point[][];

  constructor(points: readonly Point[] = [], options: SurfaceShapeOptions = {}) {
    super(options);
    this.subpaths = [copyPoints(points)];
  }

  /** Append to the current subpath. */
  add(point: Point): this {
    this.subpaths[this.subpaths.length - 1].push({ ...point });
    return this;
  }

  /** Opens a new subpath unless the current one is still empty. */
  startNewSubPath(): this {
    if (this.subpaths[this.subpaths.length - 1].length > 0) {
      this.subpaths.push([]);
    }
    return this;
  }

  getSubpaths(): readonly (readonly Point[])[] {
    return this.subpaths;
  }

  serialize(layout: Layout): string {
    const d = this.subpaths
      .filter((subpath) => subpath.length > 0)
      .map((subpath) => {
        const native = subpath.map((p) => translatePointToSvg(p, layout));
        return `M${pointList(native)} z`;
      })
      .join(" ");
    return (
      `<path${this.idAttribute()}` +
      attr("d", d) +
      attr("fill-rule", "evenodd") +
      `${this.shapeAttributes(layout)}/>`
    );
  }

  offset(delta: Point): void {
    for (const subpath of this.subpaths) {
      for (const p of subpath) {
        p.x += delta.x;
        p.y += delta.y;
      }
    }
  }

  clone(): Path {
    const copy = new Path([], this.surfaceOptions());
    copy.subpaths = this.subpaths.map(copyPoints);
    return copy;
  }

  protected geometry(): number[] {
    return this.subpaths.flatMap((subpath) => subpath.flatMap((p) => [p.x, p.y]));
  }
}
