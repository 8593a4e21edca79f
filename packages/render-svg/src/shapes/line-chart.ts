import type { DiagnosticSink, Dimensions, Point } from "@svgscribe/core";
import { boundsOf } from "@svgscribe/core";
import type { Layout } from "../layout.js";
import { Color } from "../style/color.js";
import { Fill } from "../style/fill.js";
import { Stroke } from "../style/stroke.js";
import { Circle } from "./circle.js";
import { Polyline } from "./polyline.js";
import { Shape, type ShapeOptions } from "./shape.js";

export interface LineChartOptions extends ShapeOptions {
  margin?: Dimensions;
  axisStroke?: Stroke;
}

/** Axis extent relative to the data extent. */
const AXIS_GROWTH = 1.1;
/** Vertex dot radius as a fraction of the data height. */
const VERTEX_RADIUS_RATIO = 1 / 30;

/**
 * Series of polylines with dotted vertices and an L-shaped axis.
 */
export class LineChart extends Shape {
  readonly kind = "line-chart";
  margin: Dimensions;
  axisStroke: Stroke;
  private polylines: Polyline[] = [];

  constructor(options: LineChartOptions = {}) {
    super(options);
    this.margin = { ...(options.margin ?? { width: 0, height: 0 }) };
    this.axisStroke = options.axisStroke ?? new Stroke({ width: 0.5, color: Color.named("purple") });
  }

  /**
   * Empty polylines are ignored. Series are drawn without markers since the
   * chart does not publish them to the document's defs.
   */
  add(polyline: Polyline): this {
    if (polyline.getPoints().length > 0) {
      const series = polyline.clone();
      series.markers.clear();
      this.polylines.push(series);
    }
    return this;
  }

  getPolylines(): readonly Polyline[] {
    return this.polylines;
  }

  serialize(layout: Layout): string {
    const bounds = boundsOf(this.polylines.flatMap((p) => p.getPoints()));
    if (!bounds) return "";

    const shift: Point = { x: this.margin.width, y: this.margin.height };
    const vertexFill = new Fill(Color.named("black"));
    const radius = bounds.height * VERTEX_RADIUS_RATIO;
    const parts: string[] = [];

    for (const polyline of this.polylines) {
      const shifted = polyline.clone();
      shifted.offset(shift);
      parts.push(shifted.serialize(layout));
      for (const vertex of shifted.getPoints()) {
        parts.push(new Circle(vertex, radius, { fill: vertexFill }).serialize(layout));
      }
    }

    const width = bounds.width * AXIS_GROWTH;
    const height = bounds.height * AXIS_GROWTH;
    const axis = new Polyline(
      [
        { x: this.margin.width, y: this.margin.height + height },
        { x: this.margin.width, y: this.margin.height },
        { x: this.margin.width + width, y: this.margin.height },
      ],
      { stroke: this.axisStroke },
    );
    parts.push(axis.serialize(layout));

    return parts.join("\n");
  }

  offset(delta: Point): void {
    for (const polyline of this.polylines) {
      polyline.offset(delta);
    }
  }

  clone(): LineChart {
    const copy = new LineChart({
      ...this.shapeOptions(),
      margin: this.margin,
      axisStroke: this.axisStroke,
    });
    for (const polyline of this.polylines) {
      copy.add(polyline);
    }
    return copy;
  }

  override validate(sink: DiagnosticSink): void {
    super.validate(sink);
    this.axisStroke.validate(sink, this.id || null);
    for (const polyline of this.polylines) {
      polyline.validate(sink);
    }
  }

  protected geometry(): number[] {
    return [this.margin.width, this.margin.height];
  }
}
