import type { DiagnosticSink, Point } from "@svgscribe/core";
import { checkFinite } from "@svgscribe/core";
import type { Layout } from "../layout.js";
import { Fill } from "../style/fill.js";
import { Stroke } from "../style/stroke.js";
import { attr } from "../utils.js";

export type ShapeKind =
  | "circle"
  | "ellipse"
  | "rect"
  | "line"
  | "polyline"
  | "polygon"
  | "path"
  | "text"
  | "line-chart";

export interface ShapeOptions {
  id?: string;
  z?: number;
  stroke?: Stroke;
  style?: string;
  visible?: boolean;
}

export interface SurfaceShapeOptions extends ShapeOptions {
  fill?: Fill;
}

/**
 * Every element that has a stroke. Style values (Stroke, Fill, Font) are
 * immutable, so copies may share them.
 */
export abstract class Shape {
  abstract readonly kind: ShapeKind;

  /** Empty means no `id` attribute is written. */
  id: string;
  /**
   * Paint order. Zero for every shape keeps insertion order; otherwise the
   * document sorts ascending, keeping insertion order among equal values.
   * A non-finite value sorts as zero.
   */
  z: number;
  stroke: Stroke;
  style: string;
  visible: boolean;

  constructor(options: ShapeOptions = {}) {
    this.id = options.id ?? "";
    this.z = options.z ?? 0;
    this.stroke = options.stroke ?? new Stroke();
    this.style = options.style ?? "";
    this.visible = options.visible ?? true;
  }

  abstract serialize(layout: Layout): string;

  /** Move all owned geometry by `delta`, in place. */
  abstract offset(delta: Point): void;

  abstract clone(): Shape;

  /** Numbers checked for finiteness by `validate`. */
  protected abstract geometry(): number[];

  hide(): void {
    this.visible = false;
  }

  show(): void {
    this.visible = true;
  }

  validate(sink: DiagnosticSink): void {
    const elementId = this.id || null;
    checkFinite([...this.geometry(), this.z], this.kind, sink, elementId);
    this.stroke.validate(sink, elementId);
  }

  protected idAttribute(): string {
    return this.id ? attr("id", this.id) : "";
  }

  /** Stroke, style and visibility, in that order. */
  protected shapeAttributes(layout: Layout): string {
    let out = this.stroke.toAttributes(layout);
    if (this.style) {
      out += attr("style", this.style);
    }
    if (!this.visible) {
      out += attr("visibility", "hidden");
    }
    return out;
  }

  protected shapeOptions(): ShapeOptions {
    return {
      id: this.id,
      z: this.z,
      stroke: this.stroke,
      style: this.style,
      visible: this.visible,
    };
  }
}

/**
 * Shapes that enclose an area and can be filled.
 */
export abstract class SurfaceShape extends Shape {
  fill: Fill;

  constructor(options: SurfaceShapeOptions = {}) {
    super(options);
    this.fill = options.fill ?? new Fill();
  }

  abstract override clone(): SurfaceShape;

  override validate(sink: DiagnosticSink): void {
    super.validate(sink);
    this.fill.validate(sink, this.id || null);
  }

  protected override shapeAttributes(layout: Layout): string {
    return super.shapeAttributes(layout) + this.fill.toAttributes();
  }

  protected surfaceOptions(): SurfaceShapeOptions {
    return { ...this.shapeOptions(), fill: this.fill };
  }
}
