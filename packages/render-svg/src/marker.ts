import type { DiagnosticSink } from "@svgscribe/core";
import { checkFinite, SvgWriterError } from "@svgscribe/core";
import { type Layout, UNCHANGED_LAYOUT } from "./layout.js";
import type { Shape } from "./shapes/shape.js";
import { attr, n } from "./utils.js";

export type MarkerOrientation = "auto" | "auto-start-reverse";

export interface MarkerOptions {
  width?: number;
  height?: number;
  refX?: number;
  refY?: number;
  /** A keyword, or a fixed angle in degrees. */
  orientation?: MarkerOrientation | number;
  shapes?: readonly Shape[];
}

const EPSILON = 1e-10;

function nearlyEqual(a: number, b: number): boolean {
  return Math.abs(a - b) < EPSILON;
}

/**
 * Reusable group of shapes drawn at the vertices of lines and polylines.
 *
 * Marker contents live in the marker's own coordinate system and are written
 * without the document's scale, offset or flip.
 */
export class Marker {
  id: string;
  width: number;
  height: number;
  refX: number;
  refY: number;
  private orient = "auto";
  private shapes: Shape[] = [];

  constructor(id = "", options: MarkerOptions = {}) {
    this.id = id;
    this.width = options.width ?? 0;
    this.height = options.height ?? 0;
    this.refX = options.refX ?? 0;
    this.refY = options.refY ?? 0;
    this.setOrientation(options.orientation ?? "auto");
    for (const shape of options.shapes ?? []) {
      this.add(shape);
    }
  }

  /** Stores a copy of `shape`. */
  add(shape: Shape): this {
    this.shapes.push(shape.clone());
    return this;
  }

  /** Markers without an id cannot be referenced. */
  valid(): boolean {
    return this.id.length > 0;
  }

  get size(): number {
    return this.shapes.length;
  }

  getShapes(): readonly Shape[] {
    return this.shapes;
  }

  get orientation(): string {
    return this.orient;
  }

  /**
   * Accepts "auto", "auto-start-reverse" or an angle. Strings are checked at
   * run time since they may come from a scene file.
   */
  setOrientation(orientation: MarkerOrientation | number | string): void {
    if (typeof orientation === "number") {
      this.orient = n(orientation);
      return;
    }
    if (orientation !== "auto" && orientation !== "auto-start-reverse") {
      throw new SvgWriterError(
        "invalid-orientation",
        `Marker orientation must be "auto", "auto-start-reverse" or an angle, got "${orientation}"`,
      );
    }
    this.orient = orientation;
  }

  /**
   * The layout argument is ignored: contents always use UNCHANGED_LAYOUT.
   */
  serialize(_layout?: Layout): string {
    if (!this.valid()) {
      throw new SvgWriterError(
        "marker-id-required",
        "A marker needs a non-empty id to be referenced",
      );
    }

    const parts = [
      `<marker${attr("id", this.id)}` +
        attr("markerWidth", this.width) +
        attr("markerHeight", this.height) +
        attr("refX", this.refX) +
        attr("refY", this.refY) +
        attr("orient", this.orient) +
        ">",
    ];
    for (const shape of this.shapes) {
      parts.push(shape.serialize(UNCHANGED_LAYOUT));
    }
    parts.push("</marker>");
    return parts.join("\n");
  }

  /**
   * Visual equality, ignoring the id. Shape order does not matter.
   * Used to detect two different markers sharing one id.
   */
  equals(other: Marker): boolean {
    if (
      this.shapes.length !== other.shapes.length ||
      !nearlyEqual(this.width, other.width) ||
      !nearlyEqual(this.height, other.height) ||
      !nearlyEqual(this.refX, other.refX) ||
      !nearlyEqual(this.refY, other.refY) ||
      this.orient !== other.orient
    ) {
      return false;
    }
    const mine = this.shapes.map((s) => s.serialize(UNCHANGED_LAYOUT)).sort();
    const theirs = other.shapes.map((s) => s.serialize(UNCHANGED_LAYOUT)).sort();
    return mine.every((value, i) => value === theirs[i]);
  }

  clone(): Marker {
    const copy = new Marker(this.id, {
      width: this.width,
      height: this.height,
      refX: this.refX,
      refY: this.refY,
      shapes: this.shapes,
    });
    copy.orient = this.orient;
    return copy;
  }

  validate(sink: DiagnosticSink): void {
    checkFinite([this.width, this.height, this.refX, this.refY], "Marker", sink, this.id || null);
    for (const shape of this.shapes) {
      shape.validate(sink);
    }
  }
}
