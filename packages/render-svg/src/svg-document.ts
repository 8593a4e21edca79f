import { writeFileSync } from "node:fs";
import type { DiagnosticSink } from "@svgscribe/core";
import { consoleSink, warning } from "@svgscribe/core";
import { Animation } from "./animation/animation.js";
import { createLayout, type Layout, validateLayout } from "./layout.js";
import type { Marker } from "./marker.js";
import { isMarkerable } from "./shapes/markerable.js";
import type { Shape } from "./shapes/shape.js";
import { attr, compareIds } from "./utils.js";

export const LIBRARY_NAME = "svgscribe";
export const LIBRARY_VERSION = "0.1.0";
export const SVG_VERSION = "1.1";

const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
const DOCTYPE = `<!DOCTYPE svg PUBLIC "-//W3C//DTD SVG ${SVG_VERSION}//EN" "http://www.w3.org/Graphics/SVG/1.1/DTD/svg11.dtd">`;

export interface SvgDocumentOptions {
  layout?: Layout;
  id?: string;
  /** Receives non-fatal diagnostics. Defaults to console warnings. */
  diagnostics?: DiagnosticSink;
}

/**
 * Root of a scene. Owns copies of every shape and animation added to it;
 * markers are referenced by the shapes that use them.
 */
export class SvgDocument {
  id: string;
  private layout: Layout;
  private diagnostics: DiagnosticSink;
  private bodyNodes: Shape[] = [];
  private animationNodes: Animation[] = [];
  private needsSorting = false;
  private fileName = "";

  constructor(options: SvgDocumentOptions = {}) {
    this.layout = options.layout ?? createLayout();
    this.id = options.id ?? "";
    this.diagnostics = options.diagnostics ?? consoleSink;
  }

  /** Stores a copy; later changes to `node` do not reach the document. */
  add(node: Shape | Animation): this {
    if (node instanceof Animation) {
      this.animationNodes.push(node.clone());
      return this;
    }
    const copy = node.clone();
    this.bodyNodes.push(copy);
    this.needsSorting = this.needsSorting || copy.z !== 0;
    return this;
  }

  isAnimated(): boolean {
    return this.animationNodes.length > 0;
  }

  getLayout(): Layout {
    return this.layout;
  }

  /** File name used by the last `save`, extension included. */
  getFileName(): string {
    return this.fileName;
  }

  getShapes(): readonly Shape[] {
    return this.bodyNodes;
  }

  toString(): string {
    validateLayout(this.layout, this.diagnostics);

    if (this.needsSorting) {
      // Array.prototype.sort is stable: equal z keeps insertion order.
      this.bodyNodes.sort((a, b) => paintOrder(a) - paintOrder(b));
    }

    const markers = this.collectMarkers();
    const { width, height } = this.layout.dimensions;
    const parts: string[] = [
      `<?xml version="1.0" standalone="no"?>`,
      `<!-- Generator: ${LIBRARY_NAME}, Version: ${LIBRARY_VERSION} -->`,
      DOCTYPE,
      `<svg${this.id ? attr("id", this.id) : ""}` +
        attr("width", width, "px") +
        attr("height", height, "px") +
        attr("xmlns", SVG_NAMESPACE) +
        attr("version", SVG_VERSION) +
        ">",
    ];

    if (markers.length > 0) {
      parts.push("<defs>");
      for (const marker of markers) {
        parts.push(marker.serialize(this.layout));
      }
      parts.push("</defs>");
    }

    for (const node of this.bodyNodes) {
      node.validate(this.diagnostics);
      const svg = node.serialize(this.layout);
      if (svg) parts.push(svg);
    }

    // Animation order does not affect rendering; never reordered.
    for (const animation of this.animationNodes) {
      animation.validate(this.diagnostics);
      parts.push(animation.serialize(this.layout));
    }

    parts.push("</svg>");
    return parts.join("\n");
  }

  /**
   * Write the document to disk. With `autoAppendExtension`, a path not
   * already ending in .svg or .html gets ".html" when the document is
   * animated and ".svg" otherwise. Parent directories are not created.
   *
   * @returns false when the file could not be written
   */
  save(path: string, autoAppendExtension = true): boolean {
    this.fileName = autoAppendExtension ? withExtension(path, this.isAnimated()) : path;
    const svg = this.toString();
    try {
      writeFileSync(this.fileName, svg, "utf-8");
      return true;
    } catch (err) {
      this.diagnostics({
        code: "write-failed",
        severity: "error",
        message: `Could not write ${this.fileName}: ${err instanceof Error ? err.message : String(err)}`,
        elementId: null,
      });
      return false;
    }
  }

  /**
   * Distinct referenced markers, ordered by id. When two different markers
   * share an id the first one seen is kept and a collision is reported.
   */
  private collectMarkers(): Marker[] {
    const collected = new Map<string, Marker>();
    for (const node of this.bodyNodes) {
      if (!isMarkerable(node)) continue;
      for (const marker of node.markers.used()) {
        const existing = collected.get(marker.id);
        if (existing === undefined) {
          marker.validate(this.diagnostics);
          collected.set(marker.id, marker);
        } else if (existing !== marker && !existing.equals(marker)) {
          this.diagnostics(
            warning(
              "marker-collision",
              `Marker collision detected for ID=${marker.id} within this element:\n` +
                `${node.serialize(this.layout)}\n` +
                "Expect markers not to be rendered correctly.",
              node.id || null,
            ),
          );
        }
      }
    }
    return [...collected.values()].sort(compareIds);
  }
}

function paintOrder(shape: Shape): number {
  return Number.isFinite(shape.z) ? shape.z : 0;
}

function withExtension(path: string, animated: boolean): string {
  if (/\.(svg|html)$/i.test(path)) return path;
  return path + (animated ? ".html" : ".svg");
}
