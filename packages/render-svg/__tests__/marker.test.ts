import { collectDiagnostics, SvgWriterError } from "@svgscribe/core";
import { describe, expect, it } from "vitest";
import { createLayout } from "../src/layout.js";
import { Marker } from "../src/marker.js";
import { Circle } from "../src/shapes/circle.js";
import { Polygon } from "../src/shapes/polygon.js";
import { Color } from "../src/style/color.js";
import { Fill } from "../src/style/fill.js";

const black = new Fill(Color.named("black"));

function arrow(id = "arrow"): Marker {
  return new Marker(id, { width: 10, height: 10, refY: 3 }).add(
    new Polygon([{ x: 0, y: 0 }, { x: 0, y: 6 }, { x: 9, y: 3 }], { fill: black }),
  );
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("Marker", () => {
  it("serializes its contents without the document transform", () => {
    const layout = createLayout({ scale: 3, originOffset: { x: 7, y: 7 } });
    expect(arrow().serialize(layout).split("\n")).toEqual([
      '<marker id="arrow" markerWidth="10" markerHeight="10" refX="0" refY="3" orient="auto">',
      '<polygon points="0,0 0,6 9,3" fill="rgb(0,0,0)"/>',
      "</marker>",
    ]);
  });

  it("keeps small marker-local values", () => {
    const marker = new Marker("tiny", { width: 0.25, height: 0.25 }).add(
      new Circle({ x: 0.125, y: 0.0625 }, 0.004),
    );
    expect(marker.serialize().split("\n")).toEqual([
      '<marker id="tiny" markerWidth="0.25" markerHeight="0.25" refX="0" refY="0" orient="auto">',
      '<circle cx="0.125" cy="0.0625" r="0.004" fill="none"/>',
      "</marker>",
    ]);
  });

  it("refuses to serialize without an id", () => {
    const err = captureError(() => new Marker().serialize());
    expect(err).toBeInstanceOf(SvgWriterError);
    expect(err).toMatchObject({ code: "marker-id-required" });
  });

  it("is valid only with an id", () => {
    expect(new Marker().valid()).toBe(false);
    expect(arrow().valid()).toBe(true);
  });

  it("copies shapes on add", () => {
    const dot = new Circle({ x: 1, y: 1 }, 1);
    const marker = new Marker("dot").add(dot);
    dot.radius = 5;
    expect(marker.size).toBe(1);
    expect(marker.getShapes()[0].serialize(createLayout({ origin: "top-left" }))).toBe(
      '<circle cx="1" cy="1" r="1" fill="none"/>',
    );
  });

  describe("orientation", () => {
    it("defaults to auto", () => {
      expect(new Marker("m").orientation).toBe("auto");
    });

    it("accepts auto-start-reverse", () => {
      const marker = new Marker("m", { orientation: "auto-start-reverse" });
      expect(marker.orientation).toBe("auto-start-reverse");
    });

    it("rounds angles to six significant digits", () => {
      const marker = new Marker("m");
      marker.setOrientation(45.6789012);
      expect(marker.orientation).toBe("45.6789");
      expect(marker.serialize()).toContain(' orient="45.6789"');
    });

    it("rejects other keywords", () => {
      const err = captureError(() => new Marker("m").setOrientation("sideways"));
      expect(err).toBeInstanceOf(SvgWriterError);
      expect(err).toMatchObject({ code: "invalid-orientation" });
    });
  });

  describe("equals", () => {
    it("ignores the id", () => {
      expect(arrow("a").equals(arrow("b"))).toBe(true);
    });

    it("ignores shape order", () => {
      const dot = new Circle({ x: 1, y: 1 }, 1);
      const square = new Polygon([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }]);
      const first = new Marker("m").add(dot).add(square);
      const second = new Marker("m").add(square).add(dot);
      expect(first.equals(second)).toBe(true);
    });

    it("tolerates tiny size differences", () => {
      const other = arrow();
      other.width = 10 + 1e-12;
      expect(arrow().equals(other)).toBe(true);
      other.width = 10.001;
      expect(arrow().equals(other)).toBe(false);
    });

    it("compares orientation", () => {
      const other = arrow();
      other.setOrientation(90);
      expect(arrow().equals(other)).toBe(false);
    });

    it("compares contents", () => {
      const other = new Marker("arrow", { width: 10, height: 10, refY: 3 }).add(
        new Polygon([{ x: 0, y: 0 }, { x: 0, y: 6 }, { x: 9, y: 3 }]),
      );
      expect(arrow().equals(other)).toBe(false);
      expect(arrow().equals(new Marker("arrow", { width: 10, height: 10, refY: 3 }))).toBe(false);
    });
  });

  it("clones deeply", () => {
    const original = arrow();
    original.setOrientation(30);
    const copy = original.clone();
    expect(copy.equals(original)).toBe(true);
    expect(copy.id).toBe("arrow");

    copy.getShapes()[0].offset({ x: 1, y: 1 });
    expect(original.serialize()).toContain('points="0,0 0,6 9,3"');
    expect(copy.orientation).toBe("30");
  });

  it("reports non-finite dimensions", () => {
    const { sink, diagnostics } = collectDiagnostics();
    new Marker("m", { width: Infinity }).validate(sink);
    expect(diagnostics).toEqual([
      {
        code: "non-finite-number",
        severity: "warning",
        message: "Infs or NaNs provided to Marker",
        elementId: "m",
      },
    ]);
  });
});
