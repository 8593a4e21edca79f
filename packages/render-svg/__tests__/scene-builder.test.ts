import { collectDiagnostics, parseScene, SvgWriterError } from "@svgscribe/core";
import { describe, expect, it } from "vitest";
import { buildDocument, buildLayout, renderScene } from "../src/scene-builder.js";

const MARKED_LINE = `
layout:
  width: 100
  height: 100
markers:
  - id: dot
    width: 4
    height: 4
    ref: [2, 2]
    shapes:
      - type: circle
        center: [2, 2]
        radius: 2
        fill: { color: black }
shapes:
  - type: line
    id: l1
    from: [0, 0]
    to: [50, 50]
    stroke: { width: 1, color: black }
    markers: { start: dot, end: dot }
  - type: rect
    position: [10, 90]
    width: 20
    height: 10
    z: -1
`;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function body(svg: string): string[] {
  return svg.split("\n").slice(4, -1);
}

describe("renderScene", () => {
  it("renders markers, z order and the bottom-left flip", () => {
    const { sink, diagnostics } = collectDiagnostics();
    const svg = renderScene(MARKED_LINE, { diagnostics: sink }).toString();
    expect(svg.split("\n")).toEqual([
      '<?xml version="1.0" standalone="no"?>',
      "<!-- Generator: svgscribe, Version: 0.1.0 -->",
      '<!DOCTYPE svg PUBLIC "-//W3C//DTD SVG 1.1//EN" "http://www.w3.org/Graphics/SVG/1.1/DTD/svg11.dtd">',
      '<svg width="100px" height="100px" xmlns="http://www.w3.org/2000/svg" version="1.1">',
      "<defs>",
      '<marker id="dot" markerWidth="4" markerHeight="4" refX="2" refY="2" orient="auto">',
      '<circle cx="2" cy="2" r="2" fill="rgb(0,0,0)"/>',
      "</marker>",
      "</defs>",
      '<rect x="10" y="10" width="20" height="10" fill="none"/>',
      '<line id="l1" x1="0" y1="100" x2="50" y2="50" stroke-width="1" stroke="rgb(0,0,0)"' +
        ' stroke-dashoffset="0" marker-start="url(#dot)" marker-end="url(#dot)"/>',
      "</svg>",
    ]);
    expect(diagnostics).toEqual([]);
  });

  it("builds paths, text and animations from JSON", () => {
    const scene = {
      id: "demo",
      layout: { width: 50, height: 50, origin: "top-left" },
      shapes: [
        {
          type: "path",
          subpaths: [
            [[0, 0], [10, 0], [10, 10]],
            [[2, 2], [4, 2], [4, 4]],
          ],
        },
        {
          type: "text",
          id: "t",
          position: [5, 5],
          content: "Hi",
          anchor: "start",
          font: { size: 10, family: "Arial" },
        },
      ],
      animations: [{ type: "motion", href: "t", dur: "2s", points: [[0, 0], [10, 10]] }],
    };
    const doc = renderScene(JSON.stringify(scene));
    expect(doc.id).toBe("demo");
    expect(doc.isAnimated()).toBe(true);
    expect(body(doc.toString())).toEqual([
      '<path d="M0,0 10,0 10,10 z M2,2 4,2 4,4 z" fill-rule="evenodd" fill="none"/>',
      '<text id="t" text-anchor="start" dominant-baseline="middle" x="5" y="5" fill="none"' +
        ' font-size="10" font-family="Arial">Hi</text>',
      '<animateMotion href="#t" dur="2s" path="M0,0 L10,10"/>',
    ]);
  });

  it("builds a line chart with its margin and series stroke", () => {
    const svg = renderScene(`
layout: { width: 100, height: 100, origin: top-left }
shapes:
  - type: line-chart
    margin: [10, 5]
    series:
      - points: [[0, 0], [30, 60]]
        stroke: { width: 1, color: blue }
`).toString();
    expect(body(svg)[0]).toBe(
      '<polyline fill="none" points="10,5 40,65" stroke-width="1" stroke="rgb(0,0,255)" stroke-dashoffset="0"/>',
    );
    expect(body(svg)).toHaveLength(4);
  });

  it("draws random colors from the given source", () => {
    const scene = parseScene(`
layout: { width: 10, height: 10, origin: top-left }
shapes:
  - type: circle
    center: [1, 1]
    radius: 1
    fill: { color: random }
`);
    const svg = buildDocument(scene, { random: () => 0.5 }).toString();
    expect(body(svg)).toEqual(['<circle cx="1" cy="1" r="1" fill="rgb(128,128,128)"/>']);
  });

  it("repeats random colors for the same seed", () => {
    const input = `
seed: 7
shapes:
  - type: rect
    position: [0, 0]
    width: 5
    height: 5
    fill: { color: random }
`;
    expect(renderScene(input).toString()).toBe(renderScene(input).toString());
  });

  it("rejects a reference to an undefined marker", () => {
    const err = captureError(() =>
      renderScene(`
shapes:
  - type: line
    from: [0, 0]
    to: [1, 1]
    markers: { end: arrow }
`),
    );
    expect(err).toBeInstanceOf(SvgWriterError);
    expect(err).toMatchObject({ code: "unknown-marker" });
    expect(err instanceof Error ? err.message : "").toBe('Unknown marker "arrow"');
  });

  it("rejects an unknown marker orientation", () => {
    const err = captureError(() =>
      renderScene(`
markers:
  - id: m
    width: 1
    height: 1
    orientation: sideways
    shapes: []
shapes: []
`),
    );
    expect(err).toMatchObject({ code: "invalid-orientation" });
  });
});

describe("buildLayout", () => {
  it("defaults to a 400 by 300 bottom-left layout", () => {
    expect(buildLayout(undefined)).toEqual({
      dimensions: { width: 400, height: 300 },
      origin: "bottom-left",
      scale: 1,
      originOffset: { x: 0, y: 0 },
    });
  });

  it("maps the scene layout", () => {
    expect(
      buildLayout({ width: 20, height: 10, origin: "top-right", scale: 2, offset: [1, 3] }),
    ).toEqual({
      dimensions: { width: 20, height: 10 },
      origin: "top-right",
      scale: 2,
      originOffset: { x: 1, y: 3 },
    });
  });
});
