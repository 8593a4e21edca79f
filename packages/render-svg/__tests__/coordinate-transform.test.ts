import { describe, expect, it } from "vitest";
import {
  translatePointToSvg,
  translateScale,
  translateX,
  translateY,
} from "../src/coordinate-transform.js";
import { createLayout, UNCHANGED_LAYOUT } from "../src/layout.js";

const dims = { width: 400, height: 300 };

describe("origin corners", () => {
  it("maps the logical origin to each corner", () => {
    const origin = { x: 0, y: 0 };
    expect(translatePointToSvg(origin, createLayout({ dimensions: dims, origin: "top-left" }))).toEqual({ x: 0, y: 0 });
    expect(translatePointToSvg(origin, createLayout({ dimensions: dims, origin: "bottom-left" }))).toEqual({ x: 0, y: 300 });
    expect(translatePointToSvg(origin, createLayout({ dimensions: dims, origin: "top-right" }))).toEqual({ x: 400, y: 0 });
    expect(translatePointToSvg(origin, createLayout({ dimensions: dims, origin: "bottom-right" }))).toEqual({ x: 400, y: 300 });
  });

  it("flips exactly one axis per adjacent corner relative to top-left", () => {
    const p = { x: 30, y: 40 };
    const tl = translatePointToSvg(p, createLayout({ dimensions: dims, origin: "top-left" }));
    const bl = translatePointToSvg(p, createLayout({ dimensions: dims, origin: "bottom-left" }));
    const tr = translatePointToSvg(p, createLayout({ dimensions: dims, origin: "top-right" }));
    const br = translatePointToSvg(p, createLayout({ dimensions: dims, origin: "bottom-right" }));

    expect(bl).toEqual({ x: tl.x, y: 300 - tl.y });
    expect(tr).toEqual({ x: 400 - tl.x, y: tl.y });
    expect(br).toEqual({ x: 400 - tl.x, y: 300 - tl.y });
  });
});

describe("scale and origin offset", () => {
  const base = { dimensions: dims, scale: 2, originOffset: { x: 5, y: 10 } };

  it("adds the offset before scaling", () => {
    const layout = createLayout({ ...base, origin: "top-left" });
    expect(translateX(10, layout)).toBe(30);
    expect(translateY(20, layout)).toBe(60);
  });

  it("mirrors against the document size for bottom/right origins", () => {
    const layout = createLayout({ ...base, origin: "bottom-right" });
    expect(translateX(10, layout)).toBe(370);
    expect(translateY(20, layout)).toBe(240);
  });

  it("scales lengths without offset or flip", () => {
    const layout = createLayout({ ...base, origin: "bottom-right" });
    expect(translateScale(3, layout)).toBe(6);
  });
});

describe("defaults", () => {
  it("uses a 400x300 bottom-left layout at scale 1", () => {
    expect(createLayout()).toEqual({
      dimensions: { width: 400, height: 300 },
      origin: "bottom-left",
      scale: 1,
      originOffset: { x: 0, y: 0 },
    });
  });

  it("passes coordinates through the unchanged layout", () => {
    expect(translatePointToSvg({ x: 7, y: -3 }, UNCHANGED_LAYOUT)).toEqual({ x: 7, y: -3 });
  });

  it("propagates non-finite input instead of throwing", () => {
    expect(translateX(NaN, createLayout())).toBeNaN();
  });
});
