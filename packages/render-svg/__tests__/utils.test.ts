import { describe, expect, it } from "vitest";
import { attr, escapeXml, n, pointList } from "../src/utils.js";

describe("n", () => {
  it("drops float noise", () => {
    expect(n(0.1 + 0.2)).toBe("0.3");
    expect(n(60 * 1.1)).toBe("66");
  });

  it("keeps six significant digits below 10000", () => {
    expect(n(0.004)).toBe("0.004");
    expect(n(2 / 3)).toBe("0.666667");
    expect(n(1234.56789)).toBe("1234.57");
  });

  it("keeps two decimals from 10000 up", () => {
    expect(n(12345.678)).toBe("12345.68");
    expect(n(-250000.5)).toBe("-250000.5");
  });

  it("writes negative zero as 0", () => {
    expect(n(-0)).toBe("0");
  });
});

describe("attr", () => {
  it("formats numbers with a unit and escapes strings", () => {
    expect(attr("width", 400, "px")).toBe(' width="400px"');
    expect(attr("style", 'a"b')).toBe(' style="a&quot;b"');
  });
});

describe("pointList", () => {
  it("joins x,y pairs with spaces", () => {
    expect(pointList([{ x: 0, y: 1.5 }, { x: 2 / 3, y: 4 }])).toBe("0,1.5 0.666667,4");
  });
});

describe("escapeXml", () => {
  it("escapes all five XML special characters", () => {
    expect(escapeXml(`<a href='x'>&"`)).toBe("&lt;a href=&apos;x&apos;&gt;&amp;&quot;");
  });
});
