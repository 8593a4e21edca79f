import { describe, expect, it } from "vitest";
import {
  checkFinite,
  checkOpacity,
  collectDiagnostics,
  silentSink,
  warning,
} from "../src/diagnostics.js";

describe("checkFinite", () => {
  it("accepts finite values without reporting", () => {
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkFinite([0, -1.5, 1e9], "Circle", sink)).toBe(true);
    expect(diagnostics).toHaveLength(0);
  });

  it("reports once for any NaN or infinity", () => {
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkFinite([NaN, Infinity], "Circle", sink, "c1")).toBe(false);
    expect(diagnostics).toEqual([
      {
        code: "non-finite-number",
        severity: "warning",
        message: "Infs or NaNs provided to Circle",
        elementId: "c1",
      },
    ]);
  });
});

describe("checkOpacity", () => {
  it("accepts the closed range [0, 1]", () => {
    expect(checkOpacity(0, "Fill", silentSink)).toBe(true);
    expect(checkOpacity(1, "Fill", silentSink)).toBe(true);
  });

  it("reports values outside the range", () => {
    const { sink, diagnostics } = collectDiagnostics();
    expect(checkOpacity(1.5, "Fill", sink)).toBe(false);
    expect(diagnostics[0].code).toBe("opacity-out-of-range");
    expect(diagnostics[0].message).toBe("Fill: opacity=1.5 is out of range [0,1]");
  });
});

describe("warning", () => {
  it("builds a warning without an element by default", () => {
    expect(warning("empty-text", "Empty")).toEqual({
      code: "empty-text",
      severity: "warning",
      message: "Empty",
      elementId: null,
    });
  });
});
