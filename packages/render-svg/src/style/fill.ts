import type { DiagnosticSink } from "@svgscribe/core";
import { checkFinite, checkOpacity } from "@svgscribe/core";
import { attr } from "../utils.js";
import { Color } from "./color.js";

export class Fill {
  /** `opacity`: 1 is fully visible, 0 fully transparent. */
  constructor(
    readonly color: Color = Color.transparent(),
    readonly opacity = 1,
  ) {}

  toAttributes(): string {
    let out = attr("fill", this.color.toString());
    if (this.opacity < 1) {
      out += attr("fill-opacity", this.opacity);
    }
    return out;
  }

  validate(sink: DiagnosticSink, elementId: string | null = null): void {
    if (checkFinite([this.opacity], "Fill", sink, elementId)) {
      checkOpacity(this.opacity, "Fill", sink, elementId);
    }
  }
}
