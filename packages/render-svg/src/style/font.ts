import { translateScale } from "../coordinate-transform.js";
import type { Layout } from "../layout.js";
import { attr } from "../utils.js";

export class Font {
  constructor(
    readonly size = 12,
    readonly family = "Verdana",
  ) {}

  toAttributes(layout: Layout): string {
    return attr("font-size", translateScale(this.size, layout)) + attr("font-family", this.family);
  }
}
