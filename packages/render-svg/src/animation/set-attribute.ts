import type { DiagnosticSink } from "@svgscribe/core";
import { warning } from "@svgscribe/core";
import { attr } from "../utils.js";
import { Animation, type AnimationOptions } from "./animation.js";

export interface SetAttributeOptions extends AnimationOptions {
  to: string;
  attributeName: string;
  /** Defaults to "CSS". */
  attributeType?: string;
}

/** `<set>`: switch an attribute to a value at a point in time. */
export class SetAttribute extends Animation {
  readonly kind = "set";
  to: string;
  attributeName: string;
  attributeType: string;

  constructor(options: SetAttributeOptions) {
    super(options);
    this.to = options.to;
    this.attributeName = options.attributeName;
    this.attributeType = options.attributeType ?? "CSS";
  }

  serialize(): string {
    return (
      `<set${this.animationAttributes()}` +
      attr("to", this.to) +
      attr("attributeName", this.attributeName) +
      attr("attributeType", this.attributeType) +
      "/>"
    );
  }

  clone(): SetAttribute {
    return new SetAttribute({
      ...this.animationOptions(),
      to: this.to,
      attributeName: this.attributeName,
      attributeType: this.attributeType,
    });
  }

  override validate(sink: DiagnosticSink): void {
    super.validate(sink);
    if (!this.attributeName) {
      sink(
        warning(
          "animation-missing-attribute",
          `No attributeName given for animation with id="${this.id}"`,
          this.id || null,
        ),
      );
    }
  }
}
