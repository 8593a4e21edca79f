import type { DiagnosticSink } from "@svgscribe/core";
import { warning } from "@svgscribe/core";
import type { Layout } from "../layout.js";
import { attr } from "../utils.js";

export type AnimationKind = "set" | "motion";

export interface AnimationOptions {
  id?: string;
  /** Id of the animated element, without the leading "#". */
  href: string;
  begin?: string;
  fill?: string;
  dur?: string;
}

/**
 * Child animation node referencing its target element by id.
 */
export abstract class Animation {
  abstract readonly kind: AnimationKind;

  id: string;
  href: string;
  begin: string;
  fill: string;
  dur: string;

  constructor(options: AnimationOptions) {
    this.id = options.id ?? "";
    this.href = options.href;
    this.begin = options.begin ?? "";
    this.fill = options.fill ?? "";
    this.dur = options.dur ?? "";
  }

  abstract serialize(layout: Layout): string;

  abstract clone(): Animation;

  validate(sink: DiagnosticSink): void {
    if (!this.href) {
      sink(
        warning(
          "animation-missing-href",
          `No href given for animation with id="${this.id}"`,
          this.id || null,
        ),
      );
    }
  }

  protected animationAttributes(): string {
    let out = this.id ? attr("id", this.id) : "";
    out += attr("href", `#${this.href}`);
    if (this.begin) out += attr("begin", this.begin);
    if (this.fill) out += attr("fill", this.fill);
    if (this.dur) out += attr("dur", this.dur);
    return out;
  }

  protected animationOptions(): AnimationOptions {
    return {
      id: this.id,
      href: this.href,
      begin: this.begin,
      fill: this.fill,
      dur: this.dur,
    };
  }
}
