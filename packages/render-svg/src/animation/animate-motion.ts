import type { DiagnosticSink, Point } from "@svgscribe/core";
import { copyPoints, warning } from "@svgscribe/core";
import { attr, n } from "../utils.js";
import { Animation, type AnimationOptions } from "./animation.js";

export interface AnimateMotionOptions extends AnimationOptions {
  points: readonly Point[];
}

/**
 * `<animateMotion>` along a polyline path. The path is relative to the
 * animated element and is written untransformed.
 */
export class AnimateMotion extends Animation {
  readonly kind = "motion";
  private points: Point[];

  constructor(options: AnimateMotionOptions) {
    super(options);
    this.points = copyPoints(options.points);
  }

  getPoints(): readonly Point[] {
    return this.points;
  }

  serialize(): string {
    const path = this.points
      .map((p, i) => `${i === 0 ? "M" : "L"}${n(p.x)},${n(p.y)}`)
      .join(" ");
    return `<animateMotion${this.animationAttributes()}${attr("path", path)}/>`;
  }

  clone(): AnimateMotion {
    return new AnimateMotion({ ...this.animationOptions(), points: this.points });
  }

  override validate(sink: DiagnosticSink): void {
    super.validate(sink);
    if (this.points.length === 0) {
      sink(
        warning(
          "animation-missing-path",
          `No path points given for animation with id="${this.id}"`,
          this.id || null,
        ),
      );
    }
  }
}
