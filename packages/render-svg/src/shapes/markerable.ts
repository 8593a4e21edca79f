import type { Marker } from "../marker.js";
import { attr, compareIds } from "../utils.js";
import type { Shape } from "./shape.js";

export interface MarkerRefsInit {
  start?: Marker;
  mid?: Marker;
  end?: Marker;
}

/**
 * Start/mid/end marker references of a line-like shape. The markers are
 * shared, not owned: copying a shape copies the references only.
 */
export class MarkerRefs {
  start?: Marker;
  mid?: Marker;
  end?: Marker;

  constructor(init: MarkerRefsInit = {}) {
    this.start = init.start;
    this.mid = init.mid;
    this.end = init.end;
  }

  toAttributes(): string {
    let out = "";
    if (this.start?.valid()) out += attr("marker-start", `url(#${this.start.id})`);
    if (this.mid?.valid()) out += attr("marker-mid", `url(#${this.mid.id})`);
    if (this.end?.valid()) out += attr("marker-end", `url(#${this.end.id})`);
    return out;
  }

  /**
   * Distinct referenced markers that carry an id, ordered by id. Two
   * different markers sharing an id are both returned so the document can
   * report the collision.
   */
  used(): Marker[] {
    const distinct: Marker[] = [];
    for (const marker of [this.start, this.mid, this.end]) {
      if (marker?.valid() && !distinct.includes(marker)) {
        distinct.push(marker);
      }
    }
    return distinct.sort(compareIds);
  }

  /** Drop every reference. */
  clear(): void {
    this.start = undefined;
    this.mid = undefined;
    this.end = undefined;
  }

  clone(): MarkerRefs {
    return new MarkerRefs({ start: this.start, mid: this.mid, end: this.end });
  }
}

export interface Markerable {
  readonly markers: MarkerRefs;
}

export function isMarkerable(shape: Shape): shape is Shape & Markerable {
  return "markers" in shape && shape.markers instanceof MarkerRefs;
}
