import type { ColorName, RandomSource } from "@svgscribe/core";
import { randomInt } from "@svgscribe/core";

type Rgb = readonly [number, number, number];

const PALETTE: Record<ColorName, Rgb> = {
  aqua: [0, 255, 255],
  black: [0, 0, 0],
  gray: [127, 127, 127],
  blue: [0, 0, 255],
  brown: [165, 42, 42],
  cyan: [0, 255, 255],
  fuchsia: [255, 0, 255],
  green: [0, 128, 0],
  lime: [0, 255, 0],
  magenta: [255, 0, 255],
  orange: [255, 165, 0],
  purple: [128, 0, 128],
  red: [255, 0, 0],
  silver: [192, 192, 192],
  white: [255, 255, 255],
  yellow: [255, 255, 0],
};

function channel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * An rgb triple or "transparent". Immutable.
 */
export class Color {
  private constructor(private readonly rgb: Rgb | null) {}

  static rgb(red: number, green: number, blue: number): Color {
    return new Color([channel(red), channel(green), channel(blue)]);
  }

  static named(name: ColorName): Color {
    return new Color(PALETTE[name]);
  }

  static transparent(): Color {
    return new Color(null);
  }

  static random(random: RandomSource): Color {
    return new Color([
      randomInt(random, 256),
      randomInt(random, 256),
      randomInt(random, 256),
    ]);
  }

  isTransparent(): boolean {
    return this.rgb === null;
  }

  toString(): string {
    if (this.rgb === null) return "none";
    const [r, g, b] = this.rgb;
    return `rgb(${r},${g},${b})`;
  }
}
