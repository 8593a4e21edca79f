const FIXED_FROM = 1e4;

/**
 * Format a number for SVG attribute output: six significant digits below
 * 10000, two decimals above. Small values such as opacities keep their
 * meaning; float noise like 0.30000000000000004 is dropped.
 */
export function n(value: number): string {
  const text = Math.abs(value) < FIXED_FROM ? value.toPrecision(6) : value.toFixed(2);
  return Number(text).toString();
}

/** Escape XML special characters in text content */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Format one attribute with a leading space, e.g. ` cx="10"`.
 * Numbers are rounded, strings escaped.
 */
export function attr(name: string, value: string | number, unit = ""): string {
  const text = typeof value === "number" ? n(value) : escapeXml(value);
  return ` ${name}="${text}${unit}"`;
}

export function pointList(points: readonly { x: number; y: number }[]): string {
  return points.map((p) => `${n(p.x)},${n(p.y)}`).join(" ");
}

/** Code-unit order on `id`, for id-ordered marker sets. */
export function compareIds(a: { id: string }, b: { id: string }): number {
  if (a.id < b.id) return -1;
  return a.id > b.id ? 1 : 0;
}
