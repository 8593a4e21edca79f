// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function point(x = 0, y = 0): Point {
  return { x, y };
}

/** A single value fills both width and height. */
export function dimensions(width = 0, height = width): Dimensions {
  return { width, height };
}

export function translatePoint(p: Point, delta: Point): Point {
  return { x: p.x + delta.x, y: p.y + delta.y };
}

export function copyPoints(points: readonly Point[]): Point[] {
  return points.map((p) => ({ x: p.x, y: p.y }));
}

export function minPoint(points: readonly Point[]): Point | null {
  if (points.length === 0) return null;
  let x = points[0].x;
  let y = points[0].y;
  for (const p of points) {
    if (p.x < x) x = p.x;
    if (p.y < y) y = p.y;
  }
  return { x, y };
}

export function maxPoint(points: readonly Point[]): Point | null {
  if (points.length === 0) return null;
  let x = points[0].x;
  let y = points[0].y;
  for (const p of points) {
    if (p.x > x) x = p.x;
    if (p.y > y) y = p.y;
  }
  return { x, y };
}

/**
 * Axis-aligned bounding box of a point set, or null when it is empty.
 */
export function boundsOf(points: readonly Point[]): Rect | null {
  const min = minPoint(points);
  const max = maxPoint(points);
  if (!min || !max) return null;
  return { x: min.x, y: min.y, width: max.x - min.x, height: max.y - min.y };
}
