/** Point and box helpers. Points are plain tuples; nothing here mutates its arguments. */
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export function axisIndex(axis: Axis): 0 | 1 | 2 {
  switch (axis) {
    case 'x': return 0;
    case 'y': return 1;
    case 'z': return 2;
  }
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(a: Vec3, s: number): Vec3 {
  return [a[0] * s, a[1] * s, a[2] * s];
}

export function length(a: Vec3): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1] + a[2] * a[2]);
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function max3(a: Vec3, b: Vec3): Vec3 {
  return [Math.max(a[0], b[0]), Math.max(a[1], b[1]), Math.max(a[2], b[2])];
}

export function min3(a: Vec3, b: Vec3): Vec3 {
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.min(a[2], b[2])];
}

/** True when every per-axis difference is strictly below `tol`. */
export function withinTolerance(a: Vec3, b: Vec3, tol: number): boolean {
  return Math.abs(a[0] - b[0]) < tol
    && Math.abs(a[1] - b[1]) < tol
    && Math.abs(a[2] - b[2]) < tol;
}

/** Bounds of a point set, or null when it is empty. */
export function boundsOf(points: Iterable<Vec3>): BoundingBox | null {
  let box: BoundingBox | null = null;
  for (const p of points) {
    box = box ? { min: min3(box.min, p), max: max3(box.max, p) } : { min: [...p], max: [...p] };
  }
  return box;
}

/** Union of two boxes; either side may be null. Always a new box. */
export function mergeBounds(a: BoundingBox | null, b: BoundingBox | null): BoundingBox | null {
  if (!a) return b && { min: [...b.min], max: [...b.max] };
  if (!b) return { min: [...a.min], max: [...a.max] };
  return { min: min3(a.min, b.min), max: max3(a.max, b.max) };
}

/** Freeze a box and both corners in place. */
export function freezeBounds(box: BoundingBox | null): BoundingBox | null {
  if (box) {
    Object.freeze(box.min);
    Object.freeze(box.max);
    Object.freeze(box);
  }
  return box;
}
