/**
 * Mesh sanity checks — the numbers worth printing before trusting a file.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { add, cross, scale, sub } from './vec3.js';
import type { SurfMesh } from './mesh.js';
import { faceVertices } from './mesh.js';
import { triangleArea } from './repair.js';
import { DEFAULT_AREA_EPSILON } from './options.js';

export interface MeshStats {
  vertexCount: number;
  triangleCount: number;
  minArea: number;
  maxArea: number;
  totalArea: number;
  /** Faces with area below the epsilon the stats were taken with. */
  degenerateCount: number;
  bounds: BoundingBox | null;
}

export function meshStats(mesh: SurfMesh, areaEpsilon = DEFAULT_AREA_EPSILON): MeshStats {
  let minArea = Infinity;
  let maxArea = 0;
  let totalArea = 0;
  let degenerateCount = 0;
  for (let f = 0; f < mesh.triangleCount; f++) {
    const area = triangleArea(...faceVertices(mesh, f));
    minArea = Math.min(minArea, area);
    maxArea = Math.max(maxArea, area);
    totalArea += area;
    if (area < areaEpsilon) degenerateCount++;
  }
  return {
    vertexCount: mesh.vertexCount,
    triangleCount: mesh.triangleCount,
    minArea: mesh.triangleCount === 0 ? 0 : minArea,
    maxArea,
    totalArea,
    degenerateCount,
    bounds: mesh.bounds,
  };
}

export interface FaceFrame {
  center: Vec3;
  /** Unnormalized: magnitude is twice the face area. */
  normal: Vec3;
}

/** Per-face centroid and (v2 - v1) × (v3 - v1). */
export function faceCentersAndNormals(mesh: SurfMesh): FaceFrame[] {
  const frames: FaceFrame[] = [];
  for (let f = 0; f < mesh.triangleCount; f++) {
    const [a, b, c] = faceVertices(mesh, f);
    frames.push({
      center: scale(add(add(a, b), c), 1 / 3),
      normal: cross(sub(b, a), sub(c, a)),
    });
  }
  return frames;
}

/**
 * Sum of unnormalized face normals. A closed, consistently wound surface
 * sums to ~zero; an open shell leans toward the side its normals face,
 * which is what an axis flip would invert.
 */
export function normalBalance(mesh: SurfMesh): Vec3 {
  let sum: Vec3 = [0, 0, 0];
  for (const { normal } of faceCentersAndNormals(mesh)) {
    sum = add(sum, normal);
  }
  return sum;
}
