/**
 * Vertex deduplication — raw triangles to an indexed mesh.
 *
 * Equivalence is per-axis |a - b| < tolerance, and the FIRST vertex
 * inserted within tolerance stays canonical. This is order-sensitive on
 * purpose: if A≈B and B≈C but not A≈C, whichever arrives first decides
 * where the others land. It is not a transitive clustering.
 *
 * Lookup uses a spatial hash with cells two tolerances wide. Any match lies
 * in the query cell or one of its 26 neighbours, and the lowest matching
 * index wins, so results equal a front-to-back linear scan.
 */

import type { Vec3 } from './vec3.js';
import { withinTolerance } from './vec3.js';
import type { RawTriangle } from './parser.js';
import type { Face, SurfMesh } from './mesh.js';
import { createMesh } from './mesh.js';
import type { PipelineOptions } from './options.js';
import { resolvePipelineOptions } from './options.js';

const MAX_CELL = 2 ** 51;

export class VertexIndex {
  readonly tolerance: number;
  private readonly points: Vec3[] = [];
  private readonly cells = new Map<string, number[]>();
  /** Set once a coordinate falls outside the hashable range. */
  private linear = false;

  constructor(tolerance: number) {
    if (!Number.isFinite(tolerance) || tolerance <= 0) {
      throw new RangeError(`tolerance must be a positive finite number (got ${tolerance})`);
    }
    this.tolerance = tolerance;
  }

  get vertices(): readonly Vec3[] {
    return this.points;
  }

  get size(): number {
    return this.points.length;
  }

  /** Index of the canonical vertex for `v`, inserting it when none matches. */
  indexOf(v: Vec3): number {
    const existing = this.find(v);
    if (existing !== -1) return existing;

    const index = this.points.length;
    this.points.push([v[0], v[1], v[2]]);
    const cell = this.cellOf(v);
    if (cell) {
      const key = cell.join(',');
      const bucket = this.cells.get(key);
      if (bucket) bucket.push(index);
      else this.cells.set(key, [index]);
    } else {
      this.linear = true;
    }
    return index;
  }

  /** Index of the canonical vertex for `v`, or -1. */
  find(v: Vec3): number {
    const cell = this.linear ? null : this.cellOf(v);
    if (!cell) return this.scan(v);

    let best = -1;
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (let dz = -1; dz <= 1; dz++) {
          const bucket = this.cells.get(`${cell[0] + dx},${cell[1] + dy},${cell[2] + dz}`);
          if (!bucket) continue;
          for (const i of bucket) {
            // Buckets are in insertion order; the first hit is the cell's lowest
            if (best !== -1 && i >= best) break;
            if (withinTolerance(this.points[i], v, this.tolerance)) {
              best = i;
              break;
            }
          }
        }
      }
    }
    return best;
  }

  private scan(v: Vec3): number {
    for (let i = 0; i < this.points.length; i++) {
      if (withinTolerance(this.points[i], v, this.tolerance)) return i;
    }
    return -1;
  }

  private cellOf(v: Vec3): Vec3 | null {
    const width = 2 * this.tolerance;
    const q: Vec3 = [Math.floor(v[0] / width), Math.floor(v[1] / width), Math.floor(v[2] / width)];
    // Past 2^51 rounding in the quotient can skip a cell
    if (!q.every((c) => Math.abs(c) < MAX_CELL)) return null;
    return q;
  }
}

/** Build the unrepaired indexed mesh from raw triangles. */
export function buildIndexedMesh(
  triangles: readonly RawTriangle[],
  name: string,
  options: PipelineOptions = {},
): SurfMesh {
  const { vertexTolerance } = resolvePipelineOptions(options);
  const index = new VertexIndex(vertexTolerance);
  const faces: Face[] = triangles.map((t) => [
    index.indexOf(t.vertices[0]),
    index.indexOf(t.vertices[1]),
    index.indexOf(t.vertices[2]),
  ]);
  return createMesh(name, index.vertices, faces);
}
