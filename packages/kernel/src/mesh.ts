/**
 * Indexed triangle mesh — output of deduplication, input to repair.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { add, boundsOf, freezeBounds } from './vec3.js';

/** Three indices into a vertex buffer. */
export type Face = [number, number, number];

export interface SurfMesh {
  /** Source file identity. */
  readonly name: string;
  /** Unique vertex positions, canonical representative first-inserted. */
  readonly vertices: readonly Vec3[];
  readonly faces: readonly Face[];
  readonly vertexCount: number;
  readonly triangleCount: number;
  /** Null only for a mesh without vertices. */
  readonly bounds: BoundingBox | null;
}

/** Build a mesh, checking every face index is in range. */
export function createMesh(name: string, vertices: readonly Vec3[], faces: readonly Face[]): SurfMesh {
  for (let f = 0; f < faces.length; f++) {
    for (const i of faces[f]) {
      if (!Number.isInteger(i) || i < 0 || i >= vertices.length) {
        throw new RangeError(
          `${name}: face ${f} references vertex ${i}, but only ${vertices.length} vertices exist`
        );
      }
    }
  }
  return {
    name,
    vertices,
    faces,
    vertexCount: vertices.length,
    triangleCount: faces.length,
    bounds: boundsOf(vertices),
  };
}

/** Deep-frozen copy; the input's buffers are left writable. */
export function freezeMesh(mesh: SurfMesh): SurfMesh {
  const vertices = mesh.vertices.map((v): Vec3 => [v[0], v[1], v[2]]);
  const faces = mesh.faces.map((f): Face => [f[0], f[1], f[2]]);
  vertices.forEach((v) => Object.freeze(v));
  faces.forEach((f) => Object.freeze(f));
  const frozen = createMesh(mesh.name, Object.freeze(vertices), Object.freeze(faces));
  freezeBounds(frozen.bounds);
  return Object.freeze(frozen);
}

/** The three corner positions of face `f`. */
export function faceVertices(mesh: SurfMesh, f: number): [Vec3, Vec3, Vec3] {
  const [a, b, c] = mesh.faces[f];
  return [mesh.vertices[a], mesh.vertices[b], mesh.vertices[c]];
}

/** Move every vertex by `offset`. Topology is untouched. */
export function translateMesh(mesh: SurfMesh, offset: Vec3): SurfMesh {
  const vertices = mesh.vertices.map((v) => add(v, offset));
  return freezeMesh(createMesh(mesh.name, vertices, mesh.faces));
}
