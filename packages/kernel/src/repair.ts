/**
 * Mesh repair passes. Each pass takes a mesh and returns a new one; none
 * mutate their input.
 *
 *   filterDegenerate   — drop faces whose area is below an epsilon
 *   dropDuplicateFaces — drop faces repeating an earlier face's vertex set
 *   flipAxis           — negate one coordinate everywhere (mirror)
 *   compactVertices    — drop unreferenced vertices, renumber faces
 *
 * flipAxis is a blunt, mesh-wide orientation fix: it mirrors the geometry
 * and with it every face's normal. Applying it to a mesh that was already
 * oriented correctly inverts it, so repairMesh only runs it when asked.
 */

import type { Axis, Vec3 } from './vec3.js';
import { axisIndex, cross, length, sub } from './vec3.js';
import type { Face, SurfMesh } from './mesh.js';
import { createMesh, freezeMesh } from './mesh.js';
import { DegenerateMeshError } from './errors.js';
import type { PipelineOptions } from './options.js';
import { resolvePipelineOptions } from './options.js';

export interface DegenerateFilterResult {
  mesh: SurfMesh;
  dropped: number;
}

export interface RepairReport {
  mesh: SurfMesh;
  droppedFaces: number;
  duplicateFaces: number;
  removedVertices: number;
  flippedAxis: Axis | null;
}

/** Triangle area, half the cross-product magnitude. */
export function triangleArea(a: Vec3, b: Vec3, c: Vec3): number {
  return 0.5 * length(cross(sub(b, a), sub(c, a)));
}

/**
 * Drop faces with area below `areaEpsilon`.
 * Orphaned vertices stay; see compactVertices.
 *
 * @throws DegenerateMeshError when no face survives
 */
export function filterDegenerate(mesh: SurfMesh, areaEpsilon: number): DegenerateFilterResult {
  const faces = mesh.faces.filter(([a, b, c]) =>
    triangleArea(mesh.vertices[a], mesh.vertices[b], mesh.vertices[c]) >= areaEpsilon
  );
  const dropped = mesh.triangleCount - faces.length;
  if (faces.length === 0) {
    throw new DegenerateMeshError(mesh.name, dropped);
  }
  return { mesh: createMesh(mesh.name, mesh.vertices, faces), dropped };
}

/** Canonical key for a face regardless of winding or starting corner. */
function faceKey(face: Face): string {
  return [...face].sort((x, y) => x - y).join(',');
}

/** Drop faces that reuse the vertex set of an earlier face. */
export function dropDuplicateFaces(mesh: SurfMesh): DegenerateFilterResult {
  const seen = new Set<string>();
  const faces = mesh.faces.filter((f) => {
    const key = faceKey(f);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return { mesh: createMesh(mesh.name, mesh.vertices, faces), dropped: mesh.triangleCount - faces.length };
}

/** Negate `axis` on every vertex. */
export function flipAxis(mesh: SurfMesh, axis: Axis): SurfMesh {
  const k = axisIndex(axis);
  const vertices = mesh.vertices.map((v): Vec3 => {
    const out: Vec3 = [v[0], v[1], v[2]];
    out[k] = v[k] === 0 ? 0 : -v[k];
    return out;
  });
  return createMesh(mesh.name, vertices, mesh.faces);
}

/** Remove vertices no face references, keeping survivor order. */
export function compactVertices(mesh: SurfMesh): { mesh: SurfMesh; removed: number } {
  const remap = new Array<number>(mesh.vertexCount).fill(-1);
  for (const f of mesh.faces) {
    for (const i of f) remap[i] = 0;
  }
  const vertices: Vec3[] = [];
  for (let i = 0; i < mesh.vertexCount; i++) {
    if (remap[i] === -1) continue;
    remap[i] = vertices.length;
    vertices.push(mesh.vertices[i]);
  }
  const faces = mesh.faces.map((f): Face => [remap[f[0]], remap[f[1]], remap[f[2]]]);
  return { mesh: createMesh(mesh.name, vertices, faces), removed: mesh.vertexCount - vertices.length };
}

/** Run the configured passes in order and freeze the result. */
export function repairMesh(mesh: SurfMesh, options: PipelineOptions = {}): RepairReport {
  const opts = resolvePipelineOptions(options);
  let current = mesh;
  let droppedFaces = 0;
  let duplicateFaces = 0;
  let removedVertices = 0;

  if (opts.filterDegenerate) {
    const result = filterDegenerate(current, opts.areaEpsilon);
    current = result.mesh;
    droppedFaces = result.dropped;
  } else if (current.triangleCount === 0) {
    throw new DegenerateMeshError(current.name, 0);
  }

  if (opts.dropDuplicateFaces) {
    const result = dropDuplicateFaces(current);
    current = result.mesh;
    duplicateFaces = result.dropped;
  }

  if (opts.flipAxis) {
    current = flipAxis(current, opts.flipAxis);
  }

  if (opts.compact) {
    const result = compactVertices(current);
    current = result.mesh;
    removedVertices = result.removed;
  }

  return {
    mesh: freezeMesh(current),
    droppedFaces,
    duplicateFaces,
    removedVertices,
    flippedAxis: opts.flipAxis,
  };
}
