/**
 * Mesh Registry — in-memory named store of cleaned meshes and scenes.
 *
 * Every loading MCP tool stores its result here and returns a structured
 * readback so the LLM always knows what it is working with.
 */

import {
  meshStats, normalBalance,
  type ProcessedSurf, type SurfMesh, type MeshStats,
  type Scene, type SkippedEntry, type BoundingBox, type Vec3,
} from '@surfkit/kernel';

export interface MeshEntry {
  id: string;
  /** Declared source path. */
  source: string;
  result: ProcessedSurf;
}

export interface MeshReadback {
  source: string;
  declared_count: number | null;
  parsed_triangles: number;
  unique_vertices: number;
  dropped_faces: number;
  duplicate_faces: number;
  removed_vertices: number;
  flipped_axis: string | null;
  warnings: string[];
  stats: MeshStats;
  normal_balance: Vec3;
}

export interface MeshResult {
  mesh_id: string;
  type: 'mesh';
  readback: MeshReadback;
}

const NAME_RE = /^[a-zA-Z0-9_-]+$/;

function checkName(kind: string, name: string | undefined): void {
  if (name !== undefined && !NAME_RE.test(name)) {
    throw new Error(
      `Invalid ${kind} name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
}

let nextId = 1;

const meshes = new Map<string, MeshEntry>();

function readback(entry: MeshEntry, areaEpsilon?: number): MeshReadback {
  const { result } = entry;
  return {
    source: entry.source,
    declared_count: result.declaredCount,
    parsed_triangles: result.parsedTriangles,
    unique_vertices: result.uniqueVertices,
    dropped_faces: result.droppedFaces,
    duplicate_faces: result.duplicateFaces,
    removed_vertices: result.removedVertices,
    flipped_axis: result.flippedAxis,
    warnings: result.warnings.map((w) => w.message),
    stats: meshStats(result.mesh, areaEpsilon),
    normal_balance: normalBalance(result.mesh),
  };
}

/** Store a processed mesh and return its ID + readback. */
export function create(source: string, result: ProcessedSurf, name?: string): MeshResult {
  checkName('mesh', name);
  const id = name ?? `mesh_${nextId++}`;
  if (meshes.has(id) && !name) {
    // Auto-generated collision — bump
    return create(source, result);
  }
  const entry: MeshEntry = { id, source, result };
  meshes.set(id, entry);
  return { mesh_id: id, type: 'mesh', readback: readback(entry) };
}

/** Retrieve a mesh or throw a clear error. */
export function get(id: string): MeshEntry {
  const entry = meshes.get(id);
  if (!entry) {
    const available = [...meshes.keys()];
    throw new Error(
      `Mesh "${id}" not found. Available meshes: [${available.join(', ')}]`
    );
  }
  return entry;
}

export function getMesh(id: string): SurfMesh {
  return get(id).result.mesh;
}

export function describe(id: string, areaEpsilon?: number): MeshResult {
  const entry = get(id);
  return { mesh_id: entry.id, type: 'mesh', readback: readback(entry, areaEpsilon) };
}

export function remove(id: string): void {
  if (!meshes.has(id)) {
    throw new Error(`Mesh "${id}" not found — cannot delete.`);
  }
  meshes.delete(id);
}

export function list(): MeshResult[] {
  return [...meshes.values()].map((entry): MeshResult => ({
    mesh_id: entry.id,
    type: 'mesh',
    readback: readback(entry),
  }));
}

/** Clear all meshes and scenes (for testing). */
export function clear(): void {
  meshes.clear();
  scenes.clear();
  nextId = 1;
  nextSceneId = 1;
}

// ─── Scene registry ─────────────────────────────────────────────

export interface SceneEntry {
  id: string;
  deck: string;
  scene: Scene;
  skipped: SkippedEntry[];
}

export interface SceneSummary {
  scene_id: string;
  type: 'scene';
  readback: {
    deck: string;
    object_count: number;
    triangle_count: number;
    bounds: BoundingBox | null;
    objects: Array<{
      name: string;
      path: string;
      line: number;
      translation: Vec3;
      triangles: number;
      vertices: number;
      dropped_faces: number;
      bounds: BoundingBox | null;
    }>;
    skipped: Array<{ line: number; path: string | null; error: string; kind: string }>;
  };
}

let nextSceneId = 1;
const scenes = new Map<string, SceneEntry>();

function summarize(entry: SceneEntry): SceneSummary {
  const { scene } = entry;
  return {
    scene_id: entry.id,
    type: 'scene',
    readback: {
      deck: entry.deck,
      object_count: scene.objects.length,
      triangle_count: scene.triangleCount,
      bounds: scene.bounds,
      objects: scene.objects.map((o) => ({
        name: o.name,
        path: o.path,
        line: o.line,
        translation: o.translation,
        triangles: o.mesh.triangleCount,
        vertices: o.mesh.vertexCount,
        dropped_faces: o.report.droppedFaces,
        bounds: o.mesh.bounds,
      })),
      skipped: entry.skipped.map((s) => ({
        line: s.line,
        path: s.path,
        error: s.error.message,
        kind: s.error.name,
      })),
    },
  };
}

export function createScene(deck: string, scene: Scene, skipped: SkippedEntry[], name?: string): SceneSummary {
  checkName('scene', name);
  const id = name ?? `scene_${nextSceneId++}`;
  if (scenes.has(id) && !name) {
    return createScene(deck, scene, skipped);
  }
  const entry: SceneEntry = { id, deck, scene, skipped };
  scenes.set(id, entry);
  return summarize(entry);
}

export function getScene(id: string): SceneSummary {
  const entry = scenes.get(id);
  if (!entry) {
    const available = [...scenes.keys()];
    throw new Error(`Scene "${id}" not found. Available scenes: [${available.join(', ')}]`);
  }
  return summarize(entry);
}

export function listScenes(): SceneSummary[] {
  return [...scenes.values()].map(summarize);
}
