import { describe, it, expect } from 'vitest';
import { meshStats, faceCentersAndNormals, normalBalance } from '../src/stats.js';
import { createMesh } from '../src/mesh.js';
import { flipAxis } from '../src/repair.js';

const square = createMesh(
  'square.surf',
  [[0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0], [2, 0, 0]],
  [[0, 1, 2], [0, 2, 3], [0, 1, 4]],
);

describe('meshStats', () => {
  it('reports counts, areas and degenerate faces', () => {
    const stats = meshStats(square);
    expect(stats.vertexCount).toBe(5);
    expect(stats.triangleCount).toBe(3);
    expect(stats.minArea).toBe(0);
    expect(stats.maxArea).toBe(0.5);
    expect(stats.totalArea).toBe(1);
    expect(stats.degenerateCount).toBe(1);
    expect(stats.bounds).toEqual({ min: [0, 0, 0], max: [2, 1, 0] });
  });

  it('reports zero areas for a mesh without faces', () => {
    const stats = meshStats(createMesh('empty', [], []));
    expect(stats.minArea).toBe(0);
    expect(stats.totalArea).toBe(0);
    expect(stats.bounds).toBeNull();
  });
});

describe('faceCentersAndNormals', () => {
  it('returns centroids and unnormalized normals', () => {
    const [first] = faceCentersAndNormals(square);
    expect(first.center[0]).toBeCloseTo(2 / 3);
    expect(first.center[1]).toBeCloseTo(1 / 3);
    expect(first.center[2]).toBe(0);
    expect(first.normal).toEqual([0, 0, 1]);
  });
});

describe('normalBalance', () => {
  it('sums to +z for a counter-clockwise square and flips with the mesh', () => {
    const quad = createMesh('quad', square.vertices, square.faces.slice(0, 2));
    expect(normalBalance(quad)).toEqual([0, 0, 2]);
    expect(normalBalance(flipAxis(quad, 'x'))[2]).toBe(-2);
  });
});
