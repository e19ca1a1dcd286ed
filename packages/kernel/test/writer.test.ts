import { describe, it, expect } from 'vitest';
import { formatScientific, serializeSurf } from '../src/writer.js';
import { processSurf } from '../src/pipeline.js';
import { parseSurf } from '../src/parser.js';
import { createMesh } from '../src/mesh.js';
import { silentLogger } from '../src/logger.js';
import { TETRA, UNIT_TRI, surfText } from './helpers.js';

const quiet = { logger: silentLogger };

describe('formatScientific', () => {
  it('pads the exponent to two digits', () => {
    expect(formatScientific(1)).toBe('1.000000e+00');
    expect(formatScientific(-0.00012345)).toBe('-1.234500e-04');
    expect(formatScientific(1e123)).toBe('1.000000e+123');
    expect(formatScientific(2.5, 2)).toBe('2.50e+00');
  });

  it('writes both zeros the same way', () => {
    expect(formatScientific(0)).toBe('0.000000e+00');
    expect(formatScientific(-0)).toBe('0.000000e+00');
  });

  it('rejects non-finite values', () => {
    expect(() => formatScientific(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});

describe('serializeSurf', () => {

  it('cleans a 4-triangle file and restates the count', () => {
    const { mesh, droppedFaces } = processSurf(surfText(TETRA), 'tetra.surf', quiet);
    expect(droppedFaces).toBe(0);
    expect(mesh.triangleCount).toBe(4);

    const lines = serializeSurf(mesh, { title: 'cleaned tetra' }).split('\n');
    expect(lines.slice(0, 6)).toEqual(['# cleaned tetra', '', '4 triangles', '', 'Triangles', '']);
    expect(lines[6]).toBe(
      '1 0.000000e+00 0.000000e+00 0.000000e+00 1.000000e+00 0.000000e+00 0.000000e+00 0.000000e+00 1.000000e+00 0.000000e+00'
    );
    expect(lines[9].startsWith('4 1.000000e+00 ')).toBe(true);
    expect(lines).toHaveLength(11);
    expect(lines[10]).toBe('');
  });

  it('renumbers ids 1..M after faces are dropped', () => {
    const text = [
      'Triangles',
      '10 0 0 0 1 0 0 2 0 0',
      `20 ${UNIT_TRI.flat().join(' ')}`,
      `30 ${TETRA[1].flat().join(' ')}`,
    ].join('\n');
    const { mesh, droppedFaces } = processSurf(text, 'ids.surf', quiet);
    expect(droppedFaces).toBe(1);
    const ids = parseSurf(serializeSurf(mesh), 'out.surf', quiet).triangles.map((t) => t.id);
    expect(ids).toEqual([1, 2]);
  });

  it('re-parses to the same faces', () => {
    const { mesh } = processSurf(surfText(TETRA), 'tetra.surf', quiet);
    const again = processSurf(serializeSurf(mesh), 'again.surf', quiet);
    expect(again.declaredCount).toBe(4);
    expect(again.warnings).toEqual([]);
    expect(again.mesh.faces).toEqual(mesh.faces);
    expect(again.mesh.vertices).toEqual(mesh.vertices);
  });

  it('defaults the title to the mesh name', () => {
    const { mesh } = processSurf(surfText([UNIT_TRI]), 'unit.surf', quiet);
    expect(serializeSurf(mesh).split('\n')[0]).toBe('# cleaned surface unit.surf');
  });

  it('refuses an empty mesh and a multi-line title', () => {
    expect(() => serializeSurf(createMesh('empty', [], []))).toThrow('Cannot export empty mesh empty (0 triangles)');
    const { mesh } = processSurf(surfText([UNIT_TRI]), 'unit.surf', quiet);
    expect(() => serializeSurf(mesh, { title: 'a\nb' })).toThrow('single line');
  });
});
